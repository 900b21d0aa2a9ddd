import fs from 'fs-extra'
import path from 'path'

import { FailureRecord, Operation, OutcomeRecord, SuccessRecord } from '../types.js'
import { describeOperation } from './format-plan.js'

export interface AuditMeta {
  workflow: string
  user: string
  cwd: string
  startedAt: Date
}

function pad(n: number) {
  return String(n).padStart(2, '0')
}

export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
}

export function formatTimestamp(d: Date): string {
  return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

/**
 * Same name for every run on a given (local) day, so a later run replaces an earlier report.
 */
export function auditFileName(d: Date): string {
  return `provision-log-${formatDate(d)}.txt`
}

/**
 * Outcomes of one workflow run: any number of successes, then at most one failure.
 */
export class AuditLog {
  private readonly records: OutcomeRecord[] = []

  constructor(readonly meta: AuditMeta) {}

  get entries(): readonly OutcomeRecord[] {
    return this.records
  }

  get successes(): SuccessRecord[] {
    return this.records.filter((r): r is SuccessRecord => r.status === 'success')
  }

  get failure(): FailureRecord | undefined {
    return this.records.find((r): r is FailureRecord => r.status === 'failure')
  }

  recordSuccess(operation: Operation, at: Date): SuccessRecord {
    this.assertOpen()
    const record: SuccessRecord = { status: 'success', operation, command: describeOperation(operation), at }
    this.records.push(record)
    return record
  }

  recordFailure(operation: Operation, at: Date, error: string, exitCode?: number): FailureRecord {
    this.assertOpen()
    const record: FailureRecord = { status: 'failure', operation, command: describeOperation(operation), at, error }
    if (exitCode !== undefined) record.exitCode = exitCode
    this.records.push(record)
    return record
  }

  render(): string {
    const lines: string[] = [
      `Provisioning report: ${this.meta.workflow}`,
      `Date: ${formatTimestamp(this.meta.startedAt)}`,
      `User: ${this.meta.user}`,
      `Working directory: ${this.meta.cwd}`,
      '',
      'Completed operations:',
    ]
    const ok = this.successes
    if (!ok.length) lines.push('  (none)')
    for (const r of ok) {
      lines.push(`  [${formatTimestamp(r.at)}] ${r.command}`)
    }
    lines.push('', 'Failures:')
    const failed = this.failure
    if (failed) {
      lines.push(`  [${formatTimestamp(failed.at)}] ${failed.command}`)
      lines.push(`    ${failed.error}`)
    } else {
      lines.push('  No failures.')
    }
    return lines.join('\n') + '\n'
  }

  private assertOpen() {
    if (this.failure) {
      throw new Error('Audit log already holds a failure; execution must stop at the first one')
    }
  }
}

/**
 * Write the report to the dated file in `dir`, replacing any earlier report from the same day.
 */
export async function persistAudit(log: AuditLog, dir: string, now: Date = new Date()): Promise<string> {
  const file = path.join(path.resolve(dir), auditFileName(now))
  await fs.outputFile(file, log.render(), 'utf8')
  return file
}
