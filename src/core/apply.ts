import { appendLine, createDir, createSymlink, removePath } from './fs-ops.js'
import { AuditLog } from './audit.js'
import { Plan } from './plan.js'
import { CommandRunner, shellRunner } from './shell.js'
import { describeOperation } from './format-plan.js'
import { ExecuteResult, Logger, Operation, SuccessRecord } from '../types.js'

export interface ExecuteOptions {
  runner?: CommandRunner
  logger?: Logger
  now?: () => Date
  /**
   * Called right before each operation starts (1-based index).
   */
  onOperation?: (op: Operation, index: number, total: number) => void
}

class OperationFailed extends Error {
  constructor(message: string, readonly exitCode?: number) {
    super(message)
  }
}

async function applyOperation(op: Operation, runner: CommandRunner): Promise<void> {
  switch (op.kind) {
    case 'shell': {
      const code = await runner.run(op.command)
      if (code !== 0) throw new OperationFailed(`exit status ${code}`, code)
      return
    }
    case 'mkdirp':
      await createDir(op.dir)
      return
    case 'symlink':
      await createSymlink(op.source, op.target)
      return
    case 'rm':
      await removePath(op.path)
      return
    case 'append_line':
      await appendLine(op.file, op.line)
      return
    default: {
      const _exhaustive: never = op
      throw new Error(`Unknown operation: ${JSON.stringify(_exhaustive)}`)
    }
  }
}

/**
 * Run a plan in order, stopping at the first failure.
 *
 * The plan is drained up front and left empty. Every attempted operation is
 * recorded in `log`. Nothing is retried or undone: operations after a failure
 * never run, and those before it stay applied.
 */
export async function executePlan(plan: Plan, log: AuditLog, opts: ExecuteOptions = {}): Promise<ExecuteResult> {
  const runner = opts.runner ?? shellRunner
  const now = opts.now ?? (() => new Date())
  const ops = plan.drain()
  const succeeded: SuccessRecord[] = []

  for (const [i, op] of ops.entries()) {
    opts.onOperation?.(op, i + 1, ops.length)
    try {
      await applyOperation(op, runner)
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e)
      const exitCode = e instanceof OperationFailed ? e.exitCode : undefined
      const failure = log.recordFailure(op, now(), message, exitCode)
      opts.logger?.error(`[boardprep] operation failed: ${describeOperation(op)} (${message})`)
      return { ok: false, succeeded, failure }
    }
    succeeded.push(log.recordSuccess(op, now()))
    opts.logger?.info(`[boardprep] operation ok: ${describeOperation(op)}`)
  }

  return { ok: true, succeeded }
}
