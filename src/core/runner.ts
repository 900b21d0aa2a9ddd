import { executePlan, ExecuteOptions } from './apply.js'
import { AuditLog, persistAudit } from './audit.js'
import { Plan } from './plan.js'
import { FailureRecord } from '../types.js'

export interface Stage {
  title: string
  /**
   * Append this stage's operations. Called only once the previous stage has
   * finished, so prechecks see what it changed.
   */
  build(plan: Plan): Promise<void>
}

export interface RunCycleInput {
  stages: Stage[]
  log: AuditLog
  auditDir: string
  opts?: ExecuteOptions & {
    /**
     * Called with each stage's plan after it is built and before it runs.
     */
    onStage?: (stage: Stage, plan: Plan) => void
  }
}

export type CycleResult =
  | { ok: true; auditPath: string; log: AuditLog }
  | { ok: false; auditPath: string; log: AuditLog; failure: FailureRecord }

export async function runCycle(input: RunCycleInput): Promise<CycleResult> {
  const { log, opts } = input
  const now = opts?.now ?? (() => new Date())

  for (const stage of input.stages) {
    const plan = new Plan()
    await stage.build(plan)
    opts?.onStage?.(stage, plan)

    const res = await executePlan(plan, log, opts)
    if (!res.ok) {
      const auditPath = await persistAudit(log, input.auditDir, now())
      opts?.logger?.error(`[boardprep] ${log.meta.workflow} failed at stage "${stage.title}"`)
      return { ok: false, auditPath, log, failure: res.failure }
    }
  }

  const auditPath = await persistAudit(log, input.auditDir, now())
  opts?.logger?.info(`[boardprep] ${log.meta.workflow} ok (${log.successes.length} operations)`)
  return { ok: true, auditPath, log }
}
