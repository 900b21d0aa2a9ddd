export type {
  Operation,
  OperationKind,
  OutcomeRecord,
  SuccessRecord,
  FailureRecord,
  ExecuteResult,
  Logger,
  Prompter,
} from './types.js'
export type { Profile, ToolchainLink, RequiredTool } from './profile/types.js'
export type { FS } from './core/fs.js'
export type { Precheck, PrecheckOptions } from './core/precheck.js'
export type { CommandRunner } from './core/shell.js'
export type { ExecuteOptions } from './core/apply.js'
export type { Stage, CycleResult } from './core/runner.js'
export type { AuditMeta } from './core/audit.js'

export { Plan } from './core/plan.js'
export { describeOperation, formatPlan } from './core/format-plan.js'
export { createPrecheck } from './core/precheck.js'
export { shellRunner } from './core/shell.js'
export { executePlan } from './core/apply.js'
export { AuditLog, auditFileName, persistAudit } from './core/audit.js'
export { runCycle } from './core/runner.js'
export { normalizeProfile } from './profile/types.js'
export { loadProfile, defaultProfilePath } from './profile/io.js'

export * from './api/index.js'
