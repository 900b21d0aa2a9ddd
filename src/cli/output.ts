import chalk from 'chalk'

import { describeOperation, formatPlan } from '../core/format-plan.js'
import type { Plan } from '../core/plan.js'
import type { Stage } from '../core/runner.js'
import type { FailureRecord, Operation } from '../types.js'

/**
 * Everything the user reads on stdout goes through one of these.
 */
export interface Output {
  write(text: string): void
}

export const stdoutOutput: Output = {
  write: text => {
    process.stdout.write(text)
  },
}

export const colors = {
  title: chalk.bold.cyan,
  success: chalk.green,
  error: chalk.bold.red,
  dim: chalk.gray,
}

export function println(out: Output, text = '') {
  out.write(text + '\n')
}

export function printMenu(out: Output, entries: ReadonlyArray<{ key: string; label: string }>) {
  println(out)
  println(out, colors.title('Board development setup'))
  for (const e of entries) {
    println(out, `  ${e.key}) ${e.label}`)
  }
}

export function printStage(out: Output, stage: Stage, plan: Plan) {
  println(out)
  println(out, colors.title(`== ${stage.title}`))
  println(out, formatPlan(plan.operations))
}

export function printOperation(out: Output, op: Operation, index: number, total: number) {
  println(out, colors.dim(`[${index}/${total}]`) + ` ${describeOperation(op)}`)
}

export function printSuccess(out: Output, workflow: string, auditPath: string) {
  println(out, colors.success(`${workflow}: done.`))
  println(out, `Log written to ${auditPath}`)
}

export function printFailure(out: Output, failure: FailureRecord, support: string, auditPath: string) {
  println(out)
  println(out, colors.error(`FAILED: ${failure.command}`))
  println(out, colors.error(`  ${failure.error}`))
  println(out, `Nothing after this step was run. Contact ${support} and include the log below.`)
  println(out, `Log written to ${auditPath}`)
}
