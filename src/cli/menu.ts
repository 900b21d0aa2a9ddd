import { WORKFLOWS, Workflow, WorkflowId } from '../api/workflows.js'
import type { BuildContext } from '../api/context.js'
import { AuditLog } from '../core/audit.js'
import { CycleResult, runCycle } from '../core/runner.js'
import type { CommandRunner } from '../core/shell.js'
import type { Logger, Prompter } from '../types.js'
import { Output, printFailure, printMenu, printOperation, printStage, printSuccess, println } from './output.js'

export type MenuState = 'menu' | WorkflowId | 'exit'

type Choice = Exclude<MenuState, 'menu'>

export const MENU: ReadonlyArray<{ key: string; choice: Choice; label: string }> = [
  { key: '1', choice: 'full_setup', label: WORKFLOWS.full_setup.title },
  { key: '2', choice: 'packages_only', label: WORKFLOWS.packages_only.title },
  { key: '3', choice: 'editor_only', label: WORKFLOWS.editor_only.title },
  { key: '4', choice: 'share_folder_only', label: WORKFLOWS.share_folder_only.title },
  { key: '5', choice: 'verify_only', label: WORKFLOWS.verify_only.title },
  { key: '6', choice: 'exit', label: 'Exit' },
]

export function parseChoice(input: string): Choice | undefined {
  const key = input.trim()
  return MENU.find(e => e.key === key)?.choice
}

export interface MenuDeps {
  ctx: BuildContext
  prompter: Prompter
  output: Output
  cwd: string
  auditDir: string
  support: string
  runner?: CommandRunner
  logger?: Logger
  now?: () => Date
}

/**
 * Menu loop. Each selection runs to completion with its own audit log and
 * plans, then control comes back here; the first failed operation ends the
 * loop with exit status 1.
 */
export class MenuController {
  state: MenuState = 'menu'

  constructor(private readonly deps: MenuDeps) {}

  async run(): Promise<number> {
    const { prompter, output } = this.deps
    for (;;) {
      this.state = 'menu'
      printMenu(output, MENU)
      const raw = await prompter.ask(`Select an option [1-${MENU.length}]`)
      if (raw === undefined) {
        this.state = 'exit'
        return 0
      }

      const choice = parseChoice(raw)
      if (!choice) {
        prompter.error(`Invalid choice "${raw.trim()}". Enter a number from 1 to ${MENU.length}.`)
        continue
      }

      this.state = choice
      if (choice === 'exit') {
        println(output, 'Bye.')
        return 0
      }

      const res = await this.runWorkflow(WORKFLOWS[choice])
      if (!res.ok) {
        this.state = 'exit'
        return 1
      }
    }
  }

  async runWorkflow(workflow: Workflow): Promise<CycleResult> {
    const { ctx, output } = this.deps
    const now = this.deps.now ?? (() => new Date())
    const log = new AuditLog({ workflow: workflow.title, user: ctx.user, cwd: this.deps.cwd, startedAt: now() })

    const res = await runCycle({
      stages: workflow.stages(ctx),
      log,
      auditDir: this.deps.auditDir,
      opts: {
        runner: this.deps.runner,
        logger: this.deps.logger,
        now,
        onStage: (stage, plan) => printStage(output, stage, plan),
        onOperation: (op, i, total) => printOperation(output, op, i, total),
      },
    })

    if (res.ok) printSuccess(output, workflow.title, res.auditPath)
    else printFailure(output, res.failure, this.deps.support, res.auditPath)
    return res
  }
}
