import { Plan } from '../core/plan.js'
import type { BuildContext } from './context.js'

/**
 * Fixed package manager invocations, then group membership for the invoking user.
 */
export async function addPackageSet(plan: Plan, ctx: BuildContext): Promise<void> {
  for (const command of ctx.profile.packages.commands) {
    plan.add({ kind: 'shell', command })
  }
  const groups = ctx.profile.packages.groups
  if (groups.length) {
    plan.add({ kind: 'shell', command: `usermod -aG ${groups.join(',')} ${ctx.user}` })
  }
}
