import { Plan } from '../core/plan.js'
import type { BuildContext } from './context.js'

/**
 * Post-install repairs: toolchain name links that are missing, and required
 * tools that no longer resolve on the search path.
 */
export async function addVerificationSet(plan: Plan, ctx: BuildContext): Promise<void> {
  const { precheck } = ctx

  for (const link of ctx.profile.verify.links) {
    const present = await precheck.isSymlink(link.target) || await precheck.pathExists(link.target)
    if (!present) {
      plan.add({ kind: 'symlink', source: link.source, target: link.target })
    }
  }

  for (const tool of ctx.profile.verify.tools) {
    if (!await precheck.hasCommand(tool.command)) {
      ctx.logger?.warn(`[boardprep] ${tool.command} not found on PATH; reinstalling`)
      plan.add({ kind: 'shell', command: tool.reinstall })
    }
  }
}
