import { Plan } from '../core/plan.js'
import type { BuildContext } from './context.js'

export async function addEditorSet(plan: Plan, ctx: BuildContext): Promise<void> {
  const legacy = ctx.profile.editor.legacyPreferenceFile
  if (legacy && await ctx.precheck.pathExists(legacy)) {
    plan.add({ kind: 'rm', path: legacy })
  } else if (legacy) {
    ctx.logger?.info(`[boardprep] skip rm: ${legacy} not present`)
  }
  for (const command of ctx.profile.editor.commands) {
    plan.add({ kind: 'shell', command })
  }
}
