import type { Plan } from '../core/plan.js'
import type { Stage } from '../core/runner.js'
import type { BuildContext } from './context.js'
import { addEditorSet } from './editor-set.js'
import { addPackageSet } from './package-set.js'
import { addShareFolderSet } from './share-folder.js'
import { addVerificationSet } from './verify.js'

export type WorkflowId = 'full_setup' | 'packages_only' | 'editor_only' | 'share_folder_only' | 'verify_only'

export interface Workflow {
  id: WorkflowId
  title: string
  stages(ctx: BuildContext): Stage[]
}

function verificationStage(ctx: BuildContext): Stage {
  return { title: 'Verify installation', build: plan => addVerificationSet(plan, ctx) }
}

async function shareFolder(plan: Plan, ctx: BuildContext) {
  const answer = await addShareFolderSet(plan, ctx)
  if (!answer.setup) {
    ctx.logger?.info(`[boardprep] shared folder skipped${answer.cancelled ? ' (prompt cancelled)' : ''}`)
  }
}

export const WORKFLOWS: Record<WorkflowId, Workflow> = {
  full_setup: {
    id: 'full_setup',
    title: 'Full setup',
    // Verification is built only after the installs ran, or its prechecks would see the old system.
    stages: ctx => [
      {
        title: 'Packages, editor and shared folder',
        build: async plan => {
          await addPackageSet(plan, ctx)
          await addEditorSet(plan, ctx)
          await shareFolder(plan, ctx)
        },
      },
      verificationStage(ctx),
    ],
  },
  packages_only: {
    id: 'packages_only',
    title: 'Install packages only',
    stages: ctx => [{ title: 'Packages', build: plan => addPackageSet(plan, ctx) }],
  },
  editor_only: {
    id: 'editor_only',
    title: 'Install editor only',
    stages: ctx => [{ title: 'Editor', build: plan => addEditorSet(plan, ctx) }],
  },
  share_folder_only: {
    id: 'share_folder_only',
    title: 'Set up shared folder only',
    stages: ctx => [{ title: 'Shared folder', build: plan => shareFolder(plan, ctx) }],
  },
  verify_only: {
    id: 'verify_only',
    title: 'Verify installation only',
    stages: ctx => [verificationStage(ctx)],
  },
}
