import path from 'path'

import { Plan } from '../core/plan.js'
import type { Prompter } from '../types.js'
import type { BuildContext } from './context.js'

export type ShareFolderAnswer =
  | { setup: false; cancelled: boolean }
  | { setup: true; folder: string }

const YES = ['y', 'yes']
const NO = ['n', 'no']

/**
 * Ask until the answer is yes or no (any case). Undefined means the prompt was cancelled.
 */
export async function askYesNo(prompter: Prompter, message: string): Promise<boolean | undefined> {
  for (;;) {
    const raw = await prompter.ask(message)
    if (raw === undefined) return undefined
    const answer = raw.trim().toLowerCase()
    if (YES.includes(answer)) return true
    if (NO.includes(answer)) return false
    prompter.error(`Please answer "y" or "n" (got "${raw}").`)
  }
}

export function validateFolderName(name: string): string | undefined {
  if (!name) return 'Folder name cannot be empty.'
  if (name === '.' || name === '..') return `"${name}" is not a folder name.`
  if (name.includes('/')) return 'Folder name cannot contain "/".'
  return undefined
}

export async function askFolderName(prompter: Prompter): Promise<string | undefined> {
  for (;;) {
    const raw = await prompter.ask('Name of the shared folder (as configured on the host)')
    if (raw === undefined) return undefined
    const name = raw.trim()
    const problem = validateFolderName(name)
    if (!problem) return name
    prompter.error(problem)
  }
}

/**
 * Interactive: on "yes", append whichever of mount root, desktop link and
 * mount table entry are not already in place. On "no" nothing is appended.
 */
export async function addShareFolderSet(plan: Plan, ctx: BuildContext): Promise<ShareFolderAnswer> {
  const wanted = await askYesNo(ctx.prompter, 'Set up a shared folder from the host? (y/n)')
  if (wanted !== true) return { setup: false, cancelled: wanted === undefined }

  const folder = await askFolderName(ctx.prompter)
  if (folder === undefined) return { setup: false, cancelled: true }

  const { mountRoot, mountTable, mountLine, desktopDir } = ctx.profile.share
  const { precheck } = ctx

  if (!await precheck.pathExists(mountRoot)) {
    plan.add({ kind: 'mkdirp', dir: mountRoot })
  }

  const link = path.join(ctx.homeDir, desktopDir, folder)
  if (!await precheck.isSymlink(link)) {
    plan.add({ kind: 'symlink', source: path.join(mountRoot, folder), target: link })
  }

  if (!await precheck.fileHasLine(mountTable, mountLine)) {
    plan.add({ kind: 'append_line', file: mountTable, line: mountLine })
  }

  return { setup: true, folder }
}
