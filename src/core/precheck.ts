import path from 'path'

import { FS, nodeFS } from './fs.js'

/**
 * Read-only questions about the current system state. Every call goes back to
 * the filesystem; nothing is cached, since an earlier run in the same process
 * may have changed the answer.
 */
export interface Precheck {
  pathExists(p: string): Promise<boolean>
  /**
   * True for a symlink even when it dangles, unlike `pathExists`.
   */
  isSymlink(p: string): Promise<boolean>
  fileHasLine(file: string, line: string): Promise<boolean>
  resolveCommand(name: string): Promise<string | undefined>
  hasCommand(name: string): Promise<boolean>
}

export interface PrecheckOptions {
  fs?: FS
  /**
   * Search path for command resolution. Default: `process.env.PATH`, read on every lookup.
   */
  searchPath?: string
}

export async function isSymlinkWithFS(fs: FS, p: string): Promise<boolean> {
  try {
    const st = await fs.lstat(p)
    return st.isSymbolicLink()
  } catch {
    return false
  }
}

export async function fileHasLineWithFS(fs: FS, file: string, line: string): Promise<boolean> {
  if (!await fs.pathExists(file)) return false
  const wanted = line.trim()
  const content = await fs.readFile(file)
  return content.split(/\r?\n/).some(l => l.trim() === wanted)
}

export async function resolveCommandWithFS(fs: FS, searchPath: string, name: string): Promise<string | undefined> {
  if (!name) return undefined
  if (name.includes('/')) {
    return await fs.isExecutable(name) ? name : undefined
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue
    const candidate = path.join(dir, name)
    if (await fs.isExecutable(candidate)) return candidate
  }
  return undefined
}

export function createPrecheck(opts: PrecheckOptions = {}): Precheck {
  const fs = opts.fs ?? nodeFS
  const searchPath = () => opts.searchPath ?? process.env.PATH ?? ''

  const resolveCommand = (name: string) => resolveCommandWithFS(fs, searchPath(), name)

  return {
    pathExists: p => fs.pathExists(p),
    isSymlink: p => isSymlinkWithFS(fs, p),
    fileHasLine: (file, line) => fileHasLineWithFS(fs, file, line),
    resolveCommand,
    hasCommand: async name => (await resolveCommand(name)) !== undefined,
  }
}
