import fs from 'fs-extra'

export interface FileStat {
  isSymbolicLink(): boolean
}

/**
 * Read-only view of the filesystem used by prechecks.
 */
export interface FS {
  pathExists(p: string): Promise<boolean>
  lstat(p: string): Promise<FileStat>
  readFile(p: string): Promise<string>
  isExecutable(p: string): Promise<boolean>
}

export const nodeFS: FS = {
  pathExists: p => fs.pathExists(p),
  lstat: p => fs.lstat(p),
  readFile: p => fs.readFile(p, 'utf8'),
  isExecutable: async p => {
    try {
      await fs.access(p, fs.constants.X_OK)
      const st = await fs.stat(p)
      return st.isFile()
    } catch {
      return false
    }
  },
}
