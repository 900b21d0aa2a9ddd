import fs from 'fs-extra'

export async function createDir(p: string) {
  await fs.ensureDir(p)
}

/**
 * Create a symlink at target pointing to source. Fails if anything is already at
 * target or its directory is missing; parents are never created here.
 */
export async function createSymlink(sourceAbs: string, targetAbs: string) {
  await fs.symlink(sourceAbs, targetAbs)
}

export async function removePath(p: string) {
  await fs.remove(p)
}

/**
 * Append one line, starting a new line first if the file does not end with one.
 */
export async function appendLine(file: string, line: string) {
  await fs.ensureFile(file)
  const current = await fs.readFile(file, 'utf8')
  const prefix = current.length > 0 && !current.endsWith('\n') ? '\n' : ''
  await fs.appendFile(file, `${prefix}${line}\n`, 'utf8')
}
