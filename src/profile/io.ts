import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'

import { Profile, normalizeProfile } from './types.js'

/**
 * The profile shipped with the package (`profiles/default.json`), found next
 * to both `src/` and `dist/`.
 */
export function defaultProfilePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  return path.resolve(here, '..', '..', 'profiles', 'default.json')
}

export async function loadProfile(profilePath: string = defaultProfilePath()): Promise<Profile> {
  const abs = path.resolve(profilePath)
  if (!await fs.pathExists(abs)) {
    throw new Error(`Profile not found: ${abs}`)
  }
  const json: unknown = await fs.readJson(abs)
  try {
    return normalizeProfile(json)
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e)
    throw new Error(`${msg} (in ${abs})`)
  }
}
