import path from 'path'

import type { Precheck } from '../core/precheck.js'
import type { Profile } from '../profile/types.js'
import type { Logger, Prompter } from '../types.js'

/**
 * What the sub-plan builders need to decide which operations to append.
 */
export interface BuildContext {
  profile: Profile
  /**
   * The user who invoked sudo; per-user effects (groups, desktop links) target them.
   */
  user: string
  homeDir: string
  precheck: Precheck
  prompter: Prompter
  logger?: Logger
}

export function homeDirFor(user: string): string {
  return path.join('/home', user)
}
