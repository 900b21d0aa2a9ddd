import { isCancel, log, text } from '@clack/prompts'

import type { Prompter } from '../types.js'

export const clackPrompter: Prompter = {
  async ask(message: string): Promise<string | undefined> {
    const answer = await text({ message })
    if (isCancel(answer)) return undefined
    // Empty submissions come back as undefined at runtime.
    return answer ?? ''
  },
  error(message: string): void {
    log.error(message)
  },
}
