import { spawn } from 'child_process'

/**
 * Runs one shell command to completion and reports its exit status.
 */
export interface CommandRunner {
  run(command: string): Promise<number>
}

/**
 * `/bin/sh -c <command>` with the terminal passed through, so package manager
 * output and prompts reach the user. A command killed by a signal has no exit
 * status and counts as 1.
 */
export const shellRunner: CommandRunner = {
  run(command: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn('/bin/sh', ['-c', command], { stdio: 'inherit' })
      child.on('error', reject)
      child.on('close', code => resolve(code ?? 1))
    })
  },
}
