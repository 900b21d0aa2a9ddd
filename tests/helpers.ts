import type { BuildContext } from '../src/api/context.js'
import type { Output } from '../src/cli/output.js'
import type { FS } from '../src/core/fs.js'
import type { Precheck } from '../src/core/precheck.js'
import { createPrecheck } from '../src/core/precheck.js'
import type { CommandRunner } from '../src/core/shell.js'
import type { Profile } from '../src/profile/types.js'
import type { Prompter } from '../src/types.js'

export const stripAnsi = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '')

export interface ScriptedPrompter extends Prompter {
  asked: string[]
  errors: string[]
}

/**
 * Answers in order; once the script runs out every prompt reads as cancelled.
 */
export function scriptedPrompter(answers: string[]): ScriptedPrompter {
  const queue = [...answers]
  const asked: string[] = []
  const errors: string[] = []
  return {
    asked,
    errors,
    async ask(message) {
      asked.push(message)
      return queue.shift()
    },
    error(message) {
      errors.push(message)
    },
  }
}

export interface MemoryOutput extends Output {
  text(): string
}

export function memoryOutput(): MemoryOutput {
  let buf = ''
  return {
    write: t => {
      buf += t
    },
    text: () => stripAnsi(buf),
  }
}

export interface RecordingRunner extends CommandRunner {
  commands: string[]
}

/**
 * Exit status 0 for every command except those listed in `failures`.
 */
export function recordingRunner(failures: Record<string, number> = {}): RecordingRunner {
  const commands: string[] = []
  return {
    commands,
    async run(command) {
      commands.push(command)
      return failures[command] ?? 0
    },
  }
}

export interface MemoryFSState {
  files?: Record<string, string>
  dirs?: string[]
  /**
   * link path -> what it points at
   */
  links?: Record<string, string>
  executables?: string[]
}

/**
 * In-memory FS. A link counts as existing only if what it points at exists.
 */
export function memoryFS(state: MemoryFSState = {}): FS {
  const files = state.files ?? {}
  const dirs = new Set(state.dirs ?? [])
  const links = state.links ?? {}
  const executables = new Set(state.executables ?? [])
  const strip = (p: string) => (p.length > 1 && p.endsWith('/') ? p.slice(0, -1) : p)

  const exists = (raw: string): boolean => {
    const p = strip(raw)
    if (p in links) return exists(links[p])
    return p in files || dirs.has(p) || executables.has(p)
  }

  return {
    async pathExists(p) {
      return exists(p)
    },
    async lstat(raw) {
      const p = strip(raw)
      if (!(p in links) && !exists(p)) throw new Error(`ENOENT: ${p}`)
      return {
        isSymbolicLink: () => p in links,
      }
    },
    async readFile(raw) {
      const p = strip(raw)
      if (!(p in files)) throw new Error(`ENOENT: ${p}`)
      return files[p]
    },
    async isExecutable(p) {
      return executables.has(strip(p))
    },
  }
}

export function memoryPrecheck(state: MemoryFSState = {}, searchPath = '/usr/bin:/bin'): Precheck {
  return createPrecheck({ fs: memoryFS(state), searchPath })
}

export function testProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    version: 1,
    name: 'test board',
    support: 'test-support@example.com',
    packages: {
      commands: ['apt-get update', 'apt-get install -y gcc-arm-none-eabi'],
      groups: ['dialout', 'plugdev'],
    },
    editor: {
      legacyPreferenceFile: '/etc/apt/preferences.d/nosnap.pref',
      commands: ['apt-get install -y snapd', 'snap install code --classic'],
    },
    share: {
      mountRoot: '/mnt/hgfs/',
      mountTable: '/etc/fstab',
      mountLine: '.host:/ /mnt/hgfs fuse.vmhgfs-fuse defaults,allow_other 0 0',
      desktopDir: 'Desktop',
    },
    verify: {
      links: [{ source: '/usr/bin/gdb-multiarch', target: '/usr/bin/arm-none-eabi-gdb' }],
      tools: [{ command: 'openocd', reinstall: 'apt-get install -y --reinstall openocd' }],
    },
    ...overrides,
  }
}

export function testContext(opts: { precheck: Precheck; prompter?: Prompter; profile?: Profile; homeDir?: string }): BuildContext {
  return {
    profile: opts.profile ?? testProfile(),
    user: 'dev',
    homeDir: opts.homeDir ?? '/home/dev',
    precheck: opts.precheck,
    prompter: opts.prompter ?? scriptedPrompter([]),
  }
}
