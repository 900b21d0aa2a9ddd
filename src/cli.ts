#!/usr/bin/env node
import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'

import { homeDirFor } from './api/context.js'
import { createLogger } from './core/logger.js'
import { Precheck, createPrecheck } from './core/precheck.js'
import { CommandRunner, shellRunner } from './core/shell.js'
import { loadProfile } from './profile/io.js'
import type { Profile } from './profile/types.js'
import type { Logger, Prompter } from './types.js'
import { clearDefaultProfilePath, getDefaultProfilePath, readGlobalConfig, setDefaultProfilePath } from './cli/config.js'
import { MenuController } from './cli/menu.js'
import { Output, stdoutOutput } from './cli/output.js'
import { clackPrompter } from './cli/prompt.js'

type Argv = string[]

export interface CliDeps {
  env: NodeJS.ProcessEnv
  cwd: string
  /**
   * Effective uid; undefined where the platform has none.
   */
  geteuid: () => number | undefined
  prompter: Prompter
  output: Output
  runner: CommandRunner
  precheck: Precheck
  logger?: Logger
  now: () => Date
  /**
   * Home of the invoking user. Their config and desktop live there, not under root's home.
   */
  homeDirFor: (user: string) => string
}

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

const USER_NAME = /^[a-z_][a-z0-9_-]*\$?$/i

/**
 * The user sudo was invoked by. Per-user effects (group membership, desktop
 * link) would land on the wrong account without it, so a missing or unusable
 * name stops the tool before anything runs.
 */
export function resolveInvokingUser(flag: string | undefined, env: NodeJS.ProcessEnv): string {
  const user = flag ?? env.SUDO_USER
  if (!user) {
    die('Cannot tell which user to set up: SUDO_USER is not set. Run through sudo, or pass --user <name>.')
  }
  if (user === 'root') {
    die('Refusing to set up the root account. Run through sudo from your own account, or pass --user <name>.')
  }
  if (!USER_NAME.test(user)) {
    die(`Not a valid user name: ${user}`)
  }
  return user
}

function printHelp(out: Output): void {
  const msg = `
boardprep

Installs and verifies the board development environment (toolchain, debugger,
editor, shared folder). Must run as root; removes ModemManager, which holds
on to board serial ports.

Usage:
  sudo boardprep [--user <name>] [--profile <path>] [--log-dir <dir>] [--verbose]

  boardprep profile set <path>
  boardprep profile show
  boardprep profile clear
`
  out.write(msg.trimStart())
  out.write('\n')
}

function defaultDeps(): CliDeps {
  return {
    env: process.env,
    cwd: process.cwd(),
    geteuid: () => process.geteuid?.(),
    prompter: clackPrompter,
    output: stdoutOutput,
    runner: shellRunner,
    precheck: createPrecheck(),
    now: () => new Date(),
    homeDirFor,
  }
}

async function profileCommand(args: Argv, deps: CliDeps): Promise<number> {
  // Under sudo the config still belongs to the invoking user, the one the menu reads.
  const sudoUser = deps.env.SUDO_USER
  const opts = {
    env: deps.env,
    homeDir: sudoUser && sudoUser !== 'root' ? deps.homeDirFor(sudoUser) : undefined,
  }
  const sub = args.shift()
  if (sub === 'set') {
    const p = args.shift()
    if (!p) die('profile set requires a path')
    await loadProfileOrDie(path.resolve(deps.cwd, p))
    const abs = await setDefaultProfilePath(path.resolve(deps.cwd, p), opts)
    deps.output.write(abs + '\n')
    return 0
  }
  if (sub === 'show') {
    const p = await getDefaultProfilePath(opts)
    if (!p) die('No default profile set; the bundled profile is used.', 2)
    deps.output.write(p + '\n')
    return 0
  }
  if (sub === 'clear') {
    await clearDefaultProfilePath(opts)
    return 0
  }
  die('Unknown profile subcommand. Expected: set|show|clear')
}

async function loadProfileOrDie(profilePath: string | undefined): Promise<Profile> {
  try {
    return await loadProfile(profilePath)
  } catch (e) {
    die(e instanceof Error ? e.message : String(e))
  }
}

async function runMenu(args: Argv, deps: CliDeps): Promise<number> {
  const userFlag = popFlagValue(args, ['-u', '--user'])
  const profileFlag = popFlagValue(args, ['-p', '--profile'])
  const logDirFlag = popFlagValue(args, ['--log-dir'])
  const verbose = hasFlag(args, ['-v', '--verbose'])
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)

  if (deps.geteuid() !== 0) {
    die('This tool changes system packages and must run as root.\nPlease run with sudo: sudo boardprep')
  }
  const user = resolveInvokingUser(userFlag, deps.env)

  const homeDir = deps.homeDirFor(user)
  const cfg = await readGlobalConfig({ env: deps.env, homeDir })
  const logger: Logger = deps.logger ?? createLogger(verbose ? 'debug' : cfg.logLevel ?? 'silent')
  const profilePath = profileFlag ? path.resolve(deps.cwd, profileFlag) : cfg.profilePath
  const profile = await loadProfileOrDie(profilePath)
  logger.info(`[boardprep] profile "${profile.name}" for user ${user}`)

  const menu = new MenuController({
    ctx: {
      profile,
      user,
      homeDir,
      precheck: deps.precheck,
      prompter: deps.prompter,
      logger,
    },
    prompter: deps.prompter,
    output: deps.output,
    cwd: deps.cwd,
    auditDir: path.resolve(deps.cwd, logDirFlag ?? cfg.auditDir ?? '.'),
    support: cfg.supportContact ?? profile.support,
    runner: deps.runner,
    logger,
    now: deps.now,
  })
  return await menu.run()
}

export async function main(argv: string[] = process.argv.slice(2), overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides }
  try {
    const args = [...argv]
    if (hasFlag(args, ['-h', '--help'])) {
      printHelp(deps.output)
      return 0
    }

    if (args[0] === 'profile') {
      args.shift()
      return await profileCommand(args, deps)
    }

    return await runMenu(args, deps)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  fs.existsSync(process.argv[1]) &&
  fs.realpathSync(path.resolve(process.argv[1])) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
