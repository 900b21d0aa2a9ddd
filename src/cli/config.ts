import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { LogLevel, isLogLevel } from '../core/logger.js'

export interface BoardprepConfig {
  profilePath?: string
  supportContact?: string
  auditDir?: string
  logLevel?: LogLevel
}

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'boardprep', 'config.json')
}

/**
 * Fields of the wrong type are ignored rather than rejected.
 */
export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<BoardprepConfig> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  const json: unknown = await fs.readJson(p)
  if (!json || typeof json !== 'object') return {}

  const raw: Record<string, unknown> = { ...json }
  const cfg: BoardprepConfig = {}
  if (typeof raw.profilePath === 'string') cfg.profilePath = raw.profilePath
  if (typeof raw.supportContact === 'string') cfg.supportContact = raw.supportContact
  if (typeof raw.auditDir === 'string') cfg.auditDir = raw.auditDir
  if (isLogLevel(raw.logLevel)) cfg.logLevel = raw.logLevel
  return cfg
}

export async function writeGlobalConfig(config: BoardprepConfig, opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  await fs.ensureDir(path.dirname(p))
  await fs.writeJson(p, config, { spaces: 2 })
}

export async function setDefaultProfilePath(profilePath: string, opts: ConfigEnv = {}): Promise<string> {
  const abs = path.resolve(profilePath)
  const cfg = await readGlobalConfig(opts)
  await writeGlobalConfig({ ...cfg, profilePath: abs }, opts)
  return abs
}

export async function getDefaultProfilePath(opts: ConfigEnv = {}): Promise<string | undefined> {
  const cfg = await readGlobalConfig(opts)
  return cfg.profilePath
}

/**
 * Drops the profile path; the config file goes away once nothing else is left in it.
 */
export async function clearDefaultProfilePath(opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return
  const { profilePath: _dropped, ...rest } = await readGlobalConfig(opts)
  if (Object.keys(rest).length === 0) {
    await fs.remove(p)
    return
  }
  await writeGlobalConfig(rest, opts)
}
