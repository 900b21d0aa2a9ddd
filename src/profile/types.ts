export type ProfileVersion = 1

export interface ToolchainLink {
  /**
   * Existing binary the link points at.
   */
  source: string
  /**
   * Name the toolchain expects, created as a symlink when absent.
   */
  target: string
}

export interface RequiredTool {
  command: string
  /**
   * Shell command run when `command` does not resolve on the search path.
   */
  reinstall: string
}

export interface PackageSettings {
  commands: string[]
  /**
   * Supplementary groups the invoking user is added to.
   */
  groups: string[]
}

export interface EditorSettings {
  legacyPreferenceFile?: string
  commands: string[]
}

export interface ShareSettings {
  mountRoot: string
  mountTable: string
  mountLine: string
  /**
   * Relative to the invoking user's home directory.
   */
  desktopDir: string
}

export interface VerifySettings {
  links: ToolchainLink[]
  tools: RequiredTool[]
}

/**
 * Everything a workflow installs for one board.
 */
export interface Profile {
  version: ProfileVersion
  name: string
  support: string
  packages: PackageSettings
  editor: EditorSettings
  share: ShareSettings
  verify: VerifySettings
}

type Obj = Record<string, unknown>

function isObj(v: unknown): v is Obj {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function section(raw: Obj, key: string): Obj {
  const v = raw[key]
  if (!isObj(v)) throw new Error(`Invalid profile: "${key}" must be an object`)
  return v
}

function str(obj: Obj, key: string, where: string): string {
  const v = obj[key]
  if (typeof v !== 'string' || !v.trim()) {
    throw new Error(`Invalid profile: "${where}.${key}" must be a non-empty string`)
  }
  return v
}

function strList(obj: Obj, key: string, where: string): string[] {
  const v = obj[key]
  if (!Array.isArray(v) || v.some(s => typeof s !== 'string' || !s.trim())) {
    throw new Error(`Invalid profile: "${where}.${key}" must be an array of non-empty strings`)
  }
  return v.map(String)
}

function objList(obj: Obj, key: string, where: string): Obj[] {
  const v = obj[key]
  if (!Array.isArray(v) || !v.every(isObj)) {
    throw new Error(`Invalid profile: "${where}.${key}" must be an array of objects`)
  }
  return v
}

export function normalizeProfile(raw: unknown): Profile {
  if (!isObj(raw)) throw new Error('Invalid profile: expected a JSON object')
  if (raw.version !== 1) {
    throw new Error(`Unsupported profile version: ${String(raw.version)} (expected 1)`)
  }

  const packages = section(raw, 'packages')
  const editor = section(raw, 'editor')
  const share = section(raw, 'share')
  const verify = section(raw, 'verify')

  const legacy = editor.legacyPreferenceFile
  if (legacy !== undefined && (typeof legacy !== 'string' || !legacy.trim())) {
    throw new Error('Invalid profile: "editor.legacyPreferenceFile" must be a non-empty string when set')
  }

  return {
    version: 1,
    name: str(raw, 'name', 'profile'),
    support: str(raw, 'support', 'profile'),
    packages: {
      commands: strList(packages, 'commands', 'packages'),
      groups: strList(packages, 'groups', 'packages'),
    },
    editor: {
      ...(legacy !== undefined ? { legacyPreferenceFile: legacy } : {}),
      commands: strList(editor, 'commands', 'editor'),
    },
    share: {
      mountRoot: str(share, 'mountRoot', 'share'),
      mountTable: str(share, 'mountTable', 'share'),
      mountLine: str(share, 'mountLine', 'share'),
      desktopDir: str(share, 'desktopDir', 'share'),
    },
    verify: {
      links: objList(verify, 'links', 'verify').map((l, i) => ({
        source: str(l, 'source', `verify.links[${i}]`),
        target: str(l, 'target', `verify.links[${i}]`),
      })),
      tools: objList(verify, 'tools', 'verify').map((t, i) => ({
        command: str(t, 'command', `verify.tools[${i}]`),
        reinstall: str(t, 'reinstall', `verify.tools[${i}]`),
      })),
    },
  }
}
