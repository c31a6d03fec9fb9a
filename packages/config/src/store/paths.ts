/**
 * Path management for plush storage.
 *
 * Config and data live in two directories:
 *
 * ~/.config/plush/          # PLUSH_CONFIG_DIR
 * ├── plugins.toml          # Config file (PLUSH_CONFIG_FILE)
 * └── .plush.lock           # Cross-process mutex
 *
 * ~/.local/share/plush/     # PLUSH_DATA_DIR
 * ├── repos/<key>/          # Git clones, keyed by source key
 * ├── downloads/<key>/<f>   # Remote files, keyed by source key
 * └── plugins.lock.json     # Locked config
 */

import { mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, posix } from 'node:path'

import { CONFIG_FILENAME } from '../core/config/plugins-toml.js'
import { getMutexPath } from '../core/locks.js'
import { type SourceKey, expandPath } from '../core/types/source.js'

/** Lock file name inside the data directory */
export const LOCK_FILENAME = 'plugins.lock.json'

/** Fallback file name for downloads whose URL has no usable basename */
const DEFAULT_DOWNLOAD_NAME = 'plugin'

function envPath(name: string): string | undefined {
  const value = process.env[name]
  return value === undefined || value === '' ? undefined : expandPath(value)
}

/**
 * Get the config directory.
 * Uses PLUSH_CONFIG_DIR, then $XDG_CONFIG_HOME/plush, then ~/.config/plush
 */
export function getConfigDir(): string {
  return (
    envPath('PLUSH_CONFIG_DIR') ??
    join(envPath('XDG_CONFIG_HOME') ?? join(homedir(), '.config'), 'plush')
  )
}

/**
 * Get the data directory.
 * Uses PLUSH_DATA_DIR, then $XDG_DATA_HOME/plush, then ~/.local/share/plush
 */
export function getDataDir(): string {
  return (
    envPath('PLUSH_DATA_DIR') ??
    join(envPath('XDG_DATA_HOME') ?? join(homedir(), '.local', 'share'), 'plush')
  )
}

/**
 * Get the config file path.
 * Uses PLUSH_CONFIG_FILE, otherwise plugins.toml in the config directory.
 */
export function getConfigFile(configDir: string = getConfigDir()): string {
  return envPath('PLUSH_CONFIG_FILE') ?? join(configDir, CONFIG_FILENAME)
}

/**
 * Get the active profile from PLUSH_PROFILE, if any.
 */
export function getProfile(): string | undefined {
  const value = process.env['PLUSH_PROFILE']
  return value === undefined || value === '' ? undefined : value
}

/**
 * File name a remote URL is stored under.
 */
export function downloadFileName(url: string): string {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    pathname = url
  }
  const base = pathname.split('/').filter((segment) => segment.length > 0).pop()
  if (base === undefined) {
    return DEFAULT_DOWNLOAD_NAME
  }

  let decoded: string
  try {
    decoded = decodeURIComponent(base)
  } catch {
    decoded = base
  }

  // Decoded separators must not leave downloads/<key>/
  const name = posix.basename(decoded.replaceAll('\\', '/'))
  return name === '' || name === '.' || name === '..' ? DEFAULT_DOWNLOAD_NAME : name
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true })
}

/**
 * Options for path resolution.
 */
export interface PathOptions {
  /** Override the config directory */
  configDir?: string | undefined
  /** Override the data directory */
  dataDir?: string | undefined
  /** Override the config file */
  configFile?: string | undefined
}

/**
 * Path resolver for one config and data directory pair.
 */
export class PathResolver {
  readonly configDir: string
  readonly dataDir: string
  readonly configFile: string

  constructor(options: PathOptions = {}) {
    this.configDir = options.configDir ?? getConfigDir()
    this.dataDir = options.dataDir ?? getDataDir()
    this.configFile = options.configFile ?? getConfigFile(this.configDir)
  }

  get repos(): string {
    return join(this.dataDir, 'repos')
  }

  get downloads(): string {
    return join(this.dataDir, 'downloads')
  }

  get lockFile(): string {
    return join(this.dataDir, LOCK_FILENAME)
  }

  get mutex(): string {
    return getMutexPath(this.configDir)
  }

  /** Clone directory for a git source */
  repo(key: SourceKey): string {
    return join(this.repos, key)
  }

  /** Download path for a remote source */
  download(key: SourceKey, url: string): string {
    return join(this.downloads, key, downloadFileName(url))
  }

  async ensureAll(): Promise<void> {
    await Promise.all([ensureDir(this.configDir), ensureDir(this.repos), ensureDir(this.downloads)])
  }
}
