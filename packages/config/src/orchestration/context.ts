/**
 * Operation context and events.
 *
 * Operations never print. They report progress through `onEvent`, which
 * the CLI renders to stderr; stdout stays reserved for the script.
 */

import type { PluginFailure } from '../core/types/lock.js'
import type { Source } from '../core/types/source.js'
import { type GitOperations, systemGit } from '../git/repo.js'
import { type Downloader, fetchDownload } from '../store/download.js'
import type { SourceStatus } from '../store/fetch-cache.js'
import { PathResolver, getProfile } from '../store/paths.js'

/** Events emitted by operations */
export type PlushEvent =
  | { type: 'warning'; message: string; plugin?: string | undefined }
  | { type: 'cache-removed'; path: string }
  | { type: 'source-resolved'; source: Source; status: SourceStatus; location: string }
  | { type: 'plugin-failed'; failure: PluginFailure; fatal: boolean }
  | { type: 'lock-reused'; path: string }
  | { type: 'lock-written'; path: string; plugins: number }
  | { type: 'lock-skipped'; path: string; errors: number }
  | { type: 'config-written'; path: string; action: 'init' | 'add' | 'remove'; detail: string }
  | { type: 'config-unchanged'; path: string }

/**
 * Everything an operation needs.
 */
export interface Context {
  configFile: string
  configDir: string
  dataDir: string
  lockFile: string
  /** Active profile */
  profile?: string | undefined
  /** Remove cached clones and downloads before resolving */
  reinstall: boolean
  /** Ignore the existing lock file */
  relock: boolean
  /** Maximum parallel resolutions */
  concurrency?: number | undefined
  onEvent?: ((event: PlushEvent) => void) | undefined
  /** Git implementation (default: system git) */
  git: GitOperations
  /** Downloader (default: global fetch) */
  download: Downloader
}

/** Overrides accepted by createContext */
export interface ContextOptions {
  configDir?: string | undefined
  dataDir?: string | undefined
  configFile?: string | undefined
  profile?: string | undefined
  reinstall?: boolean | undefined
  relock?: boolean | undefined
  concurrency?: number | undefined
  onEvent?: ((event: PlushEvent) => void) | undefined
  git?: GitOperations | undefined
  download?: Downloader | undefined
}

/**
 * Build a context from explicit options, falling back to the environment.
 */
export function createContext(options: ContextOptions = {}): Context {
  const paths = new PathResolver({
    configDir: options.configDir,
    dataDir: options.dataDir,
    configFile: options.configFile,
  })
  return {
    configFile: paths.configFile,
    configDir: paths.configDir,
    dataDir: paths.dataDir,
    lockFile: paths.lockFile,
    profile: options.profile ?? getProfile(),
    reinstall: options.reinstall ?? false,
    relock: options.relock ?? false,
    concurrency: options.concurrency,
    onEvent: options.onEvent,
    git: options.git ?? systemGit,
    download: options.download ?? fetchDownload,
  }
}

/** Storage paths for a context */
export function contextPaths(ctx: Context): PathResolver {
  return new PathResolver({ configDir: ctx.configDir, dataDir: ctx.dataDir, configFile: ctx.configFile })
}

export function emit(ctx: Context, event: PlushEvent): void {
  ctx.onEvent?.(event)
}
