/**
 * Lock file types for plush
 *
 * The lock file (plugins.lock.json) records the outcome of one
 * resolution run: where every plugin lives on disk, which files were
 * matched, and the rendered script fragments. Its fingerprint ties it
 * to the exact config that produced it.
 */

import type { Source } from './source.js'

/** Config fingerprint in format `sha256:<64-hex-chars>` */
export type Fingerprint = `sha256:${string}`

const FINGERPRINT_PATTERN = /^sha256:[0-9a-f]{64}$/

export function isFingerprint(value: string): value is Fingerprint {
  return FINGERPRINT_PATTERN.test(value)
}

export function asFingerprint(value: string): Fingerprint {
  if (!isFingerprint(value)) {
    throw new Error(`Invalid fingerprint: "${value}"`)
  }
  return value
}

/** A resolved plugin backed by a source */
export interface ResolvedExternalPlugin {
  kind: 'external'
  name: string
  source: Source
  /** Directory (git, local) or file (remote) the source resolved to */
  location: string
  /** Matched files, sorted */
  files: string[]
  /** Rendered script fragments, in order */
  fragments: string[]
}

/** A resolved inline plugin */
export interface ResolvedInlinePlugin {
  kind: 'inline'
  name: string
  fragments: string[]
}

export type ResolvedPlugin = ResolvedExternalPlugin | ResolvedInlinePlugin

/** A plugin that failed to resolve or render */
export interface PluginFailure {
  /** Plugin name */
  plugin: string
  /** Error code (e.g., "GIT_ERROR") */
  code: string
  /** Human-readable message */
  message: string
}

/**
 * Locked config (plugins.lock.json)
 *
 * Built from one resolution run; never mutated afterwards.
 */
export interface LockedConfig {
  /** Lock file format version */
  version: 1
  /** Fingerprint of the config that produced this lock */
  fingerprint: Fingerprint
  /** When this lock was generated */
  generatedAt: string
  /** Data directory used during resolution */
  dataDir: string
  /** Config file the lock was generated from */
  configFile: string
  /** Resolved plugins in declaration order */
  plugins: ResolvedPlugin[]
  /** Failures in declaration order */
  errors: PluginFailure[]
}
