/**
 * Locked config: build, verify, script and (de)serialization.
 *
 * A locked config is the frozen result of one resolution run. It is
 * reused without touching the network as long as its fingerprint still
 * matches the live config and every resolved location still exists.
 */

import { readFile, stat } from 'node:fs/promises'

import { atomicWrite } from '../core/atomic.js'
import { LockArtifactError, errorMessage, isErrnoException } from '../core/errors.js'
import { computeFingerprint } from '../core/fingerprint.js'
import { validateLockFile } from '../core/schemas/index.js'
import type { Config } from '../core/types/config.js'
import type { LockedConfig } from '../core/types/lock.js'
import type { ResolveResult } from '../resolver/scheduler.js'

/** Metadata recorded alongside the resolved plugins */
export interface LockContext {
  dataDir: string
  configFile: string
  /** Generation time (default: now) */
  now?: Date | undefined
}

/**
 * Build a locked config from a resolution result.
 */
export function buildLockedConfig(config: Config, result: ResolveResult, ctx: LockContext): LockedConfig {
  return {
    version: 1,
    fingerprint: computeFingerprint(config),
    generatedAt: (ctx.now ?? new Date()).toISOString(),
    dataDir: ctx.dataDir,
    configFile: ctx.configFile,
    plugins: result.plugins,
    errors: result.errors,
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Check that a locked config can be reused for a live config.
 *
 * @returns true iff the fingerprint matches and every resolved location exists
 */
export async function verifyLockedConfig(locked: LockedConfig, config: Config): Promise<boolean> {
  if (locked.fingerprint !== computeFingerprint(config)) {
    return false
  }
  for (const plugin of locked.plugins) {
    if (plugin.kind === 'external' && !(await exists(plugin.location))) {
      return false
    }
  }
  return true
}

/**
 * Concatenate every plugin's fragments, in order, one per line.
 */
export function renderScript(locked: LockedConfig): string {
  let script = ''
  for (const plugin of locked.plugins) {
    for (const fragment of plugin.fragments) {
      if (fragment.length > 0) {
        script += `${fragment}\n`
      }
    }
  }
  return script
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Serialize a locked config to JSON (pretty-printed)
 */
export function serializeLockedConfig(locked: LockedConfig): string {
  return `${JSON.stringify(locked, null, 2)}\n`
}

/**
 * Parse and validate a serialized locked config.
 *
 * @throws LockArtifactError if the content is not valid JSON or fails validation
 */
export function parseLockedConfig(content: string, lockPath: string): LockedConfig {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new LockArtifactError(`Failed to parse JSON: ${errorMessage(err)}`, lockPath, { cause: err })
  }

  const result = validateLockFile(parsed)
  if (!result.valid) {
    const details = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
    throw new LockArtifactError(`Schema validation failed: ${details}`, lockPath)
  }
  return result.data
}

/**
 * Load a locked config from disk.
 *
 * @returns The locked config, or null if no file exists
 * @throws LockArtifactError if the file cannot be read or is corrupt
 */
export async function loadLockedConfig(lockPath: string): Promise<LockedConfig | null> {
  let content: string
  try {
    content = await readFile(lockPath, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return null
    }
    throw new LockArtifactError(`Failed to read file: ${errorMessage(err)}`, lockPath, { cause: err })
  }
  return parseLockedConfig(content, lockPath)
}

/**
 * Read a locked config, treating a corrupt artifact as absent.
 *
 * @param onError - Called with the recovered error when the artifact is unusable
 * @returns The locked config, or null if it is absent or unusable
 */
export async function readLockedConfig(
  lockPath: string,
  onError?: (error: LockArtifactError) => void
): Promise<LockedConfig | null> {
  try {
    return await loadLockedConfig(lockPath)
  } catch (err) {
    if (err instanceof LockArtifactError) {
      onError?.(err)
      return null
    }
    throw err
  }
}

/**
 * Write a locked config atomically.
 */
export async function writeLockedConfig(lockPath: string, locked: LockedConfig): Promise<void> {
  await atomicWrite(lockPath, serializeLockedConfig(locked))
}
