/**
 * Cross-process mutex for plush
 *
 * Uses proper-lockfile so that two plush processes never mutate the
 * same config and data directories at once. Locks held by a process
 * that died are released on exit or reclaimed once stale.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'

import { MutexError, MutexTimeoutError, errorMessage, isErrnoException } from './errors.js'

/** Lock options */
export interface LockOptions {
  /** Give up after this many milliseconds (default: wait indefinitely) */
  timeout?: number | undefined
  /** Stale lock threshold in milliseconds (default: 10000) */
  stale?: number | undefined
}

const DEFAULT_STALE = 10000
const RETRY_INTERVAL = 100

/** Lock release function */
export type ReleaseFn = () => Promise<void>

/** Lock handle returned by lock acquisition */
export interface LockHandle {
  /** Release the lock */
  release: ReleaseFn
  /** Path that is locked */
  path: string
}

/** Lock file name inside the config directory */
export const MUTEX_FILENAME = '.plush.lock'

/**
 * Get the mutex file path for a config directory
 */
export function getMutexPath(configDir: string): string {
  return path.join(configDir, MUTEX_FILENAME)
}

/**
 * Ensure a file exists (create empty if needed) for locking
 */
async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  try {
    await fs.promises.access(lockPath)
  } catch {
    // File doesn't exist, create it
    await fs.promises.writeFile(lockPath, '')
  }
}

/**
 * Acquire an exclusive lock on a file, waiting while another process holds it
 *
 * @param lockPath - Path to lock (will create if needed)
 * @param options - Lock options
 * @returns Lock handle with release function
 * @throws MutexTimeoutError if a timeout was given and expired
 * @throws MutexError for other lock failures (e.g. permission denied)
 */
export async function acquireLock(
  lockPath: string,
  options: LockOptions = {}
): Promise<LockHandle> {
  const stale = options.stale ?? DEFAULT_STALE

  try {
    await ensureLockFile(lockPath)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MutexError(`Failed to open lock file: ${message}`, lockPath)
  }

  const retries =
    options.timeout === undefined
      ? { forever: true, minTimeout: RETRY_INTERVAL, maxTimeout: RETRY_INTERVAL * 5 }
      : {
          retries: Math.max(0, Math.ceil(options.timeout / RETRY_INTERVAL)),
          minTimeout: RETRY_INTERVAL,
          maxTimeout: RETRY_INTERVAL,
          factor: 1,
        }

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(lockPath, { stale, retries })
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ELOCKED' && options.timeout !== undefined) {
      throw new MutexTimeoutError(lockPath, options.timeout)
    }
    throw new MutexError(errorMessage(err), lockPath)
  }

  let released = false
  return {
    release: async () => {
      if (released) return
      released = true
      try {
        await release()
      } catch (err) {
        // Releasing a compromised or already released lock is not an error
        if (
          err instanceof Error &&
          !err.message.includes('not acquired') &&
          !err.message.includes('already released')
        ) {
          throw new MutexError(`Failed to release lock: ${err.message}`, lockPath)
        }
      }
    },
    path: lockPath,
  }
}

/**
 * Execute a function with a lock held, releasing it on every exit path
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const handle = await acquireLock(lockPath, options)
  try {
    return await fn()
  } finally {
    await handle.release()
  }
}
