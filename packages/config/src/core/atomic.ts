/**
 * Atomic file and directory writes.
 *
 * Lock files and downloads are written to a temporary sibling and then
 * renamed into place, so readers never observe a partial file. Clones
 * use the same approach for directories.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Options for atomic write operations */
export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number
  /** Temporary file suffix (default: .tmp) */
  tmpSuffix?: string
  /** Whether to fsync before rename (default: true for durability) */
  fsync?: boolean
}

/** Marker shared by every temporary path this module creates */
export const TMP_MARKER = '.tmp'

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o644,
  tmpSuffix: TMP_MARKER,
  fsync: true,
}

/**
 * Generate a unique temporary file path
 */
function getTmpPath(targetPath: string, suffix: string): string {
  const dir = path.dirname(targetPath)
  const base = path.basename(targetPath)
  const rand = crypto.randomBytes(6).toString('hex')
  return path.join(dir, `.${base}.${rand}${suffix}`)
}

/**
 * Write content to a file atomically
 *
 * Writes to a temporary file first, then renames to the target path.
 * This ensures the target file is never in a partial/corrupted state.
 *
 * @param filePath - Target file path
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 */
export async function atomicWrite(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options }

  // Ensure parent directory exists
  const dir = path.dirname(filePath)
  await fs.promises.mkdir(dir, { recursive: true })

  // Generate temp path
  const tmpPath = getTmpPath(filePath, opts.tmpSuffix)

  try {
    // Write to temp file
    await fs.promises.writeFile(tmpPath, content, { mode: opts.mode })

    // Flush to disk if requested (open and sync)
    if (opts.fsync) {
      const fd = await fs.promises.open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }

    // Atomically rename temp to target
    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    // Clean up temp file on error
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}

// ============================================================================
// Atomic directory operations
// ============================================================================

/**
 * Atomically create a directory by creating in temp location and renaming
 *
 * @param targetDir - Target directory path
 * @param createFn - Function to populate the directory
 */
export async function atomicDir<T>(
  targetDir: string,
  createFn: (tmpDir: string) => Promise<T>
): Promise<T> {
  const parent = path.dirname(targetDir)
  const base = path.basename(targetDir)
  const rand = crypto.randomBytes(6).toString('hex')
  const tmpDir = path.join(parent, `.${base}.${rand}${TMP_MARKER}`)

  // Ensure parent exists
  await fs.promises.mkdir(parent, { recursive: true })

  // Create temp directory
  await fs.promises.mkdir(tmpDir, { recursive: true })

  try {
    // Populate the directory
    const result = await createFn(tmpDir)

    // Remove target if it exists (for overwrite)
    await fs.promises.rm(targetDir, { recursive: true, force: true })

    // Atomically rename temp to target
    await fs.promises.rename(tmpDir, targetDir)

    return result
  } catch (err) {
    // Clean up temp directory on error
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
    throw err
  }
}
