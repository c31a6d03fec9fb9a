/**
 * Cache cleaning.
 *
 * Before each resolution run, entries under repos/ and downloads/ whose
 * key no configured source uses are deleted, together with temporary
 * directories and files left behind by an interrupted run.
 */

import { readdir, rm } from 'node:fs/promises'
import { join } from 'node:path'

import { TMP_MARKER } from '../core/atomic.js'
import type { Config } from '../core/types/config.js'
import { type SourceKey, computeSourceKey, isSourceKey } from '../core/types/source.js'
import type { PathResolver } from './paths.js'

/** Cache keys of every git and remote source in a config */
export function computeReachableKeys(config: Config): Set<SourceKey> {
  const reachable = new Set<SourceKey>()
  for (const plugin of config.plugins) {
    if (plugin.kind === 'external' && plugin.source.kind !== 'local') {
      reachable.add(computeSourceKey(plugin.source))
    }
  }
  return reachable
}

function isTemporary(name: string): boolean {
  return name.startsWith('.') && name.endsWith(TMP_MARKER)
}

async function listEntries(dir: string): Promise<string[]> {
  try {
    return await readdir(dir)
  } catch {
    // Directory doesn't exist yet
    return []
  }
}

/**
 * Remove unreferenced cache entries.
 *
 * @returns Paths that were removed
 */
export async function cleanCache(paths: PathResolver, config: Config): Promise<string[]> {
  const reachable = computeReachableKeys(config)
  const removed: string[] = []

  for (const dir of [paths.repos, paths.downloads]) {
    for (const name of await listEntries(dir)) {
      const keep = isSourceKey(name) && reachable.has(name)
      if (!keep) {
        const path = join(dir, name)
        await rm(path, { recursive: true, force: true })
        removed.push(path)
      }
    }
  }

  // Leftover downloads written to a temporary sibling inside a kept entry
  for (const key of await listEntries(paths.downloads)) {
    const entry = join(paths.downloads, key)
    for (const name of await listEntries(entry)) {
      if (isTemporary(name)) {
        const path = join(entry, name)
        await rm(path, { recursive: true, force: true })
        removed.push(path)
      }
    }
  }

  return removed.sort()
}
