/**
 * Per-run deduplication of source fetches.
 *
 * Each source key maps to a single promise. The first caller for a key
 * runs the fetch; concurrent and later callers in the same run await the
 * same promise, so equivalent sources are fetched exactly once. Distinct
 * keys never wait on each other.
 */

import { type Source, type SourceKey, computeSourceKey } from '../core/types/source.js'

/** What resolving a source did on disk */
export type SourceStatus = 'cloned' | 'updated' | 'unchanged' | 'downloaded' | 'cached' | 'local'

/** A source materialized on disk */
export interface ResolvedSource {
  key: SourceKey
  source: Source
  /** Directory (git, local) or file (remote) */
  location: string
  status: SourceStatus
}

/** Fetches one source, given its cache key */
export type FetchFn = (source: Source, key: SourceKey) => Promise<ResolvedSource>

export class FetchCache {
  private readonly entries = new Map<SourceKey, Promise<ResolvedSource>>()

  /**
   * Resolve a source, running `fetch` only for the first request of its key.
   *
   * A failed fetch stays cached for the rest of the run, so every plugin
   * sharing the source sees the same error.
   */
  acquire(source: Source, fetch: FetchFn): Promise<ResolvedSource> {
    const key = computeSourceKey(source)
    const existing = this.entries.get(key)
    if (existing) {
      return existing
    }

    const pending = fetch(source, key)
    this.entries.set(key, pending)
    return pending
  }
}
