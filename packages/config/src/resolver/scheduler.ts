/**
 * Concurrent plugin resolution.
 *
 * Plugins are resolved by a bounded pool of workers. Each task writes
 * only its own slot, so results come back in declaration order no
 * matter which task finishes first, and a failing plugin never cancels
 * its siblings.
 */

import { availableParallelism } from 'node:os'

import { errorCode, errorMessage } from '../core/errors.js'
import type { Plugin } from '../core/types/config.js'
import type { PluginFailure, ResolvedPlugin } from '../core/types/lock.js'
import { FetchCache, type ResolvedSource } from '../store/fetch-cache.js'
import { type RenderContext, renderExternal, renderInline } from './render.js'
import { type SourceResolveOptions, resolveSource } from './source.js'

/**
 * Outcome of a settled task.
 */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown }

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * @returns One settled outcome per item, at the item's index
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next
      next += 1
      const item = items[index]
      if (item === undefined) continue
      try {
        results[index] = { ok: true, value: await task(item, index) }
      } catch (error) {
        results[index] = { ok: false, error }
      }
    }
  }

  const limit = Number.isNaN(concurrency) ? 1 : Math.floor(concurrency)
  const workers = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return results
}

/** Progress notifications emitted while resolving */
export interface ResolveProgress {
  /** A source finished resolving (emitted once per distinct source) */
  onSource?: ((resolved: ResolvedSource) => void) | undefined
  /** A plugin resolved and rendered */
  onPlugin?: ((plugin: ResolvedPlugin) => void) | undefined
  /** A plugin failed */
  onFailure?: ((failure: PluginFailure) => void) | undefined
}

/**
 * Options for resolving a plugin list.
 */
export interface ResolvePluginsOptions extends SourceResolveOptions, ResolveProgress {
  render: RenderContext
  /** Maximum parallel tasks (default, and fallback for non-finite or < 1: available parallelism) */
  concurrency?: number | undefined
  /** Shared fetch cache (default: a fresh one for this run) */
  cache?: FetchCache | undefined
}

/** Resolved plugins and failures, both in declaration order */
export interface ResolveResult {
  plugins: ResolvedPlugin[]
  errors: PluginFailure[]
}

/**
 * Resolve and render every plugin.
 */
export async function resolvePlugins(
  plugins: readonly Plugin[],
  options: ResolvePluginsOptions
): Promise<ResolveResult> {
  const cache = options.cache ?? new FetchCache()
  const concurrency =
    options.concurrency !== undefined && Number.isFinite(options.concurrency) && options.concurrency >= 1
      ? options.concurrency
      : availableParallelism()

  const fetch = async (source: ResolvedSource['source'], key: ResolvedSource['key']) => {
    const resolved = await resolveSource(source, key, options)
    options.onSource?.(resolved)
    return resolved
  }

  const settled = await mapConcurrent(plugins, concurrency, async (plugin) => {
    if (plugin.kind === 'inline') {
      return renderInline(plugin)
    }
    const resolved = await cache.acquire(plugin.source, fetch)
    return renderExternal(plugin, plugin.source, resolved.location, options.render)
  })

  const result: ResolveResult = { plugins: [], errors: [] }
  settled.forEach((outcome, index) => {
    const plugin = plugins[index]
    if (plugin === undefined) return
    if (outcome.ok) {
      result.plugins.push(outcome.value)
      options.onPlugin?.(outcome.value)
    } else {
      const failure: PluginFailure = {
        plugin: plugin.name,
        code: errorCode(outcome.error),
        message: errorMessage(outcome.error),
      }
      result.errors.push(failure)
      options.onFailure?.(failure)
    }
  })
  return result
}
