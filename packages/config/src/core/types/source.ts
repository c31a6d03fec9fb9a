/**
 * Source descriptor types for plush
 *
 * A source describes where a plugin's files come from:
 * - git: a repository at a reference (default branch, branch, tag or revision)
 * - remote: a single downloadable file
 * - local: an existing directory on disk
 */

import { createHash } from 'node:crypto'
import { homedir } from 'node:os'
import { resolve } from 'node:path'

/** Git reference to check out */
export type GitReference =
  | { kind: 'default' }
  | { kind: 'branch'; name: string }
  | { kind: 'tag'; name: string }
  | { kind: 'rev'; sha: string }

export interface GitSource {
  kind: 'git'
  url: string
  reference: GitReference
}

export interface RemoteSource {
  kind: 'remote'
  url: string
}

export interface LocalSource {
  kind: 'local'
  path: string
}

/** Where a plugin's files come from */
export type Source = GitSource | RemoteSource | LocalSource

export type SourceKind = Source['kind']

/** Cache key for a source: 64 hex chars */
export type SourceKey = string & { readonly __brand: 'SourceKey' }

const SOURCE_KEY_PATTERN = /^[0-9a-f]{64}$/

export function isSourceKey(value: string): value is SourceKey {
  return SOURCE_KEY_PATTERN.test(value)
}

export function asSourceKey(value: string): SourceKey {
  if (!isSourceKey(value)) {
    throw new Error(`Invalid source key: "${value}" (must be 64 hex chars)`)
  }
  return value
}

// ============================================================================
// Normalization
// ============================================================================

function normalizeUrl(url: string): string {
  return url.trim().replace(/\/+$/, '')
}

/**
 * Expand a leading `~` and make a path absolute.
 */
export function expandPath(path: string, base: string = process.cwd()): string {
  const trimmed = path.trim()
  if (trimmed === '~') {
    return homedir()
  }
  if (trimmed.startsWith('~/')) {
    return resolve(homedir(), trimmed.slice(2))
  }
  return resolve(base, trimmed)
}

/**
 * Return the canonical form of a source, used for equivalence and hashing.
 */
export function normalizeSource(source: Source): Source {
  switch (source.kind) {
    case 'git':
      return { kind: 'git', url: normalizeUrl(source.url), reference: source.reference }
    case 'remote':
      return { kind: 'remote', url: normalizeUrl(source.url) }
    case 'local':
      return { kind: 'local', path: expandPath(source.path) }
  }
}

/** Whether a git reference can move between fetches */
export function isMovableReference(reference: GitReference): boolean {
  return reference.kind === 'default' || reference.kind === 'branch'
}

export function formatReference(reference: GitReference): string {
  switch (reference.kind) {
    case 'default':
      return 'HEAD'
    case 'branch':
      return `branch:${reference.name}`
    case 'tag':
      return `tag:${reference.name}`
    case 'rev':
      return `rev:${reference.sha}`
  }
}

/**
 * Format a source for display.
 */
export function formatSource(source: Source): string {
  switch (source.kind) {
    case 'git':
      return source.reference.kind === 'default'
        ? source.url
        : `${source.url}@${formatReference(source.reference)}`
    case 'remote':
      return source.url
    case 'local':
      return source.path
  }
}

/**
 * Compute the cache key of a source.
 *
 * Formula:
 * sha256("source-v1\0" + kind + "\0" + fields joined by "\0" + "\n")
 */
export function computeSourceKey(source: Source): SourceKey {
  const normalized = normalizeSource(source)
  const hash = createHash('sha256')
  hash.update(`source-v1\0${normalized.kind}\0${sourceFields(normalized).join('\0')}\n`)
  return asSourceKey(hash.digest('hex'))
}

function sourceFields(source: Source): string[] {
  switch (source.kind) {
    case 'git':
      return [source.url, formatReference(source.reference)]
    case 'remote':
      return [source.url]
    case 'local':
      return [source.path]
  }
}

/** Whether two sources dedupe to the same cache entry */
export function sourcesEquivalent(a: Source, b: Source): boolean {
  return computeSourceKey(a) === computeSourceKey(b)
}
