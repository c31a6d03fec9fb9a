/**
 * Source resolution.
 *
 * One strategy per source kind, matched exhaustively:
 * - git: clone when absent, otherwise update movable references and
 *   leave pinned ones that already match untouched
 * - remote: download once, presence means fresh
 * - local: check the path is readable, never write
 */

import { constants } from 'node:fs'
import { access, rm, stat } from 'node:fs/promises'

import { atomicDir, atomicWrite } from '../core/atomic.js'
import { GitError, NetworkError, NotFoundError, errorMessage, isPlushError } from '../core/errors.js'
import type { GitSource, LocalSource, RemoteSource, Source, SourceKey } from '../core/types/source.js'
import type { GitOperations } from '../git/repo.js'
import type { Downloader } from '../store/download.js'
import type { ResolvedSource, SourceStatus } from '../store/fetch-cache.js'
import type { PathResolver } from '../store/paths.js'

/**
 * Options for source resolution.
 */
export interface SourceResolveOptions {
  /** Storage locations */
  paths: PathResolver
  /** Git implementation */
  git: GitOperations
  /** Remote file downloader */
  download: Downloader
  /** Remove cached clones and downloads before resolving */
  reinstall?: boolean | undefined
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
 * Materialize a source on disk.
 *
 * @throws GitError, NetworkError or NotFoundError
 */
export async function resolveSource(
  source: Source,
  key: SourceKey,
  options: SourceResolveOptions
): Promise<ResolvedSource> {
  switch (source.kind) {
    case 'git':
      return resolveGit(source, key, options)
    case 'remote':
      return resolveRemote(source, key, options)
    case 'local':
      return resolveLocal(source, key)
  }
}

// ============================================================================
// Git
// ============================================================================

async function resolveGit(
  source: GitSource,
  key: SourceKey,
  options: SourceResolveOptions
): Promise<ResolvedSource> {
  const dir = options.paths.repo(key)

  if (options.reinstall) {
    await rm(dir, { recursive: true, force: true })
  }

  let status: SourceStatus
  if (await exists(dir)) {
    status = await updateClone(source, dir, options.git)
  } else {
    await atomicDir(dir, (tmpDir) => cloneAt(source, tmpDir, options.git))
    status = 'cloned'
  }

  return { key, source, location: dir, status }
}

async function cloneAt(source: GitSource, dir: string, git: GitOperations): Promise<void> {
  const { reference } = source
  switch (reference.kind) {
    case 'default':
      await git.clone(source.url, dir)
      return
    case 'branch':
    case 'tag':
      await git.clone(source.url, dir, { branch: reference.name })
      return
    case 'rev':
      await git.clone(source.url, dir)
      await checkoutRev(dir, reference.sha, git)
      return
  }
}

async function updateClone(source: GitSource, dir: string, git: GitOperations): Promise<SourceStatus> {
  if (!(await git.isClean(dir))) {
    throw new GitError(`git -C ${dir} status`, 1, 'local checkout has uncommitted changes')
  }

  const before = await git.head(dir)
  const { reference } = source

  switch (reference.kind) {
    case 'default':
    case 'branch':
      await git.fetch(dir, reference.kind === 'branch' ? reference.name : undefined)
      await git.mergeFastForward(dir, 'FETCH_HEAD')
      break
    case 'tag': {
      const ref = `refs/tags/${reference.name}`
      const commit = await git.resolveCommit(dir, ref)
      if (commit === before) return 'unchanged'
      if (commit === null) {
        await git.fetch(dir, `+${ref}:${ref}`)
      }
      await git.checkoutDetached(dir, ref)
      break
    }
    case 'rev':
      if (before.startsWith(reference.sha)) return 'unchanged'
      await checkoutRev(dir, reference.sha, git)
      break
  }

  return (await git.head(dir)) === before ? 'unchanged' : 'updated'
}

async function checkoutRev(dir: string, sha: string, git: GitOperations): Promise<void> {
  if ((await git.resolveCommit(dir, sha)) === null) {
    await git.fetch(dir, sha)
  }
  await git.checkoutDetached(dir, sha)
}

// ============================================================================
// Remote
// ============================================================================

async function resolveRemote(
  source: RemoteSource,
  key: SourceKey,
  options: SourceResolveOptions
): Promise<ResolvedSource> {
  const file = options.paths.download(key, source.url)

  if (options.reinstall) {
    await rm(file, { force: true })
  } else if (await exists(file)) {
    return { key, source, location: file, status: 'cached' }
  }

  let body: Uint8Array
  try {
    body = await options.download(source.url)
  } catch (err) {
    if (isPlushError(err)) throw err
    throw new NetworkError(source.url, errorMessage(err), { cause: err })
  }

  await atomicWrite(file, Buffer.from(body))
  return { key, source, location: file, status: 'downloaded' }
}

// ============================================================================
// Local
// ============================================================================

async function resolveLocal(source: LocalSource, key: SourceKey): Promise<ResolvedSource> {
  try {
    await access(source.path, constants.R_OK)
  } catch (err) {
    throw new NotFoundError(source.path, { cause: err })
  }
  return { key, source, location: source.path, status: 'local' }
}
