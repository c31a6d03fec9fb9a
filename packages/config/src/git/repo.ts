/**
 * Repository operations used by the git resolver.
 *
 * The resolver only talks to git through the GitOperations interface, so
 * tests can swap in an in-memory fake and never touch the network.
 */

import { gitExec, gitExecLines, gitExecStdout } from './exec.js'

/**
 * Git operations the resolver depends on.
 */
export interface GitOperations {
  /** Clone `url` into `dest`, checking out `branch` (a branch or tag) when given */
  clone(url: string, dest: string, options?: { branch?: string | undefined }): Promise<void>
  /** Fetch `refspec` (default: the remote HEAD) from origin into FETCH_HEAD */
  fetch(repoDir: string, refspec?: string): Promise<void>
  /** Full SHA of HEAD */
  head(repoDir: string): Promise<string>
  /** Full commit SHA for `rev`, or null if the commit is not present locally */
  resolveCommit(repoDir: string, rev: string): Promise<string | null>
  /** Whether tracked files are unmodified */
  isClean(repoDir: string): Promise<boolean>
  /** Check out `commitish` with a detached HEAD */
  checkoutDetached(repoDir: string, commitish: string): Promise<void>
  /** Fast-forward the current branch to `commitish` */
  mergeFastForward(repoDir: string, commitish: string): Promise<void>
}

/** Clone timeout: 5 minutes */
const CLONE_TIMEOUT = 300000
/** Fetch timeout: 2 minutes */
const FETCH_TIMEOUT = 120000

/**
 * Clone a git repository.
 *
 * @example
 * ```typescript
 * await cloneRepo('https://example.invalid/user/repo.git', '/path/to/dest', { branch: 'main' })
 * ```
 */
export async function cloneRepo(
  url: string,
  destPath: string,
  options: { branch?: string | undefined } = {}
): Promise<void> {
  const args = ['clone', '--recurse-submodules']

  if (options.branch) {
    args.push('--branch', options.branch)
  }

  args.push('--', url, destPath)

  await gitExec(args, { timeout: CLONE_TIMEOUT })
}

/**
 * Fetch from origin into FETCH_HEAD.
 */
export async function fetchRepo(repoDir: string, refspec = 'HEAD'): Promise<void> {
  await gitExec(['fetch', '--tags', 'origin', refspec], { cwd: repoDir, timeout: FETCH_TIMEOUT })
}

/**
 * Get the current HEAD commit SHA.
 *
 * @throws GitError if not in a git repository
 */
export async function getHead(repoDir: string): Promise<string> {
  return gitExecStdout(['rev-parse', 'HEAD'], { cwd: repoDir })
}

/**
 * Resolve a revision to a commit SHA present in the local object store.
 *
 * @returns Full SHA, or null when the revision is unknown locally
 */
export async function resolveCommit(repoDir: string, rev: string): Promise<string | null> {
  const result = await gitExec(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], {
    cwd: repoDir,
    ignoreExitCode: true,
  })
  return result.exitCode === 0 ? result.stdout.trim() : null
}

/**
 * Check that no tracked file has uncommitted modifications.
 */
export async function isClean(repoDir: string): Promise<boolean> {
  const lines = await gitExecLines(['status', '--porcelain', '--untracked-files=no'], {
    cwd: repoDir,
  })
  return lines.length === 0
}

/**
 * Check out a commit with a detached HEAD, updating submodules.
 */
export async function checkoutDetached(repoDir: string, commitish: string): Promise<void> {
  await gitExec(['checkout', '--quiet', '--detach', commitish], { cwd: repoDir })
  await gitExec(['submodule', 'update', '--init', '--recursive'], {
    cwd: repoDir,
    timeout: FETCH_TIMEOUT,
  })
}

/**
 * Fast-forward the current branch, failing if the histories diverged.
 */
export async function mergeFastForward(repoDir: string, commitish: string): Promise<void> {
  await gitExec(['merge', '--ff-only', '--quiet', commitish], { cwd: repoDir })
  await gitExec(['submodule', 'update', '--init', '--recursive'], {
    cwd: repoDir,
    timeout: FETCH_TIMEOUT,
  })
}

/**
 * GitOperations backed by the system git binary.
 */
export const systemGit: GitOperations = {
  clone: (url, dest, options) => cloneRepo(url, dest, options),
  fetch: (repoDir, refspec) => fetchRepo(repoDir, refspec),
  head: getHead,
  resolveCommit,
  isClean,
  checkoutDetached,
  mergeFastForward,
}
