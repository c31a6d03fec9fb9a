/**
 * Git operations wrapper
 *
 * Shells out to the system git with argv arrays (no shell interpolation)
 * and exposes the repository operations the git resolver needs.
 */

// Core execution
export {
  gitExec,
  gitExecStdout,
  gitExecLines,
  type GitExecResult,
  type GitExecOptions,
} from './exec.js'

// Repository operations
export {
  checkoutDetached,
  cloneRepo,
  fetchRepo,
  getHead,
  isClean,
  mergeFastForward,
  resolveCommit,
  systemGit,
  type GitOperations,
} from './repo.js'
