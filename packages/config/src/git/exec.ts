/**
 * Safe git command execution using argv arrays (no shell interpolation).
 */

import { spawn } from 'node:child_process'

import { GitError } from '../core/errors.js'

/**
 * Result of a git command execution.
 */
export interface GitExecResult {
  /** Exit code from the git process */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * Options for git command execution.
 */
export interface GitExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables to pass to the process */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: 60000ms = 1 minute) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
}

/** Never prompt for credentials; a missing repository must fail, not hang */
const NON_INTERACTIVE_ENV = {
  GIT_TERMINAL_PROMPT: '0',
  GIT_ASKPASS: 'echo',
}

/**
 * Execute a git command safely using argv array (no shell).
 *
 * @param args - Arguments to pass to git (not including 'git' itself)
 * @throws GitError if the command fails (unless ignoreExitCode is true)
 *
 * @example
 * ```typescript
 * const result = await gitExec(['rev-parse', 'HEAD'], { cwd: repoDir })
 * ```
 */
export function gitExec(args: string[], options: GitExecOptions = {}): Promise<GitExecResult> {
  const { cwd, env, timeout = 60000, ignoreExitCode = false } = options
  const command = ['git', ...args].join(' ')

  return new Promise<GitExecResult>((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd,
      env: { ...process.env, ...NON_INTERACTIVE_ENV, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      proc.kill()
    }, timeout)

    proc.on('error', (error) => {
      clearTimeout(timeoutId)
      reject(new GitError(command, -1, error.message))
    })

    proc.on('close', (code) => {
      clearTimeout(timeoutId)
      if (timedOut) {
        reject(new GitError(command, -1, `Timeout exceeded (${timeout}ms)`))
        return
      }

      const result: GitExecResult = {
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      }

      if (result.exitCode !== 0 && !ignoreExitCode) {
        reject(new GitError(command, result.exitCode, result.stderr || result.stdout))
        return
      }
      resolve(result)
    })
  })
}

/**
 * Execute a git command and return stdout, trimming trailing whitespace.
 *
 * @throws GitError if the command fails
 */
export async function gitExecStdout(args: string[], options: GitExecOptions = {}): Promise<string> {
  const result = await gitExec(args, options)
  return result.stdout.trim()
}

/**
 * Execute a git command and return stdout lines as an array.
 * Empty lines are filtered out.
 *
 * @throws GitError if the command fails
 */
export async function gitExecLines(args: string[], options: GitExecOptions = {}): Promise<string[]> {
  const stdout = await gitExecStdout(args, options)
  if (!stdout) {
    return []
  }
  return stdout.split('\n').filter((line) => line.length > 0)
}
