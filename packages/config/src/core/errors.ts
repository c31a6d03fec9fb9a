/**
 * Typed error classes for plush
 *
 * Error hierarchy:
 * - PlushError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (TOML/JSON parse failures)
 *     - ConfigValidationError (schema validation failures)
 *   - NotFoundError (local source missing)
 *   - GitError (git operations)
 *   - NetworkError (remote downloads)
 *   - TemplateError (unknown template or placeholder)
 *   - NoMatchError (patterns matched nothing)
 *   - PluginError (a recorded per-plugin failure, rethrown)
 *   - LockArtifactError (corrupt or unreadable lock file)
 *   - MutexError (cross-process lock)
 *     - MutexTimeoutError
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all plush errors */
export class PlushError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PlushError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends PlushError {
  readonly source: string

  constructor(message: string, source: string, code = 'CONFIG_ERROR') {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML/JSON parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, source, 'CONFIG_PARSE_ERROR')
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, source, 'CONFIG_VALIDATION_ERROR')
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Resolution errors
// ============================================================================

/** Error thrown when a local source does not exist or cannot be read */
export class NotFoundError extends PlushError {
  readonly path: string

  constructor(path: string, options?: ErrorOptions) {
    super(`Local source not found or unreadable: "${path}"`, 'NOT_FOUND_ERROR', options)
    this.name = 'NotFoundError'
    this.path = path
  }
}

/** Error thrown during git operations */
export class GitError extends PlushError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Git command failed (exit ${exitCode}): ${command}\n${stderr}`, 'GIT_ERROR')
    this.name = 'GitError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/** Error thrown when a remote file cannot be downloaded */
export class NetworkError extends PlushError {
  readonly url: string

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Failed to download "${url}": ${reason}`, 'NETWORK_ERROR', options)
    this.name = 'NetworkError'
    this.url = url
  }
}

/** Error thrown when a template or placeholder is unknown */
export class TemplateError extends PlushError {
  readonly plugin: string
  readonly template: string

  constructor(message: string, plugin: string, template: string) {
    super(`${message} in plugin "${plugin}": "${template}"`, 'TEMPLATE_ERROR')
    this.name = 'TemplateError'
    this.plugin = plugin
    this.template = template
  }
}

/** Error thrown when a plugin's patterns match no files */
export class NoMatchError extends PlushError {
  readonly plugin: string
  readonly patterns: string[]

  constructor(plugin: string, patterns: string[]) {
    super(
      `No files matched for plugin "${plugin}" (patterns: ${patterns.map((p) => `"${p}"`).join(', ')})`,
      'NO_MATCH_ERROR'
    )
    this.name = 'NoMatchError'
    this.plugin = plugin
    this.patterns = patterns
  }
}

/** Error standing for one plugin's recorded failure */
export class PluginError extends PlushError {
  readonly plugin: string

  constructor(plugin: string, code: string, message: string) {
    super(`Failed to install plugin "${plugin}": ${message}`, code)
    this.name = 'PluginError'
    this.plugin = plugin
  }
}

// ============================================================================
// Lock artifact errors
// ============================================================================

/** Error thrown when the lock artifact cannot be read or parsed */
export class LockArtifactError extends PlushError {
  readonly lockPath: string

  constructor(message: string, lockPath: string, options?: ErrorOptions) {
    super(`Invalid lock file "${lockPath}": ${message}`, 'LOCK_ARTIFACT_ERROR', options)
    this.name = 'LockArtifactError'
    this.lockPath = lockPath
  }
}

// ============================================================================
// Mutex errors
// ============================================================================

/** Error thrown during cross-process locking */
export class MutexError extends PlushError {
  readonly lockPath: string

  constructor(message: string, lockPath: string, code = 'MUTEX_ERROR') {
    super(`Lock error for "${lockPath}": ${message}`, code)
    this.name = 'MutexError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class MutexTimeoutError extends MutexError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath, 'MUTEX_TIMEOUT_ERROR')
    this.name = 'MutexTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isPlushError(error: unknown): error is PlushError {
  return error instanceof PlushError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isGitError(error: unknown): error is GitError {
  return error instanceof GitError
}

export function isMutexError(error: unknown): error is MutexError {
  return error instanceof MutexError
}

/** Stable error code for any thrown value */
export function errorCode(error: unknown): string {
  return isPlushError(error) ? error.code : 'UNKNOWN_ERROR'
}

/** Human-readable message for any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Whether a thrown value is a Node.js system error carrying an errno code */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
