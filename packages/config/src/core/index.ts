/**
 * Core library for plush
 *
 * Provides types, schemas, config parsing, errors, fingerprints, locks,
 * and atomic writes.
 */

// Types
export * from './types/index.js'

// Schemas
export { configSchema, lockSchema, validateLockFile, validateRawConfig } from './schemas/index.js'
export type {
  RawConfig,
  RawPlugin,
  RawPluginHooks,
  ValidationError,
  ValidationResult,
} from './schemas/index.js'

// Config parsing
export * from './config/index.js'

// Fingerprints
export { canonicalJson, computeFingerprint } from './fingerprint.js'

// Errors
export {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  GitError,
  LockArtifactError,
  MutexError,
  MutexTimeoutError,
  NetworkError,
  NoMatchError,
  NotFoundError,
  PluginError,
  PlushError,
  TemplateError,
  errorCode,
  errorMessage,
  isConfigError,
  isErrnoException,
  isGitError,
  isMutexError,
  isPlushError,
} from './errors.js'

// Locks
export { MUTEX_FILENAME, acquireLock, getMutexPath, withLock } from './locks.js'
export type { LockHandle, LockOptions, ReleaseFn } from './locks.js'

// Atomic file operations
export { TMP_MARKER, atomicDir, atomicWrite } from './atomic.js'
export type { AtomicWriteOptions } from './atomic.js'
