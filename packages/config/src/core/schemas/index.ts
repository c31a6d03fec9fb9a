/**
 * JSON Schema validation for plush config and lock files
 */

import { createRequire } from 'node:module'
import AjvModule, { type ErrorObject, type SchemaObject } from 'ajv'

import type { LockedConfig } from '../types/lock.js'

const require = createRequire(import.meta.url)
const configSchema: SchemaObject = require('./config.schema.json')
const lockSchema: SchemaObject = require('./lock.schema.json')

// ============================================================================
// Raw config shape (plugins.toml as parsed, before normalization)
// ============================================================================

export interface RawPluginHooks {
  pre?: string
  post?: string
}

export interface RawPlugin {
  github?: string
  gist?: string
  git?: string
  remote?: string
  local?: string
  inline?: string
  proto?: 'https' | 'ssh' | 'git'
  branch?: string
  tag?: string
  rev?: string
  use?: string[]
  apply?: string[]
  profiles?: string[]
  hooks?: RawPluginHooks
}

export interface RawConfig {
  shell?: 'zsh' | 'bash'
  match?: string[]
  apply?: string[]
  templates?: Record<string, string>
  plugins?: Record<string, RawPlugin>
}

// ============================================================================
// Ajv instance setup
// ============================================================================

// ajv is CommonJS; under NodeNext the default import is module.exports
const Ajv = AjvModule.default

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

// Compile validators
const validateConfigSchema = ajv.compile<RawConfig>(configSchema)
const validateLockSchema = ajv.compile<LockedConfig>(lockSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  // Additional properties errors - show which property is invalid
  if (err.keyword === 'additionalProperties') {
    const prop = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'pattern' && err.instancePath.endsWith('/github')) {
    return `"${String(err.data)}" is not a valid GitHub repository. Use format: <owner>/<repo>`
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a raw config (plugins.toml parsed to object)
 */
export function validateRawConfig(data: unknown): ValidationResult<RawConfig> {
  if (validateConfigSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateConfigSchema.errors) }
}

/**
 * Validate a lock file (plugins.lock.json parsed to object)
 */
export function validateLockFile(data: unknown): ValidationResult<LockedConfig> {
  if (validateLockSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateLockSchema.errors) }
}

// ============================================================================
// Schema exports for external use
// ============================================================================

export { configSchema, lockSchema }
