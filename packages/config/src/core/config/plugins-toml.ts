/**
 * Config file (plugins.toml) parser
 *
 * Parsing happens in three steps: TOML is parsed with @iarna/toml, the
 * result is validated against config.schema.json, then each plugin table
 * is normalized into a typed Plugin with exactly one source.
 */

import { readFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import TOML from '@iarna/toml'

import {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  isErrnoException,
} from '../errors.js'
import { type RawConfig, type RawPlugin, validateRawConfig } from '../schemas/index.js'
import {
  type Config,
  DEFAULT_APPLY,
  DEFAULT_MATCH,
  type Plugin,
  type PluginHooks,
  type Shell,
} from '../types/config.js'
import { type GitReference, type Source, expandPath } from '../types/source.js'

/** Default filename for the config file */
export const CONFIG_FILENAME = 'plugins.toml'

/** Non-fatal issue found while loading a config */
export interface ConfigWarning {
  /** Plugin the warning applies to, if any */
  plugin?: string | undefined
  message: string
}

/** Options for config loading */
export interface LoadConfigOptions {
  /** Active profile; plugins restricted to other profiles are dropped */
  profile?: string | undefined
}

/** A loaded config plus the warnings produced while normalizing it */
export interface LoadedConfig {
  config: Config
  warnings: ConfigWarning[]
}

const SOURCE_FIELDS = ['github', 'gist', 'git', 'remote', 'local', 'inline'] as const
const REFERENCE_FIELDS = ['branch', 'tag', 'rev'] as const

type SourceField = (typeof SOURCE_FIELDS)[number]

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse TOML content and validate it against the config schema.
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseRawConfig(content: string, filePath?: string): RawConfig {
  const source = filePath ?? CONFIG_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateRawConfig(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${CONFIG_FILENAME}`, source, result.errors)
  }

  return result.data
}

/**
 * Parse plugins.toml content into a normalized Config.
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages and relative local paths)
 * @throws ConfigParseError, ConfigValidationError, ConfigError
 */
export function parseConfigToml(
  content: string,
  filePath?: string,
  options: LoadConfigOptions = {}
): LoadedConfig {
  const raw = parseRawConfig(content, filePath)
  return normalizeConfig(raw, filePath ?? CONFIG_FILENAME, options)
}

/**
 * Read a raw (validated, not normalized) config from disk.
 */
export async function readRawConfig(filePath: string): Promise<RawConfig> {
  return parseRawConfig(await readConfigFile(filePath), filePath)
}

/**
 * Read and normalize a plugins.toml file from disk.
 */
export async function loadConfig(
  filePath: string,
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  return parseConfigToml(await readConfigFile(filePath), filePath, options)
}

async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Turn a validated raw config into a Config.
 */
export function normalizeConfig(
  raw: RawConfig,
  filePath: string,
  options: LoadConfigOptions = {}
): LoadedConfig {
  const warnings: ConfigWarning[] = []
  const shell: Shell = raw.shell ?? 'zsh'
  const baseDir = dirname(expandPath(filePath))

  const apply = dedupeTemplates(raw.apply ?? [...DEFAULT_APPLY], undefined, warnings)
  const plugins: Plugin[] = []
  const seen = new Set<string>()

  for (const [name, rawPlugin] of Object.entries(raw.plugins ?? {})) {
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate plugin name "${name}"`, filePath)
    }
    seen.add(name)

    const plugin = normalizePlugin(name, rawPlugin, { apply, baseDir, filePath, warnings })
    if (isEnabledForProfile(plugin, options.profile)) {
      plugins.push(plugin)
    }
  }

  const config: Config = {
    shell,
    match: raw.match ?? [...DEFAULT_MATCH[shell]],
    apply,
    templates: { ...(raw.templates ?? {}) },
    plugins,
  }

  return { config, warnings }
}

interface NormalizeContext {
  apply: string[]
  baseDir: string
  filePath: string
  warnings: ConfigWarning[]
}

function normalizePlugin(name: string, raw: RawPlugin, ctx: NormalizeContext): Plugin {
  const sourceFields = SOURCE_FIELDS.filter((field) => raw[field] !== undefined)
  const referenceFields = REFERENCE_FIELDS.filter((field) => raw[field] !== undefined)
  const fail = (message: string): never => {
    throw new ConfigError(`Plugin "${name}": ${message}`, ctx.filePath)
  }

  const [field] = sourceFields
  if (field === undefined) {
    return fail(`no source given, set one of ${SOURCE_FIELDS.join(', ')}`)
  }
  if (sourceFields.length > 1) {
    fail(`only one source is allowed, got ${sourceFields.join(', ')}`)
  }
  if (referenceFields.length > 1) {
    fail(`only one of branch, tag, rev is allowed, got ${referenceFields.join(', ')}`)
  }
  if (raw.proto !== undefined && field !== 'github' && field !== 'gist') {
    fail('"proto" is only valid for github and gist sources')
  }

  const profiles = raw.profiles ?? []
  const hooks: PluginHooks = {}
  if (raw.hooks?.pre !== undefined) hooks.pre = raw.hooks.pre
  if (raw.hooks?.post !== undefined) hooks.post = raw.hooks.post

  if (field === 'inline') {
    if (referenceFields.length > 0) fail('inline plugins cannot have a git reference')
    if (raw.use !== undefined) fail('inline plugins cannot have "use" patterns')
    if (raw.apply !== undefined) fail('inline plugins cannot have "apply" templates')
    return { kind: 'inline', name, raw: raw.inline ?? '', profiles, hooks }
  }

  const source = buildSource(field, raw, ctx.baseDir, fail)
  if (source.kind !== 'git' && referenceFields.length > 0) {
    fail(`"${referenceFields.join(', ')}" is only valid for git sources`)
  }

  return {
    kind: 'external',
    name,
    source,
    use: raw.use ?? [],
    apply: raw.apply ? dedupeTemplates(raw.apply, name, ctx.warnings) : [...ctx.apply],
    profiles,
    hooks,
  }
}

function buildSource(
  field: Exclude<SourceField, 'inline'>,
  raw: RawPlugin,
  baseDir: string,
  fail: (message: string) => never
): Source {
  const value = raw[field] ?? fail(`missing "${field}" value`)
  switch (field) {
    case 'github':
      return { kind: 'git', url: shorthandUrl('github.com', value, raw.proto), reference: buildReference(raw) }
    case 'gist':
      return { kind: 'git', url: shorthandUrl('gist.github.com', value, raw.proto), reference: buildReference(raw) }
    case 'git':
      return { kind: 'git', url: value, reference: buildReference(raw) }
    case 'remote':
      return { kind: 'remote', url: value }
    case 'local':
      return { kind: 'local', path: expandPath(value, baseDir) }
  }
}

function shorthandUrl(host: string, repo: string, proto: RawPlugin['proto']): string {
  switch (proto ?? 'https') {
    case 'https':
      return `https://${host}/${repo}`
    case 'ssh':
      return `git@${host}:${repo}`
    case 'git':
      return `git://${host}/${repo}`
  }
}

function buildReference(raw: RawPlugin): GitReference {
  if (raw.branch !== undefined) return { kind: 'branch', name: raw.branch }
  if (raw.tag !== undefined) return { kind: 'tag', name: raw.tag }
  if (raw.rev !== undefined) return { kind: 'rev', sha: raw.rev.toLowerCase() }
  return { kind: 'default' }
}

function dedupeTemplates(
  names: string[],
  plugin: string | undefined,
  warnings: ConfigWarning[]
): string[] {
  const unique: string[] = []
  for (const name of names) {
    if (unique.includes(name)) {
      warnings.push({ plugin, message: `template "${name}" is listed more than once` })
    } else {
      unique.push(name)
    }
  }
  return unique
}

function isEnabledForProfile(plugin: Plugin, profile: string | undefined): boolean {
  if (plugin.profiles.length === 0) return true
  return profile !== undefined && plugin.profiles.includes(profile)
}

// ============================================================================
// Editing
// ============================================================================

const CONFIG_HEADER = `# plush configuration file
#
# Plugins are sourced in the order they are declared. Run \`plush lock\`
# after editing to install them.

`

/**
 * Create the raw config written by `plush init`.
 */
export function createDefaultRawConfig(shell: Shell): RawConfig {
  return { shell, plugins: {} }
}

/**
 * Add a plugin to a raw config.
 *
 * The result is normalized once so an invalid plugin never reaches disk.
 *
 * @throws ConfigError if the name is taken or the plugin is invalid
 */
export function addRawPlugin(
  raw: RawConfig,
  name: string,
  plugin: RawPlugin,
  filePath: string
): RawConfig {
  const plugins = raw.plugins ?? {}
  if (Object.hasOwn(plugins, name)) {
    throw new ConfigError(`Plugin "${name}" already exists`, filePath)
  }

  const updated: RawConfig = { ...raw, plugins: { ...plugins, [name]: plugin } }
  const result = validateRawConfig(JSON.parse(JSON.stringify(updated)))
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid plugin "${name}"`, filePath, result.errors)
  }
  normalizeConfig(result.data, filePath)
  return result.data
}

/**
 * Remove a plugin from a raw config.
 *
 * @returns The updated config, or null if no plugin had that name
 */
export function removeRawPlugin(raw: RawConfig, name: string): RawConfig | null {
  const plugins = raw.plugins ?? {}
  if (!Object.hasOwn(plugins, name)) {
    return null
  }
  const { [name]: _removed, ...rest } = plugins
  return { ...raw, plugins: rest }
}

/**
 * Serialize a raw config to TOML.
 */
export function serializeConfigToml(raw: RawConfig): string {
  const clean = JSON.parse(JSON.stringify(raw))
  return `${CONFIG_HEADER}${TOML.stringify(clean)}`
}
