/**
 * File matching and template rendering.
 *
 * Templates are plain strings with `{{ placeholder }}` slots. The known
 * placeholders are:
 * - `{{ name }}`     plugin name
 * - `{{ dir }}`      directory the plugin resolved to
 * - `{{ file }}`     one matched file; the template renders once per file
 * - `{{ data_dir }}` plush data directory
 */

import { stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import fg from 'fast-glob'

import { NoMatchError, TemplateError } from '../core/errors.js'
import type { ExternalPlugin, InlinePlugin, Plugin } from '../core/types/config.js'
import type { ResolvedExternalPlugin, ResolvedInlinePlugin } from '../core/types/lock.js'
import type { Source } from '../core/types/source.js'

/** Placeholder values available while rendering */
export interface TemplateValues {
  name: string
  dir?: string | undefined
  file?: string | undefined
  data_dir?: string | undefined
}

/** Everything the renderer needs besides the plugin itself */
export interface RenderContext {
  /** Default match rule, tried in order */
  match: string[]
  /** Templates by name (built-ins overlaid by user templates) */
  templates: Record<string, string>
  /** plush data directory */
  dataDir: string
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g

function isPlaceholder(name: string): name is keyof TemplateValues {
  return name === 'name' || name === 'dir' || name === 'file' || name === 'data_dir'
}

/** Placeholder names referenced by a template, in order of appearance */
export function placeholders(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1] ?? '')
}

/** Whether a template renders once per matched file */
export function usesFile(template: string): boolean {
  return placeholders(template).includes('file')
}

/**
 * Substitute placeholders in a template.
 *
 * @throws TemplateError for an unknown placeholder or one without a value
 */
export function renderTemplate(template: string, values: TemplateValues, plugin: string): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!isPlaceholder(name)) {
      throw new TemplateError(`Unknown placeholder "${name}"`, plugin, template)
    }
    const value = values[name]
    if (value === undefined) {
      throw new TemplateError(`Placeholder "${name}" is not available`, plugin, template)
    }
    return value
  })
}

// ============================================================================
// Matching
// ============================================================================

async function glob(patterns: string[], cwd: string, onlyFile: string | undefined): Promise<string[]> {
  const files = await fg(patterns, {
    cwd,
    absolute: true,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: true,
    ignore: ['**/.git/**'],
  })
  return onlyFile === undefined ? files : files.filter((file) => file === onlyFile)
}

/**
 * Match a plugin's files against its resolved location.
 *
 * Explicit `use` patterns are unioned. Without them the default match
 * rule applies: the first pattern that matches anything wins.
 *
 * @returns Matched files (sorted, unique) and the patterns that were tried
 */
export async function matchFiles(
  plugin: ExternalPlugin,
  location: string,
  isFile: boolean,
  match: string[]
): Promise<{ files: string[]; patterns: string[] }> {
  const cwd = isFile ? dirname(location) : location
  const onlyFile = isFile ? location : undefined
  const render = (pattern: string) => renderTemplate(pattern, { name: plugin.name }, plugin.name)

  if (plugin.use.length > 0) {
    const patterns = plugin.use.map(render)
    return { files: sortUnique(await glob(patterns, cwd, onlyFile)), patterns }
  }

  const patterns = match.map(render)
  for (const pattern of patterns) {
    const files = await glob([pattern], cwd, onlyFile)
    if (files.length > 0) {
      return { files: sortUnique(files), patterns }
    }
  }
  return { files: [], patterns }
}

function sortUnique(files: string[]): string[] {
  return [...new Set(files)].sort()
}

// ============================================================================
// Rendering
// ============================================================================

function withHooks(plugin: Plugin, body: string[]): string[] {
  const fragments: string[] = []
  if (plugin.hooks.pre !== undefined) fragments.push(plugin.hooks.pre)
  fragments.push(...body)
  if (plugin.hooks.post !== undefined) fragments.push(plugin.hooks.post)
  return fragments
}

/**
 * Render an inline plugin: its raw text is a single fragment.
 */
export function renderInline(plugin: InlinePlugin): ResolvedInlinePlugin {
  return { kind: 'inline', name: plugin.name, fragments: withHooks(plugin, [plugin.raw]) }
}

/**
 * Match files and render templates for an external plugin.
 *
 * @throws TemplateError for an unknown template name or placeholder
 * @throws NoMatchError when nothing matched and explicit patterns or a
 *   per-file template require at least one file
 */
export async function renderExternal(
  plugin: ExternalPlugin,
  source: Source,
  location: string,
  ctx: RenderContext
): Promise<ResolvedExternalPlugin> {
  const templates = plugin.apply.map((name) => {
    const template = Object.hasOwn(ctx.templates, name) ? ctx.templates[name] : undefined
    if (template === undefined) {
      throw new TemplateError('Unknown template', plugin.name, name)
    }
    return template
  })

  const isFile = (await stat(location)).isFile()
  const dir = isFile ? dirname(location) : location
  const { files, patterns } = await matchFiles(plugin, location, isFile, ctx.match)

  const needsFiles = plugin.use.length > 0 || templates.some(usesFile)
  if (files.length === 0 && needsFiles) {
    throw new NoMatchError(plugin.name, patterns)
  }

  const values: TemplateValues = { name: plugin.name, dir, data_dir: ctx.dataDir }
  const body: string[] = []
  for (const template of templates) {
    if (usesFile(template)) {
      for (const file of files) {
        body.push(renderTemplate(template, { ...values, file }, plugin.name))
      }
    } else {
      body.push(renderTemplate(template, values, plugin.name))
    }
  }

  return {
    kind: 'external',
    name: plugin.name,
    source,
    location,
    files,
    fragments: withHooks(plugin, body),
  }
}
