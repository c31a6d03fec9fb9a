/**
 * Resolution engine for plush.
 *
 * This module handles one resolution run:
 * - Materialize each source (clone, update, download, check)
 * - Match files and render templates per plugin
 * - Schedule plugins concurrently, keeping declaration order
 */

// Source resolution
export { resolveSource, type SourceResolveOptions } from './source.js'

// Rendering
export {
  matchFiles,
  placeholders,
  renderExternal,
  renderInline,
  renderTemplate,
  usesFile,
  type RenderContext,
  type TemplateValues,
} from './render.js'

// Scheduling
export {
  mapConcurrent,
  resolvePlugins,
  type ResolvePluginsOptions,
  type ResolveProgress,
  type ResolveResult,
  type Settled,
} from './scheduler.js'
