/**
 * Core types for plush
 */

// Source descriptors
export type {
  GitReference,
  GitSource,
  LocalSource,
  RemoteSource,
  Source,
  SourceKey,
  SourceKind,
} from './source.js'

export {
  asSourceKey,
  computeSourceKey,
  expandPath,
  formatReference,
  formatSource,
  isMovableReference,
  isSourceKey,
  normalizeSource,
  sourcesEquivalent,
} from './source.js'

// Config types
export type {
  Config,
  ExternalPlugin,
  InlinePlugin,
  Plugin,
  PluginHooks,
  Shell,
} from './config.js'

export {
  DEFAULT_APPLY,
  DEFAULT_MATCH,
  DEFAULT_TEMPLATES,
  SHELLS,
  getTemplates,
  isShell,
} from './config.js'

// Lock file types
export type {
  Fingerprint,
  LockedConfig,
  PluginFailure,
  ResolvedExternalPlugin,
  ResolvedInlinePlugin,
  ResolvedPlugin,
} from './lock.js'

export { asFingerprint, isFingerprint } from './lock.js'
