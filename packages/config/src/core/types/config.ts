/**
 * Configuration types for plush
 *
 * The config file (plugins.toml) lists plugins in declaration order.
 * After parsing and validation it is normalized into a Config value,
 * which is what the resolver and the lock fingerprint consume.
 */

import type { Source } from './source.js'

/** Supported shells */
export type Shell = 'zsh' | 'bash'

export const SHELLS: readonly Shell[] = ['zsh', 'bash']

export function isShell(value: string): value is Shell {
  return value === 'zsh' || value === 'bash'
}

/** Script snippets emitted around a plugin's fragments */
export interface PluginHooks {
  pre?: string | undefined
  post?: string | undefined
}

/** A plugin whose files come from a source */
export interface ExternalPlugin {
  kind: 'external'
  /** Unique plugin name */
  name: string
  /** Where the plugin's files come from */
  source: Source
  /** Glob patterns selecting files (empty = default match rule) */
  use: string[]
  /** Template names applied in order */
  apply: string[]
  /** Profiles this plugin is enabled for (empty = all) */
  profiles: string[]
  hooks: PluginHooks
}

/** A plugin whose script text is written in the config file */
export interface InlinePlugin {
  kind: 'inline'
  name: string
  raw: string
  profiles: string[]
  hooks: PluginHooks
}

export type Plugin = ExternalPlugin | InlinePlugin

/**
 * Normalized configuration.
 */
export interface Config {
  shell: Shell
  /** Default match rule: first pattern with any match wins */
  match: string[]
  /** Default templates for plugins without their own `apply` */
  apply: string[]
  /** User-defined templates, overriding built-ins by name */
  templates: Record<string, string>
  /** Plugins in declaration order */
  plugins: Plugin[]
}

// ============================================================================
// Defaults
// ============================================================================

/** Default template list */
export const DEFAULT_APPLY = ['source'] as const

/** Default match rules per shell */
export const DEFAULT_MATCH: Record<Shell, readonly string[]> = {
  zsh: [
    '{{ name }}.plugin.zsh',
    '{{ name }}.zsh',
    '{{ name }}.sh',
    '{{ name }}.zsh-theme',
    '*.plugin.zsh',
    '*.zsh',
    '*.sh',
    '*.zsh-theme',
  ],
  bash: [
    '{{ name }}.plugin.bash',
    '{{ name }}.sh',
    '{{ name }}.bash',
    '*.plugin.bash',
    '*.sh',
    '*.bash',
  ],
}

/** Built-in templates per shell */
export const DEFAULT_TEMPLATES: Record<Shell, Readonly<Record<string, string>>> = {
  zsh: {
    source: 'source "{{ file }}"',
    PATH: 'export PATH="{{ dir }}:$PATH"',
    path: 'path=( "{{ dir }}" $path )',
    fpath: 'fpath=( "{{ dir }}" $fpath )',
  },
  bash: {
    source: 'source "{{ file }}"',
    PATH: 'export PATH="{{ dir }}:$PATH"',
  },
}

/** All templates available to a config: built-ins overlaid by user templates */
export function getTemplates(config: Config): Record<string, string> {
  return { ...DEFAULT_TEMPLATES[config.shell], ...config.templates }
}
