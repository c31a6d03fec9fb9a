/**
 * Terminal UI utilities for the plush CLI.
 *
 * Everything here writes to stderr: stdout carries the generated script
 * and is evaluated by the user's shell.
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

import { type PlushEvent, formatSource } from 'plush-config'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  info: chalk.hex('#6366f1'), // indigo
  warn: chalk.hex('#f59e0b'), // amber
  error: chalk.hex('#ef4444'), // red
  muted: chalk.hex('#6b7280'), // gray-500
  code: chalk.hex('#a78bfa'), // violet-400
}

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  info: colors.info(figures.info),
  bullet: colors.muted(figures.bullet),
  arrow: colors.muted('→'),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
    stream: process.stderr,
  })
}

// ═══════════════════════════════════════════════════════════════════════════
// Events
// ═══════════════════════════════════════════════════════════════════════════

export interface EventRenderOptions {
  /** Also show per-source progress and cache cleaning */
  verbose?: boolean | undefined
}

/**
 * Format an event as one line, or null when it should not be shown.
 */
export function formatEvent(event: PlushEvent, options: EventRenderOptions = {}): string | null {
  switch (event.type) {
    case 'warning':
      return event.plugin === undefined
        ? `${symbols.warning} ${colors.warn(event.message)}`
        : `${symbols.warning} ${colors.warn(`${event.plugin}: ${event.message}`)}`
    case 'plugin-failed': {
      const { failure } = event
      const symbol = event.fatal ? symbols.error : symbols.warning
      const paint = event.fatal ? colors.error : colors.warn
      return `${symbol} ${paint(`${failure.plugin}: ${failure.message}`)}`
    }
    case 'source-resolved':
      if (!options.verbose) return null
      return `${symbols.bullet} ${colors.muted(event.status.padEnd(10))} ${formatSource(event.source)}`
    case 'cache-removed':
      if (!options.verbose) return null
      return `${symbols.bullet} ${colors.muted('removed'.padEnd(10))} ${formatPath(event.path)}`
    case 'lock-reused':
      if (!options.verbose) return null
      return `${symbols.info} ${colors.muted(`Using ${formatPath(event.path)}`)}`
    case 'lock-written':
      return `${symbols.success} Locked ${event.plugins} plugin${event.plugins === 1 ? '' : 's'} ${symbols.arrow} ${formatPath(event.path)}`
    case 'lock-skipped':
      return `${symbols.warning} ${colors.warn(`Not updating ${formatPath(event.path)}: ${event.errors} plugin${event.errors === 1 ? '' : 's'} failed`)}`
    case 'config-unchanged':
      return `${symbols.info} Unchanged ${symbols.arrow} ${formatPath(event.path)}`
    case 'config-written':
      return `${symbols.success} ${configAction(event.action)} ${colors.code(event.detail)} ${symbols.arrow} ${formatPath(event.path)}`
  }
}

function configAction(action: 'init' | 'add' | 'remove'): string {
  switch (action) {
    case 'init':
      return 'Initialized'
    case 'add':
      return 'Added'
    case 'remove':
      return 'Removed'
  }
}

/**
 * Build an event handler that prints to stderr, pausing a spinner around
 * each line.
 */
export function eventPrinter(
  options: EventRenderOptions = {},
  spinner?: Ora
): (event: PlushEvent) => void {
  return (event) => {
    const line = formatEvent(event, options)
    if (line === null) return
    if (spinner?.isSpinning) {
      spinner.clear()
      console.error(line)
      spinner.render()
    } else {
      console.error(line)
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string): string {
  const home = process.env['HOME'] ?? ''
  if (home) {
    return filePath.replaceAll(home, '~')
  }
  return filePath
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  return `${(ms / 1000).toFixed(1)}s`
}
