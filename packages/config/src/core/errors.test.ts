/**
 * Tests for error classes and type guards.
 */

import { describe, expect, test } from 'vitest'

import {
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

describe('PlushError', () => {
  test('creates error with message and code', () => {
    const error = new PlushError('test message', 'TEST_CODE')
    expect(error.message).toBe('test message')
    expect(error.code).toBe('TEST_CODE')
    expect(error.name).toBe('PlushError')
    expect(error instanceof Error).toBe(true)
  })

  test('keeps the cause', () => {
    const cause = new Error('underlying')
    const error = new NetworkError('https://example.invalid/a.zsh', 'HTTP 500', { cause })
    expect(error.cause).toBe(cause)
  })
})

describe('Configuration errors', () => {
  test('ConfigError has source', () => {
    const error = new ConfigError('test', 'plugins.toml')
    expect(error.source).toBe('plugins.toml')
    expect(error.code).toBe('CONFIG_ERROR')
    expect(error instanceof PlushError).toBe(true)
  })

  test('ConfigParseError', () => {
    const error = new ConfigParseError('parse failed', 'plugins.toml')
    expect(error.message).toBe('parse failed')
    expect(error.code).toBe('CONFIG_PARSE_ERROR')
    expect(error instanceof ConfigError).toBe(true)
  })

  test('ConfigValidationError lists validation errors', () => {
    const error = new ConfigValidationError('Invalid plugins.toml', 'plugins.toml', [
      { path: '/shell', message: 'must be equal to one of the allowed values', keyword: 'enum', params: {} },
    ])
    expect(error.message).toBe(
      'Invalid plugins.toml:\n  /shell: must be equal to one of the allowed values'
    )
    expect(error.validationErrors).toHaveLength(1)
  })
})

describe('Resolution errors', () => {
  test('NotFoundError', () => {
    const error = new NotFoundError('/missing/dir')
    expect(error.message).toBe('Local source not found or unreadable: "/missing/dir"')
    expect(error.code).toBe('NOT_FOUND_ERROR')
    expect(error.path).toBe('/missing/dir')
  })

  test('GitError', () => {
    const error = new GitError('git fetch origin', 128, 'fatal: unable to access')
    expect(error.message).toBe('Git command failed (exit 128): git fetch origin\nfatal: unable to access')
    expect(error.exitCode).toBe(128)
    expect(isGitError(error)).toBe(true)
  })

  test('NetworkError', () => {
    const error = new NetworkError('https://example.invalid/a.zsh', 'HTTP 404 Not Found')
    expect(error.message).toBe('Failed to download "https://example.invalid/a.zsh": HTTP 404 Not Found')
    expect(error.code).toBe('NETWORK_ERROR')
  })

  test('TemplateError', () => {
    const error = new TemplateError('Unknown template', 'pure', 'defer')
    expect(error.message).toBe('Unknown template in plugin "pure": "defer"')
    expect(error.plugin).toBe('pure')
    expect(error.template).toBe('defer')
  })

  test('NoMatchError', () => {
    const error = new NoMatchError('pure', ['*.plugin.zsh', '*.zsh'])
    expect(error.message).toBe('No files matched for plugin "pure" (patterns: "*.plugin.zsh", "*.zsh")')
    expect(error.code).toBe('NO_MATCH_ERROR')
  })
})

describe('Lock and mutex errors', () => {
  test('LockArtifactError', () => {
    const error = new LockArtifactError('bad json', '/data/plugins.lock.json')
    expect(error.message).toBe('Invalid lock file "/data/plugins.lock.json": bad json')
    expect(error.lockPath).toBe('/data/plugins.lock.json')
  })

  test('MutexTimeoutError is a MutexError', () => {
    const error = new MutexTimeoutError('/config/.plush.lock', 500)
    expect(error.message).toBe('Lock error for "/config/.plush.lock": Timed out after 500ms')
    expect(error.code).toBe('MUTEX_TIMEOUT_ERROR')
    expect(error instanceof MutexError).toBe(true)
    expect(isMutexError(error)).toBe(true)
  })
})

describe('Type guards and helpers', () => {
  test('isPlushError', () => {
    expect(isPlushError(new PlushError('x', 'X'))).toBe(true)
    expect(isPlushError(new Error('x'))).toBe(false)
    expect(isPlushError('x')).toBe(false)
  })

  test('isConfigError', () => {
    expect(isConfigError(new ConfigParseError('x', 'y'))).toBe(true)
    expect(isConfigError(new GitError('git', 1, ''))).toBe(false)
  })

  test('errorCode', () => {
    expect(errorCode(new NotFoundError('/x'))).toBe('NOT_FOUND_ERROR')
    expect(errorCode(new Error('x'))).toBe('UNKNOWN_ERROR')
  })

  test('errorMessage', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('PluginError', () => {
  test('keeps the recorded code and names the plugin', () => {
    const error = new PluginError('autosuggest', 'GIT_ERROR', 'repository not found')
    expect(error.message).toBe('Failed to install plugin "autosuggest": repository not found')
    expect(error.code).toBe('GIT_ERROR')
    expect(errorCode(error)).toBe('GIT_ERROR')
  })
})

describe('isErrnoException', () => {
  test('recognizes system errors by their code', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' })
    expect(isErrnoException(error)).toBe(true)
    expect(isErrnoException(new Error('plain'))).toBe(false)
    expect(isErrnoException('ENOENT')).toBe(false)
  })
})
