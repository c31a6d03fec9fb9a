/**
 * Tests for paths module.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { asSourceKey } from '../core/types/source.js'
import {
  PathResolver,
  downloadFileName,
  getConfigDir,
  getConfigFile,
  getDataDir,
  getProfile,
} from './paths.js'

const ENV_NAMES = [
  'PLUSH_CONFIG_DIR',
  'PLUSH_DATA_DIR',
  'PLUSH_CONFIG_FILE',
  'PLUSH_PROFILE',
  'XDG_CONFIG_HOME',
  'XDG_DATA_HOME',
] as const

const KEY = asSourceKey('a'.repeat(64))

describe('environment lookup', () => {
  const saved = new Map<string, string | undefined>()

  beforeEach(() => {
    for (const name of ENV_NAMES) {
      saved.set(name, process.env[name])
      delete process.env[name]
    }
  })

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name]
      } else {
        process.env[name] = value
      }
    }
  })

  it('should default to the home directory', () => {
    expect(getConfigDir()).toBe(join(homedir(), '.config', 'plush'))
    expect(getDataDir()).toBe(join(homedir(), '.local', 'share', 'plush'))
    expect(getConfigFile()).toBe(join(homedir(), '.config', 'plush', 'plugins.toml'))
    expect(getProfile()).toBeUndefined()
  })

  it('should follow XDG base directories', () => {
    process.env['XDG_CONFIG_HOME'] = '/xdg/config'
    process.env['XDG_DATA_HOME'] = '/xdg/data'
    expect(getConfigDir()).toBe('/xdg/config/plush')
    expect(getDataDir()).toBe('/xdg/data/plush')
  })

  it('should prefer explicit variables', () => {
    process.env['XDG_CONFIG_HOME'] = '/xdg/config'
    process.env['PLUSH_CONFIG_DIR'] = '/custom/config'
    process.env['PLUSH_DATA_DIR'] = '/custom/data'
    process.env['PLUSH_CONFIG_FILE'] = '/custom/plugins.toml'
    process.env['PLUSH_PROFILE'] = 'work'
    expect(getConfigDir()).toBe('/custom/config')
    expect(getDataDir()).toBe('/custom/data')
    expect(getConfigFile()).toBe('/custom/plugins.toml')
    expect(getProfile()).toBe('work')
  })

  it('should treat empty variables as unset', () => {
    process.env['PLUSH_PROFILE'] = ''
    expect(getProfile()).toBeUndefined()
  })
})

describe('downloadFileName', () => {
  it('should use the last path segment', () => {
    expect(downloadFileName('https://example.invalid/u/repo/raw/prompt.zsh')).toBe('prompt.zsh')
  })

  it('should ignore query strings and trailing slashes', () => {
    expect(downloadFileName('https://example.invalid/files/theme.zsh/?raw=1')).toBe('theme.zsh')
  })

  it('should fall back when the url has no path', () => {
    expect(downloadFileName('https://example.invalid')).toBe('plugin')
  })

  it('should keep only the last component of an encoded path', () => {
    expect(downloadFileName('https://example.invalid/raw/..%2F..%2Fescaped.zsh')).toBe('escaped.zsh')
    expect(downloadFileName('https://example.invalid/raw/..%5Cescaped.zsh')).toBe('escaped.zsh')
  })

  it('should fall back for dot segments', () => {
    expect(downloadFileName('https://example.invalid/raw/..%2F..')).toBe('plugin')
    expect(downloadFileName('https://example.invalid/raw/%2E%2E')).toBe('plugin')
  })

  it('should keep a malformed escape as is', () => {
    expect(downloadFileName('https://example.invalid/raw/a%zz.zsh')).toBe('a%zz.zsh')
  })
})

describe('PathResolver', () => {
  const paths = new PathResolver({ configDir: '/cfg', dataDir: '/data' })

  it('should build storage paths', () => {
    expect(paths.configFile).toBe('/cfg/plugins.toml')
    expect(paths.lockFile).toBe('/data/plugins.lock.json')
    expect(paths.mutex).toBe('/cfg/.plush.lock')
    expect(paths.repos).toBe('/data/repos')
    expect(paths.downloads).toBe('/data/downloads')
  })

  it('should build per-source paths', () => {
    expect(paths.repo(KEY)).toBe(`/data/repos/${KEY}`)
    expect(paths.download(KEY, 'https://example.invalid/a/b.zsh')).toBe(`/data/downloads/${KEY}/b.zsh`)
  })

  it('should accept an explicit config file', () => {
    const custom = new PathResolver({ configDir: '/cfg', dataDir: '/data', configFile: '/etc/plugins.toml' })
    expect(custom.configFile).toBe('/etc/plugins.toml')
  })
})
