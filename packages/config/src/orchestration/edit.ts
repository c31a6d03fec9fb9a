/**
 * Config file editing: `init`, `add` and `remove`.
 *
 * These only touch the config file, so the mutex is taken when possible
 * but failing to take it is reported as a warning instead of aborting.
 */

import { stat } from 'node:fs/promises'

import { atomicWrite } from '../core/atomic.js'
import {
  addRawPlugin,
  createDefaultRawConfig,
  readRawConfig,
  removeRawPlugin,
  serializeConfigToml,
} from '../core/config/plugins-toml.js'
import { ConfigError, isMutexError } from '../core/errors.js'
import { type LockHandle, acquireLock, getMutexPath } from '../core/locks.js'
import type { RawPlugin } from '../core/schemas/index.js'
import type { Shell } from '../core/types/config.js'
import { type Context, emit } from './context.js'

async function withOptionalLock<T>(ctx: Context, fn: () => Promise<T>): Promise<T> {
  let handle: LockHandle | null = null
  try {
    handle = await acquireLock(getMutexPath(ctx.configDir))
  } catch (err) {
    if (!isMutexError(err)) throw err
    emit(ctx, { type: 'warning', message: `${err.message}, continuing without the lock` })
  }

  try {
    return await fn()
  } finally {
    await handle?.release()
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Create a new config file for a shell. An existing file is left as is.
 */
export async function init(ctx: Context, shell: Shell): Promise<void> {
  await withOptionalLock(ctx, async () => {
    if (await fileExists(ctx.configFile)) {
      emit(ctx, { type: 'config-unchanged', path: ctx.configFile })
      return
    }
    await atomicWrite(ctx.configFile, serializeConfigToml(createDefaultRawConfig(shell)))
    emit(ctx, { type: 'config-written', path: ctx.configFile, action: 'init', detail: shell })
  })
}

/**
 * Add a plugin to the config file, starting a default zsh config when
 * there is none.
 *
 * @throws ConfigError if the name is taken or the plugin is invalid
 */
export async function add(ctx: Context, name: string, plugin: RawPlugin): Promise<void> {
  await withOptionalLock(ctx, async () => {
    const raw = (await fileExists(ctx.configFile))
      ? await readRawConfig(ctx.configFile)
      : createDefaultRawConfig('zsh')
    const updated = addRawPlugin(raw, name, plugin, ctx.configFile)
    await atomicWrite(ctx.configFile, serializeConfigToml(updated))
    emit(ctx, { type: 'config-written', path: ctx.configFile, action: 'add', detail: name })
  })
}

/**
 * Remove a plugin from the config file.
 *
 * @throws ConfigError if no plugin has that name
 */
export async function remove(ctx: Context, name: string): Promise<void> {
  await withOptionalLock(ctx, async () => {
    const raw = await readRawConfig(ctx.configFile)
    const updated = removeRawPlugin(raw, name)
    if (updated === null) {
      throw new ConfigError(`Plugin "${name}" not found`, ctx.configFile)
    }
    await atomicWrite(ctx.configFile, serializeConfigToml(updated))
    emit(ctx, { type: 'config-written', path: ctx.configFile, action: 'remove', detail: name })
  })
}
