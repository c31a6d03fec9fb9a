/**
 * The `lock` and `source` operations.
 *
 * Both hold the cross-process mutex for the whole resolve-and-write
 * sequence; failing to take it is fatal.
 *
 * - lock is strict: any plugin failure fails the operation and no lock
 *   file is written.
 * - source is best-effort: failed plugins are reported as warnings, the
 *   script is built from the rest, and the lock file is only replaced
 *   when every plugin succeeded.
 */

import { stat } from 'node:fs/promises'

import { loadConfig } from '../core/config/plugins-toml.js'
import { PluginError } from '../core/errors.js'
import { getMutexPath, withLock } from '../core/locks.js'
import { type Config, getTemplates } from '../core/types/config.js'
import type { LockedConfig } from '../core/types/lock.js'
import {
  buildLockedConfig,
  readLockedConfig,
  renderScript,
  verifyLockedConfig,
  writeLockedConfig,
} from '../lock/locked-config.js'
import { resolvePlugins } from '../resolver/scheduler.js'
import { cleanCache } from '../store/clean.js'
import { type Context, contextPaths, emit } from './context.js'

/**
 * Load the config file, reporting its warnings.
 */
export async function loadContextConfig(ctx: Context): Promise<Config> {
  const { config, warnings } = await loadConfig(ctx.configFile, { profile: ctx.profile })
  for (const warning of warnings) {
    emit(ctx, { type: 'warning', message: warning.message, plugin: warning.plugin })
  }
  return config
}

/**
 * Clean the cache, then resolve and render every plugin.
 */
export async function resolveConfig(ctx: Context, config: Config): Promise<LockedConfig> {
  const paths = contextPaths(ctx)

  for (const path of await cleanCache(paths, config)) {
    emit(ctx, { type: 'cache-removed', path })
  }

  const result = await resolvePlugins(config.plugins, {
    paths,
    git: ctx.git,
    download: ctx.download,
    reinstall: ctx.reinstall,
    concurrency: ctx.concurrency,
    render: { match: config.match, templates: getTemplates(config), dataDir: ctx.dataDir },
    onSource: (resolved) =>
      emit(ctx, {
        type: 'source-resolved',
        source: resolved.source,
        status: resolved.status,
        location: resolved.location,
      }),
  })

  return buildLockedConfig(config, result, { dataDir: ctx.dataDir, configFile: ctx.configFile })
}

async function mtime(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs
  } catch {
    return null
  }
}

/**
 * Return the persisted lock if it can be reused for `config` as is.
 */
export async function reusableLock(ctx: Context, config: Config): Promise<LockedConfig | null> {
  if (ctx.relock || ctx.reinstall) {
    return null
  }

  const [configTime, lockTime] = await Promise.all([mtime(ctx.configFile), mtime(ctx.lockFile)])
  if (lockTime === null || (configTime !== null && configTime > lockTime)) {
    return null
  }

  const locked = await readLockedConfig(ctx.lockFile, (error) =>
    emit(ctx, { type: 'warning', message: `${error.message}, rebuilding` })
  )
  if (locked === null || !(await verifyLockedConfig(locked, config))) {
    return null
  }
  return locked
}

/**
 * Install every plugin and write the lock file.
 *
 * @throws PluginError for the last failed plugin, after reporting each one
 * @throws MutexError if the mutex cannot be acquired
 */
export async function lock(ctx: Context): Promise<LockedConfig> {
  return withLock(getMutexPath(ctx.configDir), async () => {
    const config = await loadContextConfig(ctx)
    const locked = await resolveConfig(ctx, config)

    const last = locked.errors.at(-1)
    if (last !== undefined) {
      for (const failure of locked.errors) {
        emit(ctx, { type: 'plugin-failed', failure, fatal: true })
      }
      throw new PluginError(last.plugin, last.code, last.message)
    }

    await writeLockedConfig(ctx.lockFile, locked)
    emit(ctx, { type: 'lock-written', path: ctx.lockFile, plugins: locked.plugins.length })
    return locked
  })
}

/**
 * Produce the shell script, reusing the lock file when it is still valid.
 *
 * @throws MutexError if the mutex cannot be acquired
 */
export async function source(ctx: Context): Promise<string> {
  return withLock(getMutexPath(ctx.configDir), async () => {
    const config = await loadContextConfig(ctx)

    const existing = await reusableLock(ctx, config)
    if (existing !== null) {
      emit(ctx, { type: 'lock-reused', path: ctx.lockFile })
      return renderScript(existing)
    }

    const locked = await resolveConfig(ctx, config)
    for (const failure of locked.errors) {
      emit(ctx, { type: 'plugin-failed', failure, fatal: false })
    }

    if (locked.errors.length === 0) {
      await writeLockedConfig(ctx.lockFile, locked)
      emit(ctx, { type: 'lock-written', path: ctx.lockFile, plugins: locked.plugins.length })
    } else {
      emit(ctx, { type: 'lock-skipped', path: ctx.lockFile, errors: locked.errors.length })
    }

    return renderScript(locked)
  })
}
