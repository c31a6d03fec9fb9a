import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { parseConfigToml } from '../core/config/plugins-toml.js'
import { ConfigError, ConfigParseError } from '../core/errors.js'
import { FakeGit, createFakeDownloader } from '../testing/fakes.js'
import { type Context, type PlushEvent, createContext } from './context.js'
import { add, init, remove } from './edit.js'

describe('config editing', () => {
  let root: string
  let events: PlushEvent[]
  let ctx: Context

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'plush-edit-'))
    events = []
    ctx = createContext({
      configDir: join(root, 'config'),
      dataDir: join(root, 'data'),
      git: new FakeGit(),
      download: createFakeDownloader({}),
      onEvent: (event) => events.push(event),
    })
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  async function pluginNames(): Promise<string[]> {
    const { config } = parseConfigToml(await readFile(ctx.configFile, 'utf8'), ctx.configFile)
    return config.plugins.map((plugin) => plugin.name)
  }

  test('init writes a config for the chosen shell', async () => {
    await init(ctx, 'bash')

    const { config } = parseConfigToml(await readFile(ctx.configFile, 'utf8'), ctx.configFile)
    expect(config.shell).toBe('bash')
    expect(config.plugins).toEqual([])
    expect(events).toEqual([{ type: 'config-written', path: ctx.configFile, action: 'init', detail: 'bash' }])
  })

  test('init leaves an existing config unchanged', async () => {
    await mkdir(join(root, 'config'), { recursive: true })
    await writeFile(ctx.configFile, 'shell = "zsh"\n')

    await init(ctx, 'bash')

    expect(await readFile(ctx.configFile, 'utf8')).toBe('shell = "zsh"\n')
    expect(events).toEqual([{ type: 'config-unchanged', path: ctx.configFile }])
  })

  test('add appends plugins in order', async () => {
    await init(ctx, 'zsh')
    await add(ctx, 'first', { github: 'owner/first' })
    await add(ctx, 'second', { inline: 'echo second' })

    expect(await pluginNames()).toEqual(['first', 'second'])
    expect(events.at(-1)).toEqual({ type: 'config-written', path: ctx.configFile, action: 'add', detail: 'second' })
  })

  test('add rejects a duplicate name', async () => {
    await init(ctx, 'zsh')
    await add(ctx, 'first', { github: 'owner/first' })

    await expect(add(ctx, 'first', { github: 'owner/other' })).rejects.toThrow('Plugin "first" already exists')
    expect(await pluginNames()).toEqual(['first'])
  })

  test('add rejects an invalid plugin without touching the file', async () => {
    await init(ctx, 'zsh')
    const before = await readFile(ctx.configFile, 'utf8')

    await expect(add(ctx, 'bad', { inline: 'echo', use: ['*.zsh'] })).rejects.toThrow(ConfigError)
    expect(await readFile(ctx.configFile, 'utf8')).toBe(before)
  })

  test('add without a config file starts a default one', async () => {
    await add(ctx, 'first', { github: 'owner/first' })

    const { config } = parseConfigToml(await readFile(ctx.configFile, 'utf8'), ctx.configFile)
    expect(config.shell).toBe('zsh')
    expect(config.plugins.map((plugin) => plugin.name)).toEqual(['first'])
    expect(events).toEqual([{ type: 'config-written', path: ctx.configFile, action: 'add', detail: 'first' }])
  })

  test('add still rejects an unreadable config file', async () => {
    await mkdir(join(root, 'config'), { recursive: true })
    await writeFile(ctx.configFile, 'shell = ')

    await expect(add(ctx, 'first', { github: 'owner/first' })).rejects.toThrow(ConfigParseError)
  })

  test('remove deletes a plugin', async () => {
    await init(ctx, 'zsh')
    await add(ctx, 'first', { github: 'owner/first' })
    await add(ctx, 'second', { github: 'owner/second' })

    await remove(ctx, 'first')

    expect(await pluginNames()).toEqual(['second'])
    expect(events.at(-1)).toEqual({ type: 'config-written', path: ctx.configFile, action: 'remove', detail: 'first' })
  })

  test('remove fails for an unknown plugin', async () => {
    await init(ctx, 'zsh')

    await expect(remove(ctx, 'missing')).rejects.toThrow('Plugin "missing" not found')
  })
})
