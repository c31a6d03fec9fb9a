/**
 * Tests for file matching and template rendering.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { NoMatchError, TemplateError } from '../core/errors.js'
import { DEFAULT_MATCH, DEFAULT_TEMPLATES, type ExternalPlugin } from '../core/types/config.js'
import { type RenderContext, renderExternal, renderInline, renderTemplate, usesFile } from './render.js'

const CTX: RenderContext = {
  match: [...DEFAULT_MATCH.zsh],
  templates: { ...DEFAULT_TEMPLATES.zsh, env: 'export {{ name }}_HOME="{{ data_dir }}"' },
  dataDir: '/data/plush',
}

function plugin(overrides: Partial<ExternalPlugin> = {}): ExternalPlugin {
  return {
    kind: 'external',
    name: 'demo',
    source: { kind: 'local', path: '/unused' },
    use: [],
    apply: ['source'],
    profiles: [],
    hooks: {},
    ...overrides,
  }
}

describe('renderTemplate', () => {
  it('substitutes placeholders with or without inner spaces', () => {
    expect(renderTemplate('{{name}} {{ dir }} {{  file  }}', { name: 'n', dir: '/d', file: '/d/f' }, 'n')).toBe(
      'n /d /d/f'
    )
  })

  it('rejects unknown placeholders', () => {
    expect(() => renderTemplate('echo {{ nope }}', { name: 'demo' }, 'demo')).toThrow(
      'Unknown placeholder "nope" in plugin "demo": "echo {{ nope }}"'
    )
  })

  it('detects per-file templates', () => {
    expect(usesFile('source "{{ file }}"')).toBe(true)
    expect(usesFile('export PATH="{{ dir }}:$PATH"')).toBe(false)
  })
})

describe('renderInline', () => {
  it('emits the raw text between hooks', () => {
    const resolved = renderInline({
      kind: 'inline',
      name: 'greet',
      raw: 'echo hello',
      profiles: [],
      hooks: { pre: 'setopt extended_glob', post: 'unsetopt extended_glob' },
    })
    expect(resolved).toEqual({
      kind: 'inline',
      name: 'greet',
      fragments: ['setopt extended_glob', 'echo hello', 'unsetopt extended_glob'],
    })
  })
})

describe('renderExternal', () => {
  let dir: string

  const touch = async (...files: string[]) => {
    for (const file of files) {
      await mkdir(join(dir, file, '..'), { recursive: true })
      await writeFile(join(dir, file), '# test\n')
    }
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plush-render-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('uses the first default pattern that matches', async () => {
    await touch('demo.plugin.zsh', 'other.zsh', 'README.md')

    const resolved = await renderExternal(plugin(), plugin().source, dir, CTX)

    expect(resolved.files).toEqual([join(dir, 'demo.plugin.zsh')])
    expect(resolved.fragments).toEqual([`source "${join(dir, 'demo.plugin.zsh')}"`])
  })

  it('falls through the default rule to wildcard patterns', async () => {
    await touch('b.zsh', 'a.zsh', 'notes.txt')

    const resolved = await renderExternal(plugin(), plugin().source, dir, CTX)

    expect(resolved.files).toEqual([join(dir, 'a.zsh'), join(dir, 'b.zsh')])
  })

  it('unions explicit patterns and sorts by code unit', async () => {
    await touch('a.zsh', 'B.zsh', 'functions/_demo', '.hidden.zsh')

    const resolved = await renderExternal(
      plugin({ use: ['*.zsh', 'functions/*', 'a.zsh'] }),
      plugin().source,
      dir,
      CTX
    )

    expect(resolved.files).toEqual([join(dir, 'B.zsh'), join(dir, 'a.zsh'), join(dir, 'functions/_demo')])
  })

  it('renders the name placeholder inside patterns', async () => {
    await touch('demo.zsh', 'other.zsh')

    const resolved = await renderExternal(plugin({ use: ['{{ name }}.zsh'] }), plugin().source, dir, CTX)

    expect(resolved.files).toEqual([join(dir, 'demo.zsh')])
  })

  it('orders hooks, once templates and per-file templates', async () => {
    await touch('a.zsh', 'b.zsh')

    const resolved = await renderExternal(
      plugin({ use: ['*.zsh'], apply: ['PATH', 'source', 'env'], hooks: { pre: 'pre', post: 'post' } }),
      plugin().source,
      dir,
      CTX
    )

    expect(resolved.fragments).toEqual([
      'pre',
      `export PATH="${dir}:$PATH"`,
      `source "${join(dir, 'a.zsh')}"`,
      `source "${join(dir, 'b.zsh')}"`,
      'export demo_HOME="/data/plush"',
      'post',
    ])
  })

  it('matches only the file itself for a file location', async () => {
    await touch('prompt.zsh', 'sibling.zsh')
    const file = join(dir, 'prompt.zsh')

    const resolved = await renderExternal(plugin({ apply: ['source', 'fpath'] }), plugin().source, file, CTX)

    expect(resolved.location).toBe(file)
    expect(resolved.files).toEqual([file])
    expect(resolved.fragments).toEqual([`source "${file}"`, `fpath=( "${dir}" $fpath )`])
  })

  it('allows no matches when no template needs a file', async () => {
    await touch('bin/tool')

    const resolved = await renderExternal(plugin({ name: 'tool', apply: ['PATH'] }), plugin().source, dir, CTX)

    expect(resolved.files).toEqual([])
    expect(resolved.fragments).toEqual([`export PATH="${dir}:$PATH"`])
  })

  it('fails with NoMatchError when explicit patterns match nothing', async () => {
    await touch('a.zsh')

    await expect(
      renderExternal(plugin({ use: ['*.bash'], apply: ['PATH'] }), plugin().source, dir, CTX)
    ).rejects.toThrow(new NoMatchError('demo', ['*.bash']))
  })

  it('fails with NoMatchError when a per-file template has no files', async () => {
    await touch('README.md')

    await expect(renderExternal(plugin(), plugin().source, dir, CTX)).rejects.toBeInstanceOf(NoMatchError)
  })

  it('fails with TemplateError for an unknown template name', async () => {
    await touch('demo.zsh')

    await expect(renderExternal(plugin({ apply: ['nope'] }), plugin().source, dir, CTX)).rejects.toThrow(
      new TemplateError('Unknown template', 'demo', 'nope')
    )
  })

  it.each(['toString', 'constructor', '__proto__'])('does not take %s from the object prototype', async (name) => {
    await touch('demo.zsh')

    await expect(renderExternal(plugin({ apply: [name] }), plugin().source, dir, CTX)).rejects.toThrow(
      new TemplateError('Unknown template', 'demo', name)
    )
  })
})
