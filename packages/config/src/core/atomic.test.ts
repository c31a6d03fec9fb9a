/**
 * Tests for atomic file write utilities.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { atomicDir, atomicWrite } from './atomic.js'

describe('atomicWrite', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'))
  })

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
  })

  test('writes content to new file', async () => {
    const filePath = path.join(tmpDir, 'test.txt')
    await atomicWrite(filePath, 'hello world')

    const content = await fs.promises.readFile(filePath, 'utf-8')
    expect(content).toBe('hello world')
  })

  test('overwrites existing file', async () => {
    const filePath = path.join(tmpDir, 'test.txt')
    await fs.promises.writeFile(filePath, 'original')

    await atomicWrite(filePath, 'updated')

    const content = await fs.promises.readFile(filePath, 'utf-8')
    expect(content).toBe('updated')
  })

  test('creates parent directories', async () => {
    const filePath = path.join(tmpDir, 'nested', 'deep', 'test.txt')
    await atomicWrite(filePath, 'nested content')

    const content = await fs.promises.readFile(filePath, 'utf-8')
    expect(content).toBe('nested content')
  })

  test('no temp files left after successful write', async () => {
    const filePath = path.join(tmpDir, 'test.txt')
    await atomicWrite(filePath, 'content')

    const files = await fs.promises.readdir(tmpDir)
    expect(files).toEqual(['test.txt'])
  })

  test('cleans up temp file on write error', async () => {
    // A non-empty directory at the target makes the rename fail
    const filePath = path.join(tmpDir, 'test-dir')
    await fs.promises.mkdir(filePath)
    await fs.promises.writeFile(path.join(filePath, 'blocker'), 'x')

    await expect(atomicWrite(filePath, 'content')).rejects.toThrow()

    const files = await fs.promises.readdir(tmpDir)
    expect(files).toEqual(['test-dir'])
  })
})

describe('atomicDir', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'atomic-dir-test-'))
  })

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
  })

  test('populates and renames the directory', async () => {
    const target = path.join(tmpDir, 'repo')
    const result = await atomicDir(target, async (dir) => {
      await fs.promises.writeFile(path.join(dir, 'a.zsh'), 'echo a')
      return 'done'
    })

    expect(result).toBe('done')
    expect(await fs.promises.readFile(path.join(target, 'a.zsh'), 'utf-8')).toBe('echo a')
    expect(await fs.promises.readdir(tmpDir)).toEqual(['repo'])
  })

  test('replaces an existing directory', async () => {
    const target = path.join(tmpDir, 'repo')
    await fs.promises.mkdir(target)
    await fs.promises.writeFile(path.join(target, 'old.zsh'), 'old')

    await atomicDir(target, async (dir) => {
      await fs.promises.writeFile(path.join(dir, 'new.zsh'), 'new')
    })

    expect(await fs.promises.readdir(target)).toEqual(['new.zsh'])
  })

  test('removes the temporary directory when populating fails', async () => {
    const target = path.join(tmpDir, 'repo')
    await expect(
      atomicDir(target, async () => {
        throw new Error('clone failed')
      })
    ).rejects.toThrow('clone failed')

    expect(await fs.promises.readdir(tmpDir)).toEqual([])
  })
})
