/**
 * Tests for remote downloads, with the global fetch stubbed.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'

import { NetworkError } from '../core/errors.js'
import { fetchDownload } from './download.js'

const TARGET = 'https://example.invalid/plugin.zsh'

describe('fetchDownload', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns the response body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('echo hi\n', { status: 200 })))

    const body = await fetchDownload(TARGET)

    expect(Buffer.from(body).toString('utf8')).toBe('echo hi\n')
  })

  it('rejects non-ok responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' })))

    await expect(fetchDownload(TARGET)).rejects.toThrow(
      'Failed to download "https://example.invalid/plugin.zsh": HTTP 404 Not Found'
    )
  })

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      })
    )

    const error = await fetchDownload(TARGET).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(NetworkError)
    expect(error).toMatchObject({ code: 'NETWORK_ERROR', url: TARGET })
  })
})
