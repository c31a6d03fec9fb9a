/**
 * Remote file downloads.
 */

import { NetworkError } from '../core/errors.js'

/** Downloads the body of a URL */
export type Downloader = (url: string) => Promise<Uint8Array>

/** Download timeout: 2 minutes */
const DOWNLOAD_TIMEOUT = 120000

/**
 * Download a file with the global fetch.
 *
 * @throws {NetworkError} on network failure or non-ok response
 */
export async function fetchDownload(url: string): Promise<Uint8Array> {
  let response: Response
  try {
    response = await fetch(url, {
      redirect: 'follow',
      signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT),
    })
  } catch (error) {
    throw new NetworkError(url, error instanceof Error ? error.message : String(error), {
      cause: error,
    })
  }

  if (!response.ok) {
    throw new NetworkError(url, `HTTP ${response.status} ${response.statusText}`.trim())
  }

  return new Uint8Array(await response.arrayBuffer())
}
