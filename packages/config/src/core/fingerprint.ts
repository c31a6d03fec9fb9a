/**
 * Config fingerprinting.
 *
 * The fingerprint of a lock ties it to the config that produced it:
 * structurally equal configs always hash to the same value, and any
 * change to a plugin, reference, pattern or template changes it.
 */

import { createHash } from 'node:crypto'

import type { Config } from './types/config.js'
import { type Fingerprint, asFingerprint } from './types/lock.js'

/**
 * Serialize a JSON-compatible value with object keys sorted.
 *
 * Array order is kept; `undefined` object members are dropped, the same
 * way JSON.stringify drops them.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`
  }

  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`)

  return `{${members.join(',')}}`
}

/**
 * Compute the fingerprint of a config.
 *
 * Formula:
 * sha256("config-v1\0" + canonicalJson(config))
 */
export function computeFingerprint(config: Config): Fingerprint {
  const hash = createHash('sha256')
  hash.update('config-v1\0')
  hash.update(canonicalJson(config))
  return asFingerprint(`sha256:${hash.digest('hex')}`)
}
