/**
 * Locked config persistence and verification.
 */

export {
  buildLockedConfig,
  loadLockedConfig,
  parseLockedConfig,
  readLockedConfig,
  renderScript,
  serializeLockedConfig,
  verifyLockedConfig,
  writeLockedConfig,
  type LockContext,
} from './locked-config.js'
