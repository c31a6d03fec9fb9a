/**
 * Storage for plush.
 *
 * This module manages where plugins live on disk:
 * - Path management for config and data directories
 * - Per-run fetch deduplication
 * - Remote downloads
 * - Cache cleaning
 */

// Path management
export {
  LOCK_FILENAME,
  PathResolver,
  downloadFileName,
  ensureDir,
  getConfigDir,
  getConfigFile,
  getDataDir,
  getProfile,
  type PathOptions,
} from './paths.js'

// Fetch deduplication
export {
  FetchCache,
  type FetchFn,
  type ResolvedSource,
  type SourceStatus,
} from './fetch-cache.js'

// Downloads
export { fetchDownload, type Downloader } from './download.js'

// Cache cleaning
export { cleanCache, computeReachableKeys } from './clean.js'
