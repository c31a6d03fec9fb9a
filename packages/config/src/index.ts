/**
 * plush-config: the plugin resolution and locking engine
 *
 * This package provides everything except the command line:
 * - Core types, schemas, config parsing, errors, locks, atomic writes
 * - Git operations (shell-out wrapper)
 * - Storage paths, fetch deduplication, downloads, cache cleaning
 * - Resolution engine (sources → matched files → rendered fragments)
 * - Locked config persistence and verification
 * - Operations (lock, source, init, add, remove)
 */

// Core - foundation types, schemas, config, errors, locks, atomic ops
export * from './core/index.js'

// Git operations - exported as namespace; the resolver only needs the interface
export * as git from './git/index.js'
export { systemGit, type GitOperations } from './git/index.js'

// Storage
export * from './store/index.js'

// Resolver
export * from './resolver/index.js'

// Locked config
export * from './lock/index.js'

// Operations
export * from './orchestration/index.js'
