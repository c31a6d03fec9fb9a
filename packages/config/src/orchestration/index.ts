/**
 * Operations for plush.
 *
 * High-level entrypoints that coordinate config loading, the mutex,
 * resolution and the lock file.
 */

// Context and events
export {
  contextPaths,
  createContext,
  emit,
  type Context,
  type ContextOptions,
  type PlushEvent,
} from './context.js'

// Locking and sourcing
export { loadContextConfig, lock, resolveConfig, reusableLock, source } from './lock.js'

// Config editing
export { add, init, remove } from './edit.js'
