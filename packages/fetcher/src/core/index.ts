/**
 * Core building blocks: types, schemas, configuration, errors, locks,
 * atomic publish and logging.
 */

// Types
export * from './types/index.js'

// Schemas
export {
  cacheEntrySchema,
  configSchema,
  validateCacheEntry,
  validateConfigFile,
} from './schemas/index.js'
export type { ValidationError, ValidationResult } from './schemas/index.js'

// Configuration
export {
  CONFIG_FILE_NAME,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  getCacheHome,
  loadConfigFile,
  parseConfigToml,
  resolveSettings,
} from './config.js'
export type { FetcherSettings, SettingsOverrides } from './config.js'

// Errors
export * from './errors.js'

// Locks
export { acquireLock, isLocked, withLock } from './locks.js'
export type { LockHandle, LockOptions, ReleaseFn } from './locks.js'

// Shared in-process work
export { SharedWork, raceSignal } from './shared-work.js'

// Atomic publish
export { isDirectory, makeTempDir, publishDir, removeDir, writeJsonDurable } from './atomic.js'
export type { PublishResult } from './atomic.js'

// Logging
export { createLogger, silentLogger } from './logger.js'
export type { LogStream, Logger, LoggerOptions } from './logger.js'
