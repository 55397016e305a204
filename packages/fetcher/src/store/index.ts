export { computeDirSize, entryFingerprint, inspectEntry } from './entry.js'
export type { CacheEntry, EntryInspection, EntryKey } from './entry.js'
export { FetchCache } from './fetch-cache.js'
export type {
  EntryState,
  FetchCacheOptions,
  FetchOrigin,
  FetchOutcome,
  GetOrFetchOptions,
} from './fetch-cache.js'
export { CacheLayout, ENTRY_CONTENTS, ENTRY_MARKER, isFingerprint } from './paths.js'
export { FetchScope } from './scope.js'
export type { ScopeOptions } from './scope.js'
