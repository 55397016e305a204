/**
 * Cache entry marker types.
 */

import type { SourceKind } from './source.js'

/** Kinds of source that occupy physical cache entries */
export type CachedSourceKind = Exclude<SourceKind, 'path'>

/**
 * Contents of `.crate-fetch-entry.json`. Its presence marks an entry as
 * complete; it is only ever written inside a temp directory that is then
 * renamed into place together with the package contents.
 */
export interface CacheEntryMetadata {
  formatVersion: 1
  fingerprint: string
  name: string
  /** Version actually materialized */
  version: string
  sourceKind: CachedSourceKind
  locator: string
  /** Commit materialized, for git sources */
  commit?: string
  /** Package root relative to the entry's `pkg/` directory */
  subdir: string
  createdAt: string
}
