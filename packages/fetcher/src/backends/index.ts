/**
 * Source backends.
 */

import type { LockOptions } from '../core/locks.js'
import type { CacheLayout } from '../store/paths.js'
import { GitCliBackend } from './git/backend.js'
import { LocalPathBackend } from './path.js'
import { CrateRegistryBackend } from './registry/backend.js'
import type { SourceBackends } from './types.js'

export interface DefaultBackendOptions {
  layout: CacheLayout
  lock?: LockOptions | undefined
  /** Timeout for each git command in milliseconds */
  gitTimeout?: number | undefined
}

/** The reference backend for every source kind */
export function createDefaultBackends(options: DefaultBackendOptions): SourceBackends {
  return {
    registry: new CrateRegistryBackend(options),
    git: new GitCliBackend({ layout: options.layout, lock: options.lock, timeout: options.gitTimeout }),
    path: new LocalPathBackend(),
  }
}

export { GitCliBackend, repoHash } from './git/backend.js'
export type { GitCliBackendOptions } from './git/backend.js'
export { MANIFEST_FILE, parseManifest, readManifest } from './manifest.js'
export type { ManifestInfo } from './manifest.js'
export { LocalPathBackend } from './path.js'
export { CrateRegistryBackend, sha256Hex } from './registry/backend.js'
export type { CrateRegistryBackendOptions } from './registry/backend.js'
export { downloadUrl, parseIndexFile, parseRegistryConfig } from './registry/index-entry.js'
export type { IndexLine, RegistryConfig } from './registry/index-entry.js'
export { indexPath, indexPrefix } from './registry/index-path.js'
export type {
  BackendContext,
  GitBackend,
  GitMaterializeRequest,
  PathBackend,
  RegistryBackend,
  RegistryMaterializeRequest,
  RegistryVersion,
  ResolvedIdentity,
  SourceBackends,
} from './types.js'
