/**
 * Source backend capability interfaces.
 *
 * Each source kind has one capability interface. The resolver and the fetch
 * cache dispatch on `source.kind` once and talk only to these interfaces, so
 * any conforming implementation can be substituted per kind.
 */

import type { Logger } from '../core/logger.js'
import type { GitSource, PathSource, RegistrySource } from '../core/types/source.js'
import type { Version } from '../core/types/version.js'

/** Per-call context handed to every backend operation */
export interface BackendContext {
  /** Aborted on timeout or cancellation; backends should stop promptly */
  signal?: AbortSignal | undefined
  logger: Logger
}

/** One version listed by a registry index */
export interface RegistryVersion {
  version: Version
  yanked: boolean
  /** sha256 of the `.crate` archive, when the index records it */
  checksum?: string | undefined
}

/** What a backend actually produced */
export interface ResolvedIdentity {
  version: Version
  /** Commit materialized, for git sources */
  commit?: string | undefined
  /** Package root relative to the materialized tree ('' for the tree root) */
  subdir: string
}

export interface RegistryMaterializeRequest {
  name: string
  version: Version
  source: RegistrySource
  /** Empty directory to populate */
  dest: string
}

export interface GitMaterializeRequest {
  name: string
  source: GitSource
  commit: string
  /** Empty directory to populate */
  dest: string
}

export interface RegistryBackend {
  /**
   * @throws PackageNotFoundError if the index does not know the name
   * @throws SourceUnavailableError on transport failures
   */
  listVersions(name: string, source: RegistrySource, ctx: BackendContext): Promise<RegistryVersion[]>
  materialize(request: RegistryMaterializeRequest, ctx: BackendContext): Promise<ResolvedIdentity>
}

export interface GitBackend {
  /**
   * Resolve the source's reference to a full commit hash; `name` is the
   * package being resolved, for error context
   *
   * @throws RevisionNotFoundError if the reference does not exist
   */
  resolveReference(name: string, source: GitSource, ctx: BackendContext): Promise<string>
  /** Version declared by the package's manifest at `commit` */
  readVersion(name: string, source: GitSource, commit: string, ctx: BackendContext): Promise<Version>
  materialize(request: GitMaterializeRequest, ctx: BackendContext): Promise<ResolvedIdentity>
}

export interface PathBackend {
  /**
   * Validate a local package directory and read its version
   *
   * @throws PathNotFoundError if the directory does not exist
   * @throws InvalidPackageLayoutError if it holds no matching manifest
   */
  inspect(name: string, source: PathSource, ctx: BackendContext): Promise<ResolvedIdentity>
}

/** One backend per source kind */
export interface SourceBackends {
  registry: RegistryBackend
  git: GitBackend
  path: PathBackend
}
