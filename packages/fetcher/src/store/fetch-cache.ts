/**
 * Fetch cache: turns pinned packages into package roots on disk.
 *
 * Per fingerprint, an entry moves `absent -> in-progress -> complete`, and
 * back to `absent` if materialization fails. Within one process, concurrent
 * requests for a fingerprint share a single in-flight promise; across
 * processes, a file lock per fingerprint serializes the work. Entries are
 * built under `.tmp/` and published with one rename, so a marker never
 * exists without its contents.
 */

import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'

import { isDirectory, makeTempDir, publishDir, removeDir, writeJsonDurable } from '../core/atomic.js'
import {
  CacheCorruptionError,
  ConstraintNotSatisfiedError,
  FetchCancelledError,
  type FetcherError,
  InvalidPackageLayoutError,
  classifyError,
} from '../core/errors.js'
import { type LockOptions, acquireLock, isLocked, withLock } from '../core/locks.js'
import { type Logger, silentLogger } from '../core/logger.js'
import type { CacheEntryMetadata } from '../core/types/cache.js'
import type { GitConstraintPolicy } from '../core/types/config.js'
import { type Package, packageId } from '../core/types/package.js'
import { type GitSource, type PathSource, type RegistrySource, sourceLocator } from '../core/types/source.js'
import { versionsEqual } from '../core/types/version.js'
import type { BackendContext, ResolvedIdentity, SourceBackends } from '../backends/types.js'
import {
  type CacheEntry,
  type EntryKey,
  computeDirSize,
  entryFingerprint,
  inspectEntry,
} from './entry.js'
import { type CacheLayout, ENTRY_CONTENTS, ENTRY_MARKER, isFingerprint } from './paths.js'
import { FetchScope, type ScopeOptions } from './scope.js'

/** How a root was obtained */
export type FetchOrigin = 'cached' | 'fetched' | 'recovered' | 'local'

export interface FetchOutcome {
  package: Package
  /** Package root on disk */
  root: string
  /** Entry fingerprint; undefined for local paths, which have no entry */
  fingerprint?: string | undefined
  /** Commit materialized, for git sources */
  commit?: string | undefined
  origin: FetchOrigin
}

export type EntryState = 'absent' | 'in-progress' | 'complete'

export interface FetchCacheOptions {
  layout: CacheLayout
  backends: SourceBackends
  logger?: Logger | undefined
  lock?: LockOptions | undefined
  /** How git packages whose manifest disagrees with the pinned version are treated */
  gitConstraintPolicy?: GitConstraintPolicy | undefined
}

export type GetOrFetchOptions = ScopeOptions

/** Resolved cache key of a pinned package */
interface ResolvedKey extends EntryKey {
  fingerprint: string
  commit?: string | undefined
}

/** Shared state of one fingerprint being fetched in this process */
interface InFlight {
  promise: Promise<FetchOutcome>
  controller: AbortController
  waiters: number
}

/** Locator of the physical content: git entries are shared across references */
function entryLocator(source: RegistrySource | GitSource): string {
  return source.kind === 'git' ? `git+${source.url}` : sourceLocator(source)
}

export class FetchCache {
  readonly layout: CacheLayout
  private readonly backends: SourceBackends
  private readonly logger: Logger
  private readonly lockOptions: LockOptions
  private readonly gitConstraintPolicy: GitConstraintPolicy
  private readonly inFlight = new Map<string, InFlight>()

  constructor(options: FetchCacheOptions) {
    this.layout = options.layout
    this.backends = options.backends
    this.logger = options.logger ?? silentLogger
    this.lockOptions = options.lock ?? {}
    this.gitConstraintPolicy = options.gitConstraintPolicy ?? 'semver'
  }

  // ==========================================================================
  // Fetching
  // ==========================================================================

  /**
   * Return the root of a pinned package, materializing it on first use
   *
   * @throws FetchTimeoutError if `timeout` elapses first
   * @throws FetchCancelledError if `signal` is aborted first
   * @throws CacheCorruptionError if a corrupt entry could not be refetched
   */
  async getOrFetch(pkg: Package, options: GetOrFetchOptions = {}): Promise<FetchOutcome> {
    const source = pkg.source
    const locator = sourceLocator(source)
    const scope = new FetchScope(packageId(pkg), options)
    try {
      if (source.kind === 'path') {
        return await scope.race(this.fetchLocal(pkg, source, scope.signal))
      }
      const key = await scope.race(this.resolveKey(pkg, source, scope.signal))
      return await this.join(pkg, source, key, scope)
    } catch (err) {
      throw classifyError(err, locator)
    } finally {
      scope.dispose()
    }
  }

  /** Cache key of a pinned package; git references are resolved to a commit */
  async resolveKey(pkg: Package, source: RegistrySource | GitSource, signal?: AbortSignal): Promise<ResolvedKey> {
    const locator = entryLocator(source)
    if (source.kind !== 'git') {
      const key: EntryKey = { kind: source.kind, locator, name: pkg.name, revision: pkg.version.raw }
      return { ...key, fingerprint: entryFingerprint(key) }
    }
    const commit = await this.backends.git.resolveReference(pkg.name, source, this.context(signal))
    const key: EntryKey = { kind: 'git', locator, name: pkg.name, revision: commit }
    return { ...key, fingerprint: entryFingerprint(key), commit }
  }

  private async fetchLocal(pkg: Package, source: PathSource, signal: AbortSignal): Promise<FetchOutcome> {
    const identity = await this.backends.path.inspect(pkg.name, source, this.context(signal))
    if (!versionsEqual(identity.version, pkg.version)) {
      throw new ConstraintNotSatisfiedError(pkg.name, `=${pkg.version.raw}`, [identity.version.raw])
    }
    return { package: pkg, root: join(source.dir, identity.subdir), origin: 'local' }
  }

  /**
   * Wait for the fingerprint's in-flight fetch, starting one if needed. The
   * shared fetch is aborted only once every waiting caller has given up, and
   * the last one leaves only after the temp directory and lock are released.
   */
  private async join(
    pkg: Package,
    source: RegistrySource | GitSource,
    key: ResolvedKey,
    scope: FetchScope
  ): Promise<FetchOutcome> {
    let flight = this.inFlight.get(key.fingerprint)
    // A fetch whose waiters all gave up is winding down; start afresh behind its lock
    if (flight === undefined || flight.controller.signal.aborted) {
      const controller = new AbortController()
      const created: InFlight = {
        controller,
        waiters: 0,
        promise: this.fetchEntry(pkg, source, key, controller.signal),
      }
      const settle = (): void => {
        if (this.inFlight.get(key.fingerprint) === created) this.inFlight.delete(key.fingerprint)
      }
      created.promise.then(settle, settle)
      this.inFlight.set(key.fingerprint, created)
      flight = created
    } else {
      this.logger.debug(`waiting for in-flight fetch of ${packageId(pkg)}`)
    }

    flight.waiters += 1
    try {
      const outcome = await scope.race(flight.promise)
      return { ...outcome, package: pkg }
    } finally {
      flight.waiters -= 1
      if (scope.aborted && flight.waiters === 0) {
        flight.controller.abort(new FetchCancelledError())
        await flight.promise.then(
          () => undefined,
          () => undefined
        )
      }
    }
  }

  private async fetchEntry(
    pkg: Package,
    source: RegistrySource | GitSource,
    key: ResolvedKey,
    signal: AbortSignal
  ): Promise<FetchOutcome> {
    const fast = await inspectEntry(this.layout, key.fingerprint)
    if (fast.state === 'complete') {
      return this.cachedOutcome(pkg, fast.entry)
    }

    if (signal.aborted) {
      throw new FetchCancelledError()
    }
    const lock = await acquireLock(this.layout.lock(key.fingerprint), { ...this.lockOptions, signal }).catch(
      (err: unknown) => {
        throw signal.aborted ? new FetchCancelledError() : err
      }
    )
    try {
      // Another process may have completed the entry while we waited
      const current = await inspectEntry(this.layout, key.fingerprint)
      if (current.state === 'complete') {
        return this.cachedOutcome(pkg, current.entry)
      }

      const recovering = current.state === 'corrupt'
      if (current.state === 'corrupt') {
        this.logger.warn(`cache entry for ${packageId(pkg)} is corrupt (${current.reason}); refetching`)
        await removeDir(this.layout.entry(key.fingerprint))
      }

      this.logger.status('Fetching', `${pkg.name} v${pkg.version.raw}`)
      let entry: CacheEntry
      try {
        entry = await this.materialize(pkg, source, key, signal)
      } catch (err) {
        const failure: FetcherError = signal.aborted ? new FetchCancelledError() : classifyError(err, sourceLocator(pkg.source))
        if (recovering && !signal.aborted) {
          throw new CacheCorruptionError(key.fingerprint, `refetch failed: ${failure.message}`, { cause: failure })
        }
        throw failure
      }

      if (recovering) {
        this.logger.status('Recovered', `${pkg.name} v${pkg.version.raw}`)
      }
      return {
        package: pkg,
        root: entry.root,
        fingerprint: key.fingerprint,
        commit: entry.metadata.commit,
        origin: recovering ? 'recovered' : 'fetched',
      }
    } finally {
      await lock.release()
    }
  }

  private cachedOutcome(pkg: Package, entry: CacheEntry): FetchOutcome {
    this.logger.debug(`cached ${packageId(pkg)} at ${entry.root}`)
    return {
      package: pkg,
      root: entry.root,
      fingerprint: entry.fingerprint,
      commit: entry.metadata.commit,
      origin: 'cached',
    }
  }

  /**
   * Build the entry in a temp directory and publish it. The temp directory
   * is removed on every failure path.
   */
  private async materialize(
    pkg: Package,
    source: RegistrySource | GitSource,
    key: ResolvedKey,
    signal: AbortSignal
  ): Promise<CacheEntry> {
    if (signal.aborted) {
      throw new FetchCancelledError()
    }
    const tmp = await makeTempDir(this.layout.temp, key.fingerprint)
    try {
      const dest = join(tmp, ENTRY_CONTENTS)
      const ctx = this.context(signal)

      let identity: ResolvedIdentity
      if (source.kind === 'git') {
        if (key.commit === undefined) {
          throw new InvalidPackageLayoutError(source.url, 'git entry has no commit')
        }
        identity = await this.backends.git.materialize({ name: pkg.name, source, commit: key.commit, dest }, ctx)
        if (this.gitConstraintPolicy === 'semver' && !versionsEqual(identity.version, pkg.version)) {
          throw new ConstraintNotSatisfiedError(pkg.name, `=${pkg.version.raw}`, [identity.version.raw])
        }
      } else {
        identity = await this.backends.registry.materialize({ name: pkg.name, version: pkg.version, source, dest }, ctx)
      }

      if (signal.aborted) {
        throw new FetchCancelledError()
      }

      const root = join(dest, identity.subdir)
      if (!(await isDirectory(root))) {
        throw new InvalidPackageLayoutError(root, 'backend produced no package root')
      }

      const metadata: CacheEntryMetadata = {
        formatVersion: 1,
        fingerprint: key.fingerprint,
        name: pkg.name,
        version: identity.version.raw,
        sourceKind: key.kind,
        locator: key.locator,
        subdir: identity.subdir,
        createdAt: new Date().toISOString(),
      }
      if (key.commit !== undefined) {
        metadata.commit = key.commit
      }
      await writeJsonDurable(join(tmp, ENTRY_MARKER), metadata)

      const published = await publishDir(tmp, this.layout.entry(key.fingerprint))
      const inspection = await inspectEntry(this.layout, key.fingerprint)
      if (inspection.state !== 'complete') {
        throw new CacheCorruptionError(key.fingerprint, 'entry vanished after publishing')
      }
      if (published === 'exists') {
        this.logger.debug(`entry ${key.fingerprint} was published concurrently`)
      }
      return inspection.entry
    } catch (err) {
      await removeDir(tmp)
      throw err
    }
  }

  private context(signal: AbortSignal | undefined): BackendContext {
    return { signal, logger: this.logger }
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  /** State of one fingerprint; in-progress while any process holds its lock */
  async entryState(fingerprint: string): Promise<EntryState> {
    if (!isFingerprint(fingerprint)) {
      return 'absent'
    }
    if (this.inFlight.has(fingerprint) || (await isLocked(this.layout.lock(fingerprint), this.lockOptions))) {
      return 'in-progress'
    }
    const inspection = await inspectEntry(this.layout, fingerprint)
    return inspection.state === 'complete' ? 'complete' : 'absent'
  }

  /** A complete entry, or null */
  async readEntry(fingerprint: string): Promise<CacheEntry | null> {
    if (!isFingerprint(fingerprint)) {
      return null
    }
    const inspection = await inspectEntry(this.layout, fingerprint)
    return inspection.state === 'complete' ? inspection.entry : null
  }

  /** Every complete entry under the cache root, ordered by fingerprint */
  async listEntries(): Promise<CacheEntry[]> {
    let names: string[]
    try {
      names = await readdir(this.layout.root)
    } catch (err) {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
        return []
      }
      throw err
    }

    const entries: CacheEntry[] = []
    for (const name of names.filter(isFingerprint).sort()) {
      const entry = await this.readEntry(name)
      if (entry !== null) entries.push(entry)
    }
    return entries
  }

  /**
   * Delete one entry under its lock
   *
   * @returns Whether an entry directory existed
   */
  async removeEntry(fingerprint: string): Promise<boolean> {
    if (!isFingerprint(fingerprint)) {
      return false
    }
    return withLock(
      this.layout.lock(fingerprint),
      async () => {
        const dir = this.layout.entry(fingerprint)
        const existed = await isDirectory(dir)
        await removeDir(dir)
        return existed
      },
      this.lockOptions
    )
  }

  /** Size in bytes of an entry's files, or null if there is no such entry */
  async entrySize(fingerprint: string): Promise<number | null> {
    if (!isFingerprint(fingerprint) || !(await isDirectory(this.layout.entry(fingerprint)))) {
      return null
    }
    return computeDirSize(this.layout.entry(fingerprint))
  }

  /**
   * Remove temp directories left behind by crashed processes: those older
   * than the stale-lock threshold whose fingerprint is not locked.
   *
   * @returns Number of directories removed
   */
  async pruneTemp(options: { olderThan?: number | undefined } = {}): Promise<number> {
    const olderThan = options.olderThan ?? this.lockOptions.stale ?? 30000
    let names: string[]
    try {
      names = await readdir(this.layout.temp)
    } catch (err) {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
        return 0
      }
      throw err
    }

    const now = Date.now()
    let removed = 0
    for (const name of names) {
      const dir = join(this.layout.temp, name)
      const fingerprint = name.split('.')[0] ?? ''
      const stats = await stat(dir)
      if (now - stats.mtimeMs < olderThan) continue
      if (this.inFlight.has(fingerprint)) continue
      if (isFingerprint(fingerprint) && (await isLocked(this.layout.lock(fingerprint), this.lockOptions))) continue
      await removeDir(dir)
      removed += 1
    }
    return removed
  }
}
