/**
 * Fetcher facade: resolution plus cache-aware fetching for batches of
 * packages, with a bounded worker pool.
 */

import { randomBytes } from 'node:crypto'
import { access, constants, mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import pLimit from 'p-limit'

import type { SourceBackends } from '../backends/types.js'
import { createDefaultBackends } from '../backends/index.js'
import {
  type FetcherSettings,
  type SettingsOverrides,
  getCacheHome,
  loadConfigFile,
  resolveSettings,
} from '../core/config.js'
import {
  BatchFetchError,
  FetchCancelledError,
  type FetcherError,
  InitializationError,
  classifyError,
} from '../core/errors.js'
import { type Logger, createLogger } from '../core/logger.js'
import type { FetcherConfigFile } from '../core/types/config.js'
import {
  type Package,
  type PackageQuery,
  createQuery,
  isPackage,
  packageId,
  queryLabel,
} from '../core/types/package.js'
import { type PackageSource, sourceLocator } from '../core/types/source.js'
import { ANY_VERSION, type VersionConstraint, formatConstraint } from '../core/types/version.js'
import { Resolver } from '../resolver/resolve.js'
import { FetchCache, type FetchOrigin } from '../store/fetch-cache.js'
import { CacheLayout } from '../store/paths.js'
import { FetchScope } from '../store/scope.js'

export interface PackageFetcherOptions extends SettingsOverrides {
  /** Config file to load; when omitted, `<cache-root>/config.toml` is used if present */
  configFile?: string | undefined
  /** Replace the default backend for any source kind */
  backends?: Partial<SourceBackends> | undefined
  logger?: Logger | undefined
  /** Environment used for default locations (default: process.env) */
  env?: Readonly<Record<string, string | undefined>> | undefined
}

export interface ResolveCallOptions {
  signal?: AbortSignal | undefined
  /** Packages (or package ids) whose yanked versions stay eligible */
  allowYanked?: Iterable<Package | string> | undefined
}

export interface FetchOptions {
  signal?: AbortSignal | undefined
  /** Deadline for resolving and fetching this package, in milliseconds */
  timeout?: number | undefined
}

export interface FetchManyOptions {
  /** Stop starting new work after the first failure */
  failFast?: boolean | undefined
  /** Bound on concurrently fetched packages */
  maxParallelFetches?: number | undefined
  /** Deadline per package, in milliseconds */
  timeoutPerFetch?: number | undefined
  signal?: AbortSignal | undefined
}

export type PackageFetchResult =
  | {
      status: 'ok'
      package: Package
      root: string
      origin: FetchOrigin
      fingerprint?: string | undefined
    }
  | {
      status: 'error'
      /** The pinned package, when resolution got that far */
      package?: Package | undefined
      error: FetcherError
    }

export interface FetchReport {
  /** Keyed by package id, or by query label when resolution failed */
  results: Map<string, PackageFetchResult>
  roots: Map<string, string>
  errors: Map<string, FetcherError>
  ok: boolean
}

/** Anything `fetch` accepts: a pinned package or a query */
export type FetchItem = Package | PackageQuery

function itemLabel(item: FetchItem): string {
  return isPackage(item) ? packageId(item) : queryLabel(item)
}

function toConstraint(constraint: VersionConstraint | string | undefined): VersionConstraint | string {
  return constraint ?? ANY_VERSION
}

async function checkWritable(root: string): Promise<void> {
  await mkdir(root, { recursive: true })
  await access(root, constants.W_OK)
  const marker = join(root, `.write-check-${randomBytes(4).toString('hex')}`)
  await writeFile(marker, '')
  await rm(marker, { force: true })
}

export class PackageFetcher {
  readonly settings: FetcherSettings
  readonly layout: CacheLayout
  readonly cache: FetchCache
  readonly resolver: Resolver
  private readonly logger: Logger

  private constructor(settings: FetcherSettings, layout: CacheLayout, backends: SourceBackends, logger: Logger) {
    this.settings = settings
    this.logger = logger
    this.layout = layout
    this.resolver = new Resolver({
      backends,
      logger,
      gitConstraintPolicy: settings.gitConstraintPolicy,
      allowYanked: settings.allowYanked,
    })
    this.cache = new FetchCache({
      layout: this.layout,
      backends,
      logger,
      lock: settings.lock,
      gitConstraintPolicy: settings.gitConstraintPolicy,
    })
  }

  /**
   * Load configuration, prepare the cache root and build the backends
   *
   * @throws ConfigParseError or ConfigValidationError for a bad config file
   * @throws InitializationError if the cache root cannot be created or written
   */
  static async create(options: PackageFetcherOptions = {}): Promise<PackageFetcher> {
    const env = options.env ?? process.env
    let file: FetcherConfigFile | undefined
    if (options.configFile !== undefined) {
      file = await loadConfigFile(options.configFile)
    } else {
      const root = options.cacheRoot ?? getCacheHome(env)
      file = await loadConfigFile(new CacheLayout(root).configFile, { optional: true })
    }

    const settings = resolveSettings(file, options, env)
    const layout = new CacheLayout(settings.cacheRoot)
    try {
      await checkWritable(layout.root)
      await layout.ensureAll()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new InitializationError(settings.cacheRoot, message, { cause: err })
    }

    const logger = options.logger ?? createLogger({ verbosity: settings.verbosity })
    const backends: SourceBackends = {
      ...createDefaultBackends({ layout, lock: settings.lock, gitTimeout: settings.gitTimeoutMs }),
      ...options.backends,
    }
    return new PackageFetcher(settings, layout, backends, logger)
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Pin a package to the highest version matching `constraint` (default: any)
   */
  async resolvePackage(
    name: string,
    constraint: VersionConstraint | string | undefined,
    source: PackageSource,
    options: ResolveCallOptions = {}
  ): Promise<Package> {
    const query = createQuery(name, toConstraint(constraint), source)
    return this.resolver.resolvePackage(query, this.resolveOptions(options))
  }

  /** Same as resolvePackage */
  async resolveFirst(
    name: string,
    constraint: VersionConstraint | string | undefined,
    source: PackageSource,
    options: ResolveCallOptions = {}
  ): Promise<Package> {
    return this.resolvePackage(name, constraint, source, options)
  }

  /** Every version matching `constraint`, highest first */
  async resolveAll(
    name: string,
    constraint: VersionConstraint | string | undefined,
    source: PackageSource,
    options: ResolveCallOptions = {}
  ): Promise<Package[]> {
    const query = createQuery(name, toConstraint(constraint), source)
    return this.resolver.resolveAll(query, this.resolveOptions(options))
  }

  private resolveOptions(options: ResolveCallOptions): {
    signal: AbortSignal | undefined
    allowYanked: ReadonlySet<string>
  } {
    const ids = [...(options.allowYanked ?? [])].map((entry) => (typeof entry === 'string' ? entry : packageId(entry)))
    return { signal: options.signal, allowYanked: new Set(ids) }
  }

  // ==========================================================================
  // Fetching
  // ==========================================================================

  /**
   * Fetch one package or query and return its root directory
   */
  async fetch(item: FetchItem, options: FetchOptions = {}): Promise<string> {
    const result = await this.fetchOne(item, {
      signal: options.signal,
      timeout: options.timeout ?? this.settings.fetch.timeoutMs,
    })
    if (result.status === 'error') {
      throw result.error
    }
    return result.root
  }

  /**
   * Fetch a batch. Failures are reported per package; the batch itself only
   * rejects on programming errors.
   */
  async fetchMany(items: readonly FetchItem[], options: FetchManyOptions = {}): Promise<FetchReport> {
    const failFast = options.failFast ?? this.settings.fetch.failFast
    const timeout = options.timeoutPerFetch ?? this.settings.fetch.timeoutMs
    const limit = pLimit(Math.max(1, options.maxParallelFetches ?? this.settings.fetch.maxParallel))

    const unique = new Map<string, FetchItem>()
    for (const item of items) {
      const label = itemLabel(item)
      if (!unique.has(label)) unique.set(label, item)
    }

    const results = new Map<string, PackageFetchResult>()
    let stopped = false

    await Promise.all(
      [...unique].map(([label, item]) =>
        limit(async () => {
          if (stopped || options.signal?.aborted) {
            results.set(label, {
              status: 'error',
              package: isPackage(item) ? item : undefined,
              error: new FetchCancelledError(`Not started: ${label}`),
            })
            return
          }

          const result = await this.fetchOne(item, { signal: options.signal, timeout })
          const key = result.package === undefined ? label : packageId(result.package)
          results.set(key, result)
          if (result.status === 'error' && failFast && !stopped) {
            stopped = true
            this.logger.warn(`stopping batch after failure of ${key}`)
          }
        })
      )
    )

    const roots = new Map<string, string>()
    const errors = new Map<string, FetcherError>()
    for (const [key, result] of results) {
      if (result.status === 'ok') {
        roots.set(key, result.root)
      } else {
        errors.set(key, result.error)
      }
    }
    return { results, roots, errors, ok: errors.size === 0 }
  }

  /**
   * Fetch a batch and return the roots keyed by package id
   *
   * @throws BatchFetchError if any package failed
   */
  async fetchRoots(items: readonly FetchItem[], options: FetchManyOptions = {}): Promise<Map<string, string>> {
    const report = await this.fetchMany(items, options)
    if (!report.ok) {
      throw new BatchFetchError(report.errors)
    }
    return report.roots
  }

  /** Resolve (if needed) and fetch one item; never rejects */
  private async fetchOne(item: FetchItem, options: FetchOptions): Promise<PackageFetchResult> {
    const scope = new FetchScope(itemLabel(item), options)
    let pkg: Package | undefined
    try {
      if (isPackage(item)) {
        pkg = item
      } else {
        pkg = await scope.race(this.resolver.resolvePackage(item, { signal: scope.signal }))
        this.logger.status('Resolved', `${item.name} ${formatConstraint(item.constraint)} -> v${pkg.version.raw}`)
      }
      const outcome = await this.cache.getOrFetch(pkg, { signal: scope.signal })
      if (outcome.origin === 'cached') {
        this.logger.status('Cached', `${pkg.name} v${pkg.version.raw}`)
      }
      return {
        status: 'ok',
        package: pkg,
        root: outcome.root,
        origin: outcome.origin,
        fingerprint: outcome.fingerprint,
      }
    } catch (err) {
      const error = scope.aborted ? scope.reason() : classifyError(err, sourceLocator(item.source))
      this.logger.debug(`${pkg === undefined ? itemLabel(item) : packageId(pkg)} failed: ${error.message}`)
      return { status: 'error', package: pkg, error }
    } finally {
      scope.dispose()
    }
  }
}
