/**
 * Package resolution: turn a query (name + constraint + source) into a
 * pinned package.
 *
 * The selection rule is the highest version, by semver precedence, that
 * satisfies the constraint. Path sources have exactly one version; git
 * sources take theirs from the manifest at the resolved commit.
 */

import { ConstraintNotSatisfiedError, PackageNotFoundError, classifyError } from '../core/errors.js'
import { type Logger, silentLogger } from '../core/logger.js'
import type { GitConstraintPolicy } from '../core/types/config.js'
import { type Package, type PackageQuery, createPackage, packageId } from '../core/types/package.js'
import { sourceLocator } from '../core/types/source.js'
import { type Version, formatConstraint, matches, sortVersionsDescending } from '../core/types/version.js'
import type { BackendContext, SourceBackends } from '../backends/types.js'

export interface ResolverOptions {
  backends: SourceBackends
  logger?: Logger | undefined
  /** Whether git sources honor version constraints (default: semver) */
  gitConstraintPolicy?: GitConstraintPolicy | undefined
  /** Package ids whose yanked versions stay eligible */
  allowYanked?: ReadonlySet<string> | undefined
}

export interface ResolveOptions {
  signal?: AbortSignal | undefined
  /** Package ids whose yanked versions stay eligible for this call */
  allowYanked?: ReadonlySet<string> | undefined
}

export class Resolver {
  private readonly backends: SourceBackends
  private readonly logger: Logger
  private readonly gitConstraintPolicy: GitConstraintPolicy
  private readonly allowYanked: ReadonlySet<string>

  constructor(options: ResolverOptions) {
    this.backends = options.backends
    this.logger = options.logger ?? silentLogger
    this.gitConstraintPolicy = options.gitConstraintPolicy ?? 'semver'
    this.allowYanked = options.allowYanked ?? new Set()
  }

  /**
   * Pin a query to the highest matching version
   *
   * @throws PackageNotFoundError if the source does not know the name
   * @throws ConstraintNotSatisfiedError if no eligible version matches
   */
  async resolvePackage(query: PackageQuery, options: ResolveOptions = {}): Promise<Package> {
    const candidates = await this.candidates(query, options)
    const matching = candidates.eligible.filter((pkg) => this.accepts(query, pkg))
    const [best] = matching
    if (best === undefined) {
      throw new ConstraintNotSatisfiedError(
        query.name,
        formatConstraint(query.constraint),
        candidates.eligible.map((pkg) => pkg.version.raw)
      )
    }
    this.logger.debug(`resolved ${query.name} ${formatConstraint(query.constraint)} to ${best.version.raw}`)
    return best
  }

  /**
   * Every version matching a query, highest first; empty when none match
   *
   * @throws PackageNotFoundError if the source does not know the name
   */
  async resolveAll(query: PackageQuery, options: ResolveOptions = {}): Promise<Package[]> {
    const candidates = await this.candidates(query, options)
    return candidates.eligible.filter((pkg) => this.accepts(query, pkg))
  }

  private accepts(query: PackageQuery, pkg: Package): boolean {
    if (query.source.kind === 'git' && this.gitConstraintPolicy === 'reference') {
      return true
    }
    return matches(query.constraint, pkg.version)
  }

  private yankAllowed(id: string, options: ResolveOptions): boolean {
    return this.allowYanked.has(id) || options.allowYanked?.has(id) === true
  }

  /** Eligible packages for a query, highest version first */
  private async candidates(query: PackageQuery, options: ResolveOptions): Promise<{ eligible: Package[] }> {
    const { name, source } = query
    const ctx: BackendContext = { signal: options.signal, logger: this.logger }
    const pin = (version: Version): Package => createPackage(name, version, source)

    try {
      switch (source.kind) {
        case 'path': {
          const identity = await this.backends.path.inspect(name, source, ctx)
          return { eligible: [pin(identity.version)] }
        }
        case 'git': {
          const commit = await this.backends.git.resolveReference(name, source, ctx)
          const version = await this.backends.git.readVersion(name, source, commit, ctx)
          return { eligible: [pin(version)] }
        }
        default: {
          const listed = await this.backends.registry.listVersions(name, source, ctx)
          if (listed.length === 0) {
            throw new PackageNotFoundError(name, sourceLocator(source))
          }
          const yanked = new Set(listed.filter((entry) => entry.yanked).map((entry) => entry.version.raw))
          const eligible = sortVersionsDescending(listed.map((entry) => entry.version))
            .map(pin)
            .filter((pkg) => !yanked.has(pkg.version.raw) || this.yankAllowed(packageId(pkg), options))
          return { eligible }
        }
      }
    } catch (err) {
      throw classifyError(err, sourceLocator(source))
    }
  }
}
