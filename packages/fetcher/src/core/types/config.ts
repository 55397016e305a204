/**
 * Configuration file types (`config.toml` in the cache root, or any file
 * passed explicitly).
 */

/** Output level, from least to most chatty */
export type Verbosity = 'quiet' | 'normal' | 'verbose'

/**
 * How version constraints apply to git sources:
 * - `semver`: the manifest version at the resolved commit must satisfy the constraint
 * - `reference`: the git reference is authoritative and the constraint is ignored
 */
export type GitConstraintPolicy = 'semver' | 'reference'

/** Parsed and schema-validated configuration file */
export interface FetcherConfigFile {
  'cache-root'?: string
  verbosity?: Verbosity
  fetch?: {
    'max-parallel'?: number
    'timeout-ms'?: number
    'fail-fast'?: boolean
  }
  resolve?: {
    'git-constraints'?: GitConstraintPolicy
    'allow-yanked'?: string[]
  }
  'crates-io'?: {
    index?: string
  }
  registries?: Record<string, string>
  git?: {
    'timeout-ms'?: number
  }
  lock?: {
    'timeout-ms'?: number
    'stale-ms'?: number
  }
}
