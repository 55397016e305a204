/**
 * Typed error classes for crate-fetch
 *
 * Error hierarchy:
 * - FetcherError (base)
 *   - InputError (malformed caller input, never retried)
 *     - InvalidSourceError
 *     - InvalidPackageNameError
 *     - InvalidVersionError
 *     - InvalidConstraintError
 *     - ConfigError
 *       - ConfigParseError (TOML parse failures)
 *       - ConfigValidationError (schema validation failures)
 *   - ResolutionError (terminal for the package)
 *     - PackageNotFoundError
 *     - ConstraintNotSatisfiedError
 *     - RevisionNotFoundError
 *   - BackendError (backend/environment failures)
 *     - SourceUnavailableError (the only retryable kind)
 *       - FetchTimeoutError
 *     - PathNotFoundError
 *     - InvalidPackageLayoutError
 *     - IntegrityError
 *   - CacheCorruptionError (only surfaced when self-heal fails)
 *   - FetchCancelledError
 *   - InitializationError
 *   - LockError
 *     - LockTimeoutError
 *   - GitError (git subprocess failures)
 *   - BatchFetchError (aggregate of per-package failures)
 */

import type { ValidationError } from './schemas/index.js'

/** Broad failure classification shared by every error in the taxonomy */
export type ErrorKind =
  | 'input'
  | 'resolution'
  | 'backend'
  | 'cache'
  | 'cancelled'
  | 'initialization'
  | 'lock'
  | 'git'
  | 'batch'

export interface FetcherErrorOptions {
  cause?: unknown
}

/** Base error class for all crate-fetch errors */
export class FetcherError extends Error {
  readonly code: string
  readonly kind: ErrorKind

  constructor(message: string, code: string, kind: ErrorKind, options: FetcherErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'FetcherError'
    this.code = code
    this.kind = kind
    Error.captureStackTrace?.(this, this.constructor)
  }

  /** Whether a caller may reasonably retry the failed operation */
  get retryable(): boolean {
    return false
  }
}

// ============================================================================
// Input errors
// ============================================================================

/** Base class for malformed caller input */
export class InputError extends FetcherError {
  constructor(message: string, code: string, options: FetcherErrorOptions = {}) {
    super(message, code, 'input', options)
    this.name = 'InputError'
  }
}

/** Error thrown when a package source cannot be constructed */
export class InvalidSourceError extends InputError {
  readonly input: string

  constructor(message: string, input: string, options: FetcherErrorOptions = {}) {
    super(`${message}: "${input}"`, 'INVALID_SOURCE', options)
    this.name = 'InvalidSourceError'
    this.input = input
  }
}

/** Error thrown when a package name is not a valid registry name */
export class InvalidPackageNameError extends InputError {
  readonly input: string

  constructor(input: string) {
    super(`Invalid package name: "${input}"`, 'INVALID_PACKAGE_NAME')
    this.name = 'InvalidPackageNameError'
    this.input = input
  }
}

/** Error thrown when a version string is not valid semver */
export class InvalidVersionError extends InputError {
  readonly input: string

  constructor(input: string) {
    super(`Invalid version: "${input}"`, 'INVALID_VERSION')
    this.name = 'InvalidVersionError'
    this.input = input
  }
}

/** Error thrown when a version constraint cannot be parsed */
export class InvalidConstraintError extends InputError {
  readonly input: string

  constructor(input: string, reason?: string) {
    super(
      reason ? `Invalid version constraint "${input}": ${reason}` : `Invalid version constraint: "${input}"`,
      'INVALID_CONSTRAINT'
    )
    this.name = 'InvalidConstraintError'
    this.input = input
  }
}

/** Base class for configuration-related errors */
export class ConfigError extends InputError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(`${message} (${source})`, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Resolution errors
// ============================================================================

/** Base class for resolution-related errors */
export class ResolutionError extends FetcherError {
  readonly packageName: string

  constructor(message: string, code: string, packageName: string) {
    super(message, code, 'resolution')
    this.name = 'ResolutionError'
    this.packageName = packageName
  }
}

/** Error thrown when a source does not know a package name */
export class PackageNotFoundError extends ResolutionError {
  readonly locator: string

  constructor(packageName: string, locator: string) {
    super(`Package "${packageName}" not found in ${locator}`, 'PACKAGE_NOT_FOUND', packageName)
    this.name = 'PackageNotFoundError'
    this.locator = locator
  }
}

/** Error thrown when no available version satisfies a constraint */
export class ConstraintNotSatisfiedError extends ResolutionError {
  readonly constraint: string
  readonly available: string[]

  constructor(packageName: string, constraint: string, available: string[]) {
    const candidates = available.length > 0 ? available.join(', ') : 'none'
    super(
      `No version of "${packageName}" matches "${constraint}" (available: ${candidates})`,
      'CONSTRAINT_NOT_SATISFIED',
      packageName
    )
    this.name = 'ConstraintNotSatisfiedError'
    this.constraint = constraint
    this.available = available
  }
}

/** Error thrown when a git reference does not resolve to a commit */
export class RevisionNotFoundError extends ResolutionError {
  readonly url: string
  readonly reference: string

  constructor(packageName: string, url: string, reference: string) {
    super(
      `Git reference "${reference}" not found in ${url}`,
      'REVISION_NOT_FOUND',
      packageName
    )
    this.name = 'RevisionNotFoundError'
    this.url = url
    this.reference = reference
  }
}

// ============================================================================
// Backend errors
// ============================================================================

/** Base class for backend and environment failures */
export class BackendError extends FetcherError {
  constructor(message: string, code: string, options: FetcherErrorOptions = {}) {
    super(message, code, 'backend', options)
    this.name = 'BackendError'
  }
}

/** Error thrown for transient network or registry failures */
export class SourceUnavailableError extends BackendError {
  readonly locator: string

  constructor(locator: string, message: string, options: FetcherErrorOptions = {}) {
    super(`Source unavailable (${locator}): ${message}`, 'SOURCE_UNAVAILABLE', options)
    this.name = 'SourceUnavailableError'
    this.locator = locator
  }

  override get retryable(): boolean {
    return true
  }
}

/** Error thrown when a single fetch exceeds its deadline */
export class FetchTimeoutError extends SourceUnavailableError {
  readonly timeout: number

  constructor(locator: string, timeout: number) {
    super(locator, `timed out after ${timeout}ms`)
    this.name = 'FetchTimeoutError'
    this.timeout = timeout
  }
}

/** Error thrown when a local package directory does not exist */
export class PathNotFoundError extends BackendError {
  readonly path: string

  constructor(path: string) {
    super(`Package path does not exist: ${path}`, 'PATH_NOT_FOUND')
    this.name = 'PathNotFoundError'
    this.path = path
  }
}

/** Error thrown when package contents are not laid out as expected */
export class InvalidPackageLayoutError extends BackendError {
  readonly path: string

  constructor(path: string, message: string) {
    super(`Invalid package layout at ${path}: ${message}`, 'INVALID_PACKAGE_LAYOUT')
    this.name = 'InvalidPackageLayoutError'
    this.path = path
  }
}

/** Error thrown when a downloaded archive does not match its checksum */
export class IntegrityError extends BackendError {
  readonly expected: string
  readonly actual: string
  readonly path: string

  constructor(path: string, expected: string, actual: string) {
    super(`Checksum mismatch for "${path}": expected ${expected}, got ${actual}`, 'INTEGRITY_ERROR')
    this.name = 'IntegrityError'
    this.path = path
    this.expected = expected
    this.actual = actual
  }
}

// ============================================================================
// Cache, scheduling and construction errors
// ============================================================================

/** Error thrown when a corrupt cache entry could not be repaired */
export class CacheCorruptionError extends FetcherError {
  readonly fingerprint: string

  constructor(fingerprint: string, message: string, options: FetcherErrorOptions = {}) {
    super(`Cache entry ${fingerprint} is corrupt: ${message}`, 'CACHE_CORRUPTION', 'cache', options)
    this.name = 'CacheCorruptionError'
    this.fingerprint = fingerprint
  }
}

/** Error recorded for work that was cancelled before or while it ran */
export class FetchCancelledError extends FetcherError {
  constructor(message = 'Fetch cancelled') {
    super(message, 'FETCH_CANCELLED', 'cancelled')
    this.name = 'FetchCancelledError'
  }
}

/** Error thrown when a fetcher cannot be constructed */
export class InitializationError extends FetcherError {
  readonly cacheRoot: string

  constructor(cacheRoot: string, message: string, options: FetcherErrorOptions = {}) {
    super(`Cannot use cache root "${cacheRoot}": ${message}`, 'INITIALIZATION_ERROR', 'initialization', options)
    this.name = 'InitializationError'
    this.cacheRoot = cacheRoot
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends FetcherError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR', 'lock')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Git errors
// ============================================================================

/** Error thrown during git operations */
export class GitError extends FetcherError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Git command failed (exit ${exitCode}): ${command}\n${stderr}`, 'GIT_ERROR', 'git')
    this.name = 'GitError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// ============================================================================
// Batch errors
// ============================================================================

/** Error thrown when one or more packages of a batch failed */
export class BatchFetchError extends FetcherError {
  readonly failures: ReadonlyMap<string, FetcherError>

  constructor(failures: ReadonlyMap<string, FetcherError>) {
    const lines = [...failures].map(([id, err]) => `  ${id}: ${err.message}`)
    super(`Failed to fetch ${failures.size} package(s):\n${lines.join('\n')}`, 'BATCH_FETCH_ERROR', 'batch')
    this.name = 'BatchFetchError'
    this.failures = failures
  }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Normalize anything thrown by a backend into the taxonomy. Errors that are
 * already classified pass through; everything else is treated as a transient
 * source failure with the original error as its cause.
 */
export function classifyError(error: unknown, locator: string): FetcherError {
  if (error instanceof FetcherError && error.kind !== 'git' && error.kind !== 'lock') {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new SourceUnavailableError(locator, message, { cause: error })
}

// ============================================================================
// Type guards
// ============================================================================

export function isFetcherError(error: unknown): error is FetcherError {
  return error instanceof FetcherError
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError
}

export function isGitError(error: unknown): error is GitError {
  return error instanceof GitError
}

export function isRetryable(error: unknown): boolean {
  return error instanceof FetcherError && error.retryable
}
