/**
 * Shared CLI helper utilities.
 */

import chalk from 'chalk'

import {
  type FetcherSettings,
  type PackageSource,
  PackageFetcher,
  type Verbosity,
  cratesIo,
  isFetcherError,
  parseSourceSpec,
  registry,
} from 'crate-fetch'

/**
 * Global options, accepted before or after any command.
 */
export interface GlobalOptions {
  cacheRoot?: string | undefined
  config?: string | undefined
  verbose?: boolean | undefined
  quiet?: boolean | undefined
}

export function verbosityFrom(options: GlobalOptions): Verbosity | undefined {
  if (options.quiet) return 'quiet'
  if (options.verbose) return 'verbose'
  return undefined
}

/**
 * Build a fetcher from the global options.
 */
export async function createFetcher(options: GlobalOptions): Promise<PackageFetcher> {
  return PackageFetcher.create({
    cacheRoot: options.cacheRoot,
    configFile: options.config,
    verbosity: verbosityFrom(options),
  })
}

/**
 * A `name[@constraint]` argument.
 */
export interface PackageArg {
  name: string
  constraint: string
}

export function parsePackageArg(arg: string): PackageArg {
  const at = arg.indexOf('@')
  if (at === -1) {
    return { name: arg, constraint: '*' }
  }
  const constraint = arg.slice(at + 1).trim()
  return { name: arg.slice(0, at), constraint: constraint === '' ? '*' : constraint }
}

/**
 * Interpret `--source`: a registry name from the config file, a source
 * spec, or (when omitted) the configured crates.io index.
 */
export function resolveSourceOption(spec: string | undefined, settings: FetcherSettings): PackageSource {
  if (spec === undefined || spec === 'crates-io') {
    return cratesIo(settings.cratesIoIndex)
  }
  if (Object.hasOwn(settings.registries, spec)) {
    const named = settings.registries[spec]
    if (named !== undefined) {
      return registry(named)
    }
  }
  return parseSourceSpec(spec)
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new Error(`Expected a positive integer, got '${value}'`)
  }
  return parsed
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isFetcherError(error)) {
    const lines: string[] = [chalk.red(`Error [${error.code}]: ${error.message}`)]
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}

/**
 * Print an error and exit with code 1.
 */
export function handleCliError(error: unknown): never {
  console.error(formatError(error))
  process.exit(1)
}
