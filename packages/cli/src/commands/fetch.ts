/**
 * Fetch command - Resolve and download packages into the cache.
 *
 * Each positional argument is `name[@constraint]`; all of them share the
 * `--source`. Roots are printed one per line on stdout, failures on stderr,
 * and the exit code is 1 if any package failed.
 */

import type { Command } from 'commander'

import { type FetchReport, type PackageFetchResult, createQuery } from 'crate-fetch'

import {
  type GlobalOptions,
  createFetcher,
  handleCliError,
  parsePackageArg,
  parsePositiveInt,
  resolveSourceOption,
} from '../helpers.js'
import { colors, createSpinner, formatDuration, formatPath, printJson, summaryBlock, symbols } from '../ui.js'

interface FetchCommandOptions extends GlobalOptions {
  source?: string | undefined
  failFast?: boolean | undefined
  jobs?: number | undefined
  timeout?: number | undefined
  json?: boolean | undefined
}

export function resultJson(key: string, result: PackageFetchResult): Record<string, string | undefined> {
  if (result.status === 'ok') {
    return {
      id: key,
      status: 'ok',
      version: result.package.version.raw,
      root: result.root,
      origin: result.origin,
    }
  }
  return {
    id: key,
    status: 'error',
    version: result.package?.version.raw,
    code: result.error.code,
    message: result.error.message,
  }
}

function printReport(report: FetchReport, elapsed: number): void {
  for (const [key, result] of report.results) {
    if (result.status === 'ok') {
      console.log(`${symbols.success} ${key} ${symbols.arrow} ${formatPath(result.root)} ${colors.muted(`[${result.origin}]`)}`)
    } else {
      console.error(`${symbols.error} ${key}: ${colors.error(result.error.message)}`)
    }
  }
  summaryBlock([
    { label: 'Fetched', value: String(report.roots.size) },
    { label: 'Failed', value: String(report.errors.size) },
    { label: 'Time', value: formatDuration(elapsed) },
  ])
}

/**
 * Register the fetch command.
 */
export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .description('Resolve and fetch packages into the cache')
    .argument('<packages...>', 'Packages as name[@constraint]')
    .option('-s, --source <spec>', 'Source spec or configured registry name (default: crates-io)')
    .option('--fail-fast', 'Stop starting new fetches after the first failure')
    .option('-j, --jobs <n>', 'Maximum concurrent fetches', parsePositiveInt)
    .option('--timeout <ms>', 'Deadline per package in milliseconds', parsePositiveInt)
    .option('--json', 'Output as JSON')
    .action(async (packages: string[], _opts: unknown, command: Command) => {
      const options: FetchCommandOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        const source = resolveSourceOption(options.source, fetcher.settings)
        const queries = packages.map((arg) => {
          const { name, constraint } = parsePackageArg(arg)
          return createQuery(name, constraint, source)
        })

        const controller = new AbortController()
        const onSignal = (): void => controller.abort()
        process.once('SIGINT', onSignal)

        const showSpinner = !options.json && fetcher.settings.verbosity !== 'verbose'
        const spinner = showSpinner ? createSpinner(`Fetching ${queries.length} package(s)...`).start() : undefined
        const started = Date.now()
        let report: FetchReport
        try {
          report = await fetcher.fetchMany(queries, {
            failFast: options.failFast,
            maxParallelFetches: options.jobs,
            timeoutPerFetch: options.timeout,
            signal: controller.signal,
          })
        } finally {
          process.off('SIGINT', onSignal)
          spinner?.stop()
        }

        if (options.json) {
          printJson({
            ok: report.ok,
            results: [...report.results].map(([key, result]) => resultJson(key, result)),
          })
        } else {
          printReport(report, Date.now() - started)
        }
        if (!report.ok) {
          process.exitCode = 1
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
