/**
 * Cache commands - Inspect and maintain the on-disk cache.
 *
 * Subcommands:
 * - cache path: Print the cache root
 * - cache list: List complete entries
 * - cache remove <fingerprint>: Delete one entry
 * - cache prune-tmp: Remove stale temp directories
 */

import type { Command } from 'commander'

import type { CacheEntry } from 'crate-fetch'

import { type GlobalOptions, createFetcher, handleCliError, parsePositiveInt } from '../helpers.js'
import { colors, formatBytes, formatPath, printJson, success, warning } from '../ui.js'

interface ListCommandOptions extends GlobalOptions {
  json?: boolean | undefined
  size?: boolean | undefined
}

interface PruneCommandOptions extends GlobalOptions {
  olderThan?: number | undefined
}

export function entryLine(entry: CacheEntry, size?: number | null): string {
  const { metadata } = entry
  const short = entry.fingerprint.slice(0, 12)
  const suffix = size === undefined || size === null ? '' : ` ${colors.muted(formatBytes(size))}`
  return `${short}  ${metadata.name} ${metadata.version} ${colors.muted(`(${metadata.locator})`)}${suffix}`
}

/**
 * Register the cache command group.
 */
export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Inspect and maintain the package cache')

  cache
    .command('path')
    .description('Print the cache root directory')
    .action(async (_opts: unknown, command: Command) => {
      const options: GlobalOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        console.log(fetcher.layout.root)
      } catch (error) {
        handleCliError(error)
      }
    })

  cache
    .command('list')
    .description('List complete cache entries')
    .option('--size', 'Include the size of each entry')
    .option('--json', 'Output as JSON')
    .action(async (_opts: unknown, command: Command) => {
      const options: ListCommandOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        const entries = await fetcher.cache.listEntries()
        const sizes = new Map<string, number | null>()
        if (options.size) {
          for (const entry of entries) {
            sizes.set(entry.fingerprint, await fetcher.cache.entrySize(entry.fingerprint))
          }
        }

        if (options.json) {
          printJson(
            entries.map((entry) => {
              const { fingerprint, ...metadata } = entry.metadata
              return {
                fingerprint,
                root: entry.root,
                ...metadata,
                size: sizes.get(entry.fingerprint) ?? undefined,
              }
            })
          )
          return
        }
        if (entries.length === 0) {
          console.log(colors.muted(`No entries in ${formatPath(fetcher.layout.root)}`))
          return
        }
        for (const entry of entries) {
          console.log(entryLine(entry, sizes.get(entry.fingerprint)))
        }
      } catch (error) {
        handleCliError(error)
      }
    })

  cache
    .command('remove')
    .description('Remove one cache entry')
    .argument('<fingerprint>', 'Full entry fingerprint')
    .action(async (fingerprint: string, _opts: unknown, command: Command) => {
      const options: GlobalOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        if (await fetcher.cache.removeEntry(fingerprint)) {
          success(`Removed ${fingerprint}`)
        } else {
          warning(`No entry ${fingerprint}`)
          process.exitCode = 1
        }
      } catch (error) {
        handleCliError(error)
      }
    })

  cache
    .command('prune-tmp')
    .description('Remove temp directories left by interrupted fetches')
    .option('--older-than <ms>', 'Minimum age in milliseconds', parsePositiveInt)
    .action(async (_opts: unknown, command: Command) => {
      const options: PruneCommandOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        const removed = await fetcher.cache.pruneTemp({ olderThan: options.olderThan })
        success(`Removed ${removed} temp director${removed === 1 ? 'y' : 'ies'}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}
