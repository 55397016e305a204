/**
 * crate-fetch-cli - Command line interface for crate-fetch.
 *
 * A thin argument parsing layer over the library: commands build a
 * PackageFetcher from the global options and print its results.
 */

import { Command } from 'commander'

import { registerCacheCommands } from './commands/cache.js'
import { registerFetchCommand } from './commands/fetch.js'
import { registerResolveCommand } from './commands/resolve.js'
import { formatError } from './helpers.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('crate-fetch')
    .description('Resolve and fetch packages into a shared local cache')
    .version(VERSION)
    .option('--cache-root <dir>', 'Cache root directory (default: $CRATE_FETCH_HOME or ~/.cache/crate-fetch)')
    .option('-c, --config <file>', 'Configuration file (default: <cache-root>/config.toml)')
    .option('-v, --verbose', 'Print debug output')
    .option('-q, --quiet', 'Print errors only')

  registerResolveCommand(program)
  registerFetchCommand(program)
  registerCacheCommands(program)

  return program
}

/**
 * Main entry point.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync([...argv])
  } catch (error) {
    console.error(formatError(error))
    process.exit(1)
  }
}
