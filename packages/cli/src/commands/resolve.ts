/**
 * Resolve command - Pin a package name and constraint to a version.
 */

import type { Command } from 'commander'

import { type Package, type PackageSource, createPackage, packageId, sourceLocator } from 'crate-fetch'

import { type GlobalOptions, createFetcher, handleCliError, resolveSourceOption } from '../helpers.js'
import { colors, printJson, symbols } from '../ui.js'

interface ResolveCommandOptions extends GlobalOptions {
  source?: string | undefined
  all?: boolean | undefined
  allowYanked?: string[] | undefined
  json?: boolean | undefined
}

export function packageJson(pkg: Package): Record<string, string> {
  return {
    id: packageId(pkg),
    name: pkg.name,
    version: pkg.version.raw,
    source: sourceLocator(pkg.source),
  }
}

function yankedIds(name: string, versions: string[] | undefined, source: PackageSource): string[] {
  return (versions ?? []).map((version) => packageId(createPackage(name, version, source)))
}

/**
 * Register the resolve command.
 */
export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a package to the highest version matching a constraint')
    .argument('<name>', 'Package name')
    .argument('[constraint]', 'Version constraint (default: any version)')
    .option('-s, --source <spec>', 'Source spec or configured registry name (default: crates-io)')
    .option('--all', 'List every matching version, highest first')
    .option('--allow-yanked <versions...>', 'Yanked versions that stay eligible')
    .option('--json', 'Output as JSON')
    .action(async (name: string, constraint: string | undefined, _opts: unknown, command: Command) => {
      const options: ResolveCommandOptions = command.optsWithGlobals()
      try {
        const fetcher = await createFetcher(options)
        const source = resolveSourceOption(options.source, fetcher.settings)
        const callOptions = { allowYanked: yankedIds(name, options.allowYanked, source) }

        if (options.all) {
          const all = await fetcher.resolveAll(name, constraint, source, callOptions)
          if (options.json) {
            printJson(all.map(packageJson))
            return
          }
          if (all.length === 0) {
            console.error(`${symbols.warning} ${colors.warn(`No version of ${name} matches ${constraint ?? '*'}`)}`)
            return
          }
          for (const pkg of all) {
            console.log(`${pkg.name} ${pkg.version.raw}`)
          }
          return
        }

        const pkg = await fetcher.resolvePackage(name, constraint, source, callOptions)
        if (options.json) {
          printJson(packageJson(pkg))
          return
        }
        console.log(
          `${symbols.success} ${pkg.name} ${colors.emphasis(pkg.version.raw)} ${colors.muted(`(${sourceLocator(pkg.source)})`)}`
        )
      } catch (error) {
        handleCliError(error)
      }
    })
}
