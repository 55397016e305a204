/**
 * crate-fetch
 *
 * Resolve package references (name, version constraint, source) to pinned
 * versions and fetch their contents into a shared on-disk cache.
 *
 * @example
 * ```typescript
 * import { PackageFetcher, cratesIo, createQuery } from 'crate-fetch'
 *
 * const fetcher = await PackageFetcher.create()
 * const report = await fetcher.fetchMany([createQuery('serde', '^1.0', cratesIo())])
 * for (const [id, root] of report.roots) console.log(id, root)
 * ```
 */

export * from './core/index.js'
export * from './backends/index.js'
export * from './git/index.js'
export * from './store/index.js'
export * from './resolver/index.js'
export * from './fetcher/index.js'
