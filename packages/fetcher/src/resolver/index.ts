export { Resolver } from './resolve.js'
export type { ResolveOptions, ResolverOptions } from './resolve.js'
