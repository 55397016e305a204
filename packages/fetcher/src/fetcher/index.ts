export { PackageFetcher } from './fetcher.js'
export type {
  FetchItem,
  FetchManyOptions,
  FetchOptions,
  FetchReport,
  PackageFetchResult,
  PackageFetcherOptions,
  ResolveCallOptions,
} from './fetcher.js'
