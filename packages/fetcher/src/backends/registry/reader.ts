import type { BackendContext } from '../types.js'

/** Read access to one registry's index and archives */
export interface IndexReader {
  /** Raw index file for a package, or null if the index has none */
  readIndexFile(name: string, ctx: BackendContext): Promise<string | null>
  /** Raw `.crate` archive for one version */
  download(name: string, version: string, checksum: string | undefined, ctx: BackendContext): Promise<Buffer>
}
