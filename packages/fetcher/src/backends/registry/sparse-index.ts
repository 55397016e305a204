/**
 * Sparse HTTP index (`sparse+https://...`): one GET per index file.
 */

import { InvalidSourceError } from '../../core/errors.js'
import { SharedWork } from '../../core/shared-work.js'
import type { BackendContext } from '../types.js'
import { fetchBytes, fetchTextOrNull } from './http.js'
import { type RegistryConfig, downloadUrl, parseRegistryConfig } from './index-entry.js'
import { indexPath } from './index-path.js'
import type { IndexReader } from './reader.js'

export const SPARSE_PREFIX = 'sparse+'

export class SparseIndex implements IndexReader {
  readonly baseUrl: string
  private readonly locator: string
  private readonly config = new SharedWork<RegistryConfig>()

  /**
   * @param indexUrl - Normalized index URL, with or without the `sparse+` prefix
   * @param locator - Source locator used in error messages
   */
  constructor(indexUrl: string, locator: string) {
    const url = indexUrl.startsWith(SPARSE_PREFIX) ? indexUrl.slice(SPARSE_PREFIX.length) : indexUrl
    this.baseUrl = url.replace(/\/+$/, '')
    this.locator = locator
  }

  async readIndexFile(name: string, ctx: BackendContext): Promise<string | null> {
    const url = `${this.baseUrl}/${indexPath(name)}`
    ctx.logger.debug(`GET ${url}`)
    return fetchTextOrNull(url, this.locator, ctx.signal)
  }

  async download(
    name: string,
    version: string,
    checksum: string | undefined,
    ctx: BackendContext
  ): Promise<Buffer> {
    const url = downloadUrl(await this.readConfig(ctx), name, version, checksum)
    ctx.logger.debug(`GET ${url}`)
    return fetchBytes(url, this.locator, ctx.signal)
  }

  /** `config.json`, fetched once per reader */
  private readConfig(ctx: BackendContext): Promise<RegistryConfig> {
    return this.config.run('config.json', ctx.signal, (signal) => this.loadConfig(signal))
  }

  private async loadConfig(signal: AbortSignal): Promise<RegistryConfig> {
    const content = await fetchTextOrNull(`${this.baseUrl}/config.json`, this.locator, signal)
    if (content === null) {
      throw new InvalidSourceError('Registry index has no config.json', this.locator)
    }
    return parseRegistryConfig(content, this.locator)
  }
}
