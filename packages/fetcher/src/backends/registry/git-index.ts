/**
 * Git-hosted registry index.
 *
 * The index is kept as a shallow bare clone under `<cache-root>/.index/`,
 * refreshed at most once per reader and under a file lock so concurrent
 * processes never fetch into the same clone at once.
 */

import { SourceUnavailableError } from '../../core/errors.js'
import { type LockOptions, withLock } from '../../core/locks.js'
import { SharedWork } from '../../core/shared-work.js'
import { ensureBareRepo, fetchRefs, showFileOrNull } from '../../git/repo.js'
import type { BackendContext } from '../types.js'
import { fetchBytes } from './http.js'
import { type RegistryConfig, downloadUrl, parseRegistryConfig } from './index-entry.js'
import { indexPath } from './index-path.js'
import type { IndexReader } from './reader.js'

/** Ref the index head is fetched into */
const INDEX_REF = 'refs/remotes/origin/HEAD'

export interface GitIndexOptions {
  /** Remote index repository URL */
  url: string
  /** Bare clone location */
  gitDir: string
  /** Lock file guarding the clone */
  lockPath: string
  /** Source locator used in error messages */
  locator: string
  lock?: LockOptions | undefined
  /** Timeout for git commands in milliseconds */
  timeout?: number | undefined
}

export class GitIndex implements IndexReader {
  private readonly options: GitIndexOptions
  private readonly refreshed = new SharedWork<void>()
  private config: RegistryConfig | undefined

  constructor(options: GitIndexOptions) {
    this.options = options
  }

  async readIndexFile(name: string, ctx: BackendContext): Promise<string | null> {
    await this.refresh(ctx)
    return showFileOrNull(this.options.gitDir, INDEX_REF, indexPath(name), this.repoOptions(ctx))
  }

  async download(
    name: string,
    version: string,
    checksum: string | undefined,
    ctx: BackendContext
  ): Promise<Buffer> {
    const url = downloadUrl(await this.readConfig(ctx), name, version, checksum)
    ctx.logger.debug(`GET ${url}`)
    return fetchBytes(url, this.options.locator, ctx.signal)
  }

  private async readConfig(ctx: BackendContext): Promise<RegistryConfig> {
    if (this.config !== undefined) {
      return this.config
    }
    await this.refresh(ctx)
    const content = await showFileOrNull(this.options.gitDir, INDEX_REF, 'config.json', this.repoOptions(ctx))
    if (content === null) {
      throw new SourceUnavailableError(this.options.locator, 'index has no config.json')
    }
    this.config = parseRegistryConfig(content, this.options.locator)
    return this.config
  }

  private refresh(ctx: BackendContext): Promise<void> {
    return this.refreshed.run(INDEX_REF, ctx.signal, (signal) => this.update({ ...ctx, signal }))
  }

  private async update(ctx: BackendContext): Promise<void> {
    const { url, gitDir, lockPath, lock } = this.options
    ctx.logger.status('Updating', `index ${url}`)
    await withLock(
      lockPath,
      async () => {
        await ensureBareRepo(gitDir, url, this.repoOptions(ctx))
        await fetchRefs(gitDir, [`+HEAD:${INDEX_REF}`], { ...this.repoOptions(ctx), depth: 1 })
      },
      { ...lock, signal: ctx.signal }
    )
  }

  private repoOptions(ctx: BackendContext): { timeout: number | undefined; signal: AbortSignal | undefined } {
    return { timeout: this.options.timeout, signal: ctx.signal }
  }
}
