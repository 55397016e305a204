/**
 * Registry backend for sparse HTTP, git-hosted and local registry indexes.
 */

import { createHash } from 'node:crypto'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import * as tar from 'tar'

import {
  ConstraintNotSatisfiedError,
  IntegrityError,
  InvalidPackageLayoutError,
  PackageNotFoundError,
} from '../../core/errors.js'
import type { LockOptions } from '../../core/locks.js'
import { type RegistrySource, sourceFingerprint, sourceLocator } from '../../core/types/source.js'
import { versionsEqual } from '../../core/types/version.js'
import type { CacheLayout } from '../../store/paths.js'
import { readManifest } from '../manifest.js'
import type {
  BackendContext,
  RegistryBackend,
  RegistryMaterializeRequest,
  RegistryVersion,
  ResolvedIdentity,
} from '../types.js'
import { GitIndex } from './git-index.js'
import { parseIndexFile } from './index-entry.js'
import { LocalIndex } from './local-index.js'
import type { IndexReader } from './reader.js'
import { SPARSE_PREFIX, SparseIndex } from './sparse-index.js'

export interface CrateRegistryBackendOptions {
  layout: CacheLayout
  lock?: LockOptions | undefined
  /** Timeout for git commands against git-hosted indexes */
  gitTimeout?: number | undefined
}

export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

export class CrateRegistryBackend implements RegistryBackend {
  private readonly options: CrateRegistryBackendOptions
  private readonly readers = new Map<string, IndexReader>()

  constructor(options: CrateRegistryBackendOptions) {
    this.options = options
  }

  async listVersions(name: string, source: RegistrySource, ctx: BackendContext): Promise<RegistryVersion[]> {
    const content = await this.reader(source).readIndexFile(name, ctx)
    const versions = content === null ? [] : parseIndexFile(content, name)
    if (versions.length === 0) {
      throw new PackageNotFoundError(name, sourceLocator(source))
    }
    return versions
  }

  async materialize(request: RegistryMaterializeRequest, ctx: BackendContext): Promise<ResolvedIdentity> {
    const { name, version, source, dest } = request
    const listed = await this.listVersions(name, source, ctx)
    const entry = listed.find((candidate) => versionsEqual(candidate.version, version))
    if (entry === undefined) {
      throw new ConstraintNotSatisfiedError(
        name,
        `=${version.raw}`,
        listed.map((candidate) => candidate.version.raw)
      )
    }

    const archiveName = `${name}-${version.raw}.crate`
    const data = await this.reader(source).download(name, version.raw, entry.checksum, ctx)
    if (entry.checksum !== undefined) {
      const actual = sha256Hex(data)
      if (actual !== entry.checksum.toLowerCase()) {
        throw new IntegrityError(archiveName, entry.checksum, actual)
      }
    }

    await mkdir(dest, { recursive: true })
    const archive = `${dest}.crate`
    await writeFile(archive, data)
    try {
      await tar.x({ file: archive, cwd: dest, strip: 1 })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new InvalidPackageLayoutError(archiveName, `cannot extract archive: ${message}`)
    } finally {
      await rm(archive, { force: true })
    }

    const manifest = await readManifest(dest)
    if (!versionsEqual(manifest.version, version)) {
      throw new InvalidPackageLayoutError(
        archiveName,
        `archive declares version ${manifest.version.raw}, expected ${version.raw}`
      )
    }

    ctx.logger.debug(`extracted ${archiveName} into ${dest}`)
    return { version, subdir: '' }
  }

  /** Index reader for a source, created once per source */
  private reader(source: RegistrySource): IndexReader {
    const locator = sourceLocator(source)
    let reader = this.readers.get(locator)
    if (reader === undefined) {
      reader = this.createReader(source, locator)
      this.readers.set(locator, reader)
    }
    return reader
  }

  private createReader(source: RegistrySource, locator: string): IndexReader {
    if (source.kind === 'local-registry') {
      return new LocalIndex(source.dir)
    }
    if (source.indexUrl.startsWith(SPARSE_PREFIX)) {
      return new SparseIndex(source.indexUrl, locator)
    }
    const { layout } = this.options
    const hash = sourceFingerprint(source)
    return new GitIndex({
      url: source.indexUrl,
      gitDir: layout.indexRepo(hash),
      lockPath: layout.lock(`index-${hash}`),
      locator,
      lock: this.options.lock,
      timeout: this.options.gitTimeout,
    })
  }
}
