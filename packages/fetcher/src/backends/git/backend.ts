/**
 * Git backend over the system `git` binary.
 *
 * Each repository is mirrored once into a bare database under
 * `<cache-root>/.git-db/`. References are resolved by fetching just the
 * refs they name and reading the resulting commit; package contents are
 * produced with `git archive` at that commit.
 */

import { createHash } from 'node:crypto'
import { mkdir, rm } from 'node:fs/promises'
import { posix } from 'node:path'
import * as tar from 'tar'

import {
  InvalidPackageLayoutError,
  RevisionNotFoundError,
  SourceUnavailableError,
  isGitError,
} from '../../core/errors.js'
import { type LockOptions, withLock } from '../../core/locks.js'
import { SharedWork } from '../../core/shared-work.js'
import { type GitSource, formatGitReference, sourceLocator } from '../../core/types/source.js'
import type { Version } from '../../core/types/version.js'
import { archiveCommit, ensureBareRepo, fetchRefs, listFiles, revParseCommit, showFile } from '../../git/repo.js'
import type { CacheLayout } from '../../store/paths.js'
import { MANIFEST_FILE, parseManifest, parseManifestName, parseWorkspaceVersion } from '../manifest.js'
import type { BackendContext, GitBackend, GitMaterializeRequest, ResolvedIdentity } from '../types.js'

export interface GitCliBackendOptions {
  layout: CacheLayout
  lock?: LockOptions | undefined
  /** Timeout for each git command in milliseconds */
  timeout?: number | undefined
}

/** Where a package lives inside a commit */
interface ManifestLocation {
  subdir: string
  version: Version
}

const FULL_SHA = /^[0-9a-f]{40}([0-9a-f]{24})?$/

/** stderr fragments git prints when a named ref does not exist on the remote */
const MISSING_REF_MESSAGES = ["couldn't find remote ref", 'not our ref', 'unadvertised object']

/** Directory name of a repository's bare mirror */
export function repoHash(url: string): string {
  return createHash('sha256').update(`git\0${url}`).digest('hex').slice(0, 32)
}

export class GitCliBackend implements GitBackend {
  private readonly options: GitCliBackendOptions
  /** Resolved commits per source locator, for the life of the backend */
  private readonly resolved = new SharedWork<string>()
  private readonly manifests = new SharedWork<ManifestLocation>()

  constructor(options: GitCliBackendOptions) {
    this.options = options
  }

  resolveReference(name: string, source: GitSource, ctx: BackendContext): Promise<string> {
    return this.resolved.run(sourceLocator(source), ctx.signal, (signal) =>
      this.fetchReference(name, source, { ...ctx, signal })
    )
  }

  async readVersion(name: string, source: GitSource, commit: string, ctx: BackendContext): Promise<Version> {
    const location = await this.locate(name, source, commit, ctx)
    return location.version
  }

  async materialize(request: GitMaterializeRequest, ctx: BackendContext): Promise<ResolvedIdentity> {
    const { name, source, commit, dest } = request
    const location = await this.locate(name, source, commit, ctx)
    const gitDir = this.gitDir(source)

    await mkdir(dest, { recursive: true })
    const archive = `${dest}.tar`
    try {
      await archiveCommit(gitDir, commit, archive, this.repoOptions(ctx))
      await tar.x({ file: archive, cwd: dest })
    } catch (err) {
      throw this.transportError(source, err)
    } finally {
      await rm(archive, { force: true })
    }

    ctx.logger.debug(`archived ${source.url} at ${commit} into ${dest}`)
    return { version: location.version, commit, subdir: location.subdir }
  }

  private gitDir(source: GitSource): string {
    return this.options.layout.gitRepo(repoHash(source.url))
  }

  private repoOptions(ctx: BackendContext): { timeout: number | undefined; signal: AbortSignal | undefined } {
    return { timeout: this.options.timeout, signal: ctx.signal }
  }

  private transportError(source: GitSource, err: unknown): Error {
    if (isGitError(err)) {
      return new SourceUnavailableError(sourceLocator(source), err.message, { cause: err })
    }
    return err instanceof Error ? err : new Error(String(err))
  }

  private async fetchReference(name: string, source: GitSource, ctx: BackendContext): Promise<string> {
    const gitDir = this.gitDir(source)
    const { layout, lock } = this.options
    const reference = formatGitReference(source.reference)
    ctx.logger.status('Updating', `git repository ${source.url} (${reference})`)

    const commit = await withLock(
      layout.lock(`git-${repoHash(source.url)}`),
      async () => {
        await ensureBareRepo(gitDir, source.url, this.repoOptions(ctx))
        return this.fetchCommit(name, source, gitDir, ctx)
      },
      { ...lock, signal: ctx.signal }
    )
    ctx.logger.debug(`${source.url} ${reference} is ${commit}`)
    return commit
  }

  private async fetchCommit(name: string, source: GitSource, gitDir: string, ctx: BackendContext): Promise<string> {
    const options = this.repoOptions(ctx)
    const ref = source.reference
    const notFound = (): RevisionNotFoundError =>
      new RevisionNotFoundError(name, source.url, formatGitReference(ref))

    const fetchNamed = async (refspec: string, local: string): Promise<string> => {
      try {
        await fetchRefs(gitDir, [refspec], options)
      } catch (err) {
        if (isGitError(err) && MISSING_REF_MESSAGES.some((msg) => err.stderr.includes(msg))) {
          throw notFound()
        }
        throw this.transportError(source, err)
      }
      const commit = await revParseCommit(gitDir, local, options)
      if (commit === null) {
        throw notFound()
      }
      return commit
    }

    switch (ref.kind) {
      case 'default-branch':
        return fetchNamed('+HEAD:refs/remotes/origin/HEAD', 'refs/remotes/origin/HEAD')
      case 'branch':
        return fetchNamed(`+refs/heads/${ref.name}:refs/remotes/origin/${ref.name}`, `refs/remotes/origin/${ref.name}`)
      case 'tag':
        return fetchNamed(`+refs/tags/${ref.name}:refs/tags/${ref.name}`, `refs/tags/${ref.name}`)
      case 'revision': {
        const rev = ref.rev.toLowerCase()
        if (FULL_SHA.test(rev)) {
          const present = await revParseCommit(gitDir, rev, options)
          if (present !== null) return present
        }
        try {
          await fetchRefs(gitDir, ['+refs/heads/*:refs/remotes/origin/*', '+refs/tags/*:refs/tags/*'], options)
        } catch (err) {
          throw this.transportError(source, err)
        }
        const commit = await revParseCommit(gitDir, ref.rev, options)
        if (commit !== null) return commit
        if (FULL_SHA.test(rev)) {
          // Commits outside every branch and tag are only reachable by hash
          return fetchNamed(rev, rev)
        }
        throw notFound()
      }
    }
  }

  private locate(name: string, source: GitSource, commit: string, ctx: BackendContext): Promise<ManifestLocation> {
    return this.manifests.run(`${source.url}\0${commit}\0${name}`, ctx.signal, (signal) =>
      this.findManifest(name, source, commit, { ...ctx, signal })
    )
  }

  /**
   * Find the manifest declaring `name`: the root manifest first, then nested
   * manifests from the shallowest down.
   */
  private async findManifest(
    name: string,
    source: GitSource,
    commit: string,
    ctx: BackendContext
  ): Promise<ManifestLocation> {
    const gitDir = this.gitDir(source)
    const options = this.repoOptions(ctx)

    let files: string[]
    try {
      files = await listFiles(gitDir, commit, options)
    } catch (err) {
      throw this.transportError(source, err)
    }

    const manifests = files
      .filter((file) => posix.basename(file) === MANIFEST_FILE)
      .sort((a, b) => a.split('/').length - b.split('/').length || a.localeCompare(b))

    let workspaceVersion: string | undefined
    for (const file of manifests) {
      const content = await showFile(gitDir, commit, file, options)
      if (file === MANIFEST_FILE) {
        workspaceVersion = parseWorkspaceVersion(content, file)
      }
      if (parseManifestName(content, file) !== name) continue

      const manifest = parseManifest(content, file, { workspaceVersion })
      const subdir = posix.dirname(file)
      return { subdir: subdir === '.' ? '' : subdir, version: manifest.version }
    }

    throw new InvalidPackageLayoutError(
      `${source.url} at ${commit}`,
      `no ${MANIFEST_FILE} declares package "${name}"`
    )
  }
}
