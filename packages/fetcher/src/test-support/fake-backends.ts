/**
 * In-memory backends for the resolver, cache and fetcher tests. Registry and
 * git sources are served from maps; materialization writes a small package
 * directory and can be held open on a gate to exercise concurrency.
 */

import { join } from 'node:path'

import { PackageNotFoundError, RevisionNotFoundError } from '../core/errors.js'
import type { GitSource, RegistrySource } from '../core/types/source.js'
import { formatGitReference, sourceLocator } from '../core/types/source.js'
import { type Version, parseVersion } from '../core/types/version.js'
import { LocalPathBackend } from '../backends/path.js'
import type {
  BackendContext,
  GitBackend,
  GitMaterializeRequest,
  RegistryBackend,
  RegistryMaterializeRequest,
  RegistryVersion,
  ResolvedIdentity,
  SourceBackends,
} from '../backends/types.js'
import { writePackageDir } from './fixtures.js'

/** Resolves with `gate`, or rejects with the abort reason first */
function waitOrAbort(gate: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = (): void => reject(signal?.reason)
    signal?.addEventListener('abort', onAbort, { once: true })
    gate.then(
      () => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      },
      (err: unknown) => {
        signal?.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}

/** A promise released by hand */
export class Gate {
  readonly promise: Promise<void>
  private resolveGate: () => void = () => {}

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.resolveGate = resolve
    })
  }

  open(): void {
    this.resolveGate()
  }
}

export class FakeRegistry implements RegistryBackend {
  readonly listCalls: string[] = []
  readonly materialized: string[] = []
  /** When set, materialization waits for it (or for abort) */
  gate: Gate | undefined
  /** When set, materialization fails with it */
  failure: Error | undefined
  private readonly versions = new Map<string, RegistryVersion[]>()

  publish(name: string, version: string, options: { yanked?: boolean } = {}): this {
    const list = this.versions.get(name) ?? []
    list.push({ version: parseVersion(version), yanked: options.yanked ?? false })
    this.versions.set(name, list)
    return this
  }

  async listVersions(name: string, source: RegistrySource, _ctx: BackendContext): Promise<RegistryVersion[]> {
    this.listCalls.push(name)
    const list = this.versions.get(name)
    if (list === undefined) {
      throw new PackageNotFoundError(name, sourceLocator(source))
    }
    return list
  }

  async materialize(request: RegistryMaterializeRequest, ctx: BackendContext): Promise<ResolvedIdentity> {
    this.materialized.push(`${request.name}@${request.version.raw}`)
    if (this.gate !== undefined) {
      await waitOrAbort(this.gate.promise, ctx.signal)
    }
    if (this.failure !== undefined) {
      throw this.failure
    }
    await writePackageDir(request.dest, request.name, request.version.raw)
    return { version: request.version, subdir: '' }
  }
}

interface FakeCommit {
  version: string
  /** Package root inside the tree */
  subdir: string
}

export class FakeGit implements GitBackend {
  readonly materialized: string[] = []
  private readonly refs = new Map<string, string>()
  private readonly commits = new Map<string, FakeCommit>()

  /** Point a reference (`HEAD`, `branch main`, `tag v1`, ...) at a commit */
  setRef(url: string, reference: string, commit: string): this {
    this.refs.set(`${url} ${reference}`, commit)
    return this
  }

  addCommit(commit: string, version: string, subdir = ''): this {
    this.commits.set(commit, { version, subdir })
    return this
  }

  async resolveReference(name: string, source: GitSource, _ctx: BackendContext): Promise<string> {
    const reference = formatGitReference(source.reference)
    const commit = this.refs.get(`${source.url} ${reference}`)
    if (commit === undefined) {
      throw new RevisionNotFoundError(name, source.url, reference)
    }
    return commit
  }

  async readVersion(_name: string, _source: GitSource, commit: string, _ctx: BackendContext): Promise<Version> {
    return parseVersion(this.commit(commit).version)
  }

  async materialize(request: GitMaterializeRequest, _ctx: BackendContext): Promise<ResolvedIdentity> {
    this.materialized.push(request.commit)
    const { version, subdir } = this.commit(request.commit)
    await writePackageDir(join(request.dest, subdir), request.name, version)
    return { version: parseVersion(version), commit: request.commit, subdir }
  }

  private commit(commit: string): FakeCommit {
    const found = this.commits.get(commit)
    if (found === undefined) {
      throw new Error(`unknown commit ${commit}`)
    }
    return found
  }
}

export interface FakeBackends extends SourceBackends {
  registry: FakeRegistry
  git: FakeGit
}

export function createFakeBackends(): FakeBackends {
  return { registry: new FakeRegistry(), git: new FakeGit(), path: new LocalPathBackend() }
}
