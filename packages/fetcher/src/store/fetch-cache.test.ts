import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  CacheCorruptionError,
  ConstraintNotSatisfiedError,
  FetchCancelledError,
  FetchTimeoutError,
  InvalidPackageLayoutError,
  RevisionNotFoundError,
  SourceUnavailableError,
} from '../core/errors.js'
import { isLocked } from '../core/locks.js'
import { createPackage } from '../core/types/package.js'
import { git, path, registry, tag } from '../core/types/source.js'
import { type FakeBackends, Gate, createFakeBackends } from '../test-support/fake-backends.js'
import { writePackageDir } from '../test-support/fixtures.js'
import { entryFingerprint } from './entry.js'
import { FetchCache } from './fetch-cache.js'
import { CacheLayout, ENTRY_MARKER } from './paths.js'

const REGISTRY = registry('https://registry.example.com/index')
const REPO = 'https://git.example.com/demo'
const COMMIT_A = 'a'.repeat(40)
const COMMIT_B = 'b'.repeat(40)

describe('FetchCache', () => {
  let root: string
  let layout: CacheLayout
  let backends: FakeBackends
  let cache: FetchCache

  const demo = createPackage('demo', '1.0.0', REGISTRY)
  const demoFingerprint = entryFingerprint({
    kind: 'registry',
    locator: 'registry+https://registry.example.com/index',
    name: 'demo',
    revision: '1.0.0',
  })

  async function tempDirs(): Promise<string[]> {
    return readdir(layout.temp)
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'fetch-cache-test-'))
    layout = new CacheLayout(join(root, 'cache'))
    await layout.ensureAll()
    backends = createFakeBackends()
    backends.registry.publish('demo', '1.0.0')
    cache = new FetchCache({ layout, backends, lock: { stale: 5000 } })
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  // ==========================================================================
  // Registry entries
  // ==========================================================================

  describe('registry packages', () => {
    it('fetches once and then serves from the cache', async () => {
      const first = await cache.getOrFetch(demo)
      expect(first).toEqual({
        package: demo,
        root: layout.entryContents(demoFingerprint),
        fingerprint: demoFingerprint,
        commit: undefined,
        origin: 'fetched',
      })

      const second = await cache.getOrFetch(demo)
      expect(second.origin).toBe('cached')
      expect(second.root).toBe(first.root)
      expect(backends.registry.materialized).toEqual(['demo@1.0.0'])
      expect(await cache.entryState(demoFingerprint)).toBe('complete')
    })

    it('shares one materialization between concurrent callers', async () => {
      const gate = new Gate()
      backends.registry.gate = gate
      const pending = [cache.getOrFetch(demo), cache.getOrFetch(demo), cache.getOrFetch(demo)]
      await new Promise((resolve) => setTimeout(resolve, 20))
      expect(await cache.entryState(demoFingerprint)).toBe('in-progress')
      gate.open()

      const outcomes = await Promise.all(pending)
      expect(new Set(outcomes.map((o) => o.root)).size).toBe(1)
      expect(backends.registry.materialized).toEqual(['demo@1.0.0'])
    })

    it('leaves no entry or temp directory when materialization fails', async () => {
      backends.registry.failure = new InvalidPackageLayoutError('/archive', 'no manifest')
      await expect(cache.getOrFetch(demo)).rejects.toBeInstanceOf(InvalidPackageLayoutError)
      expect(await cache.entryState(demoFingerprint)).toBe('absent')
      expect(await tempDirs()).toEqual([])
      expect(await isLocked(layout.lock(demoFingerprint))).toBe(false)
    })

    it('classifies unknown backend failures as source unavailable', async () => {
      backends.registry.failure = new Error('connection reset')
      const error = await cache.getOrFetch(demo).catch((err: unknown) => err)
      expect(error).toBeInstanceOf(SourceUnavailableError)
      expect(error).toMatchObject({ code: 'SOURCE_UNAVAILABLE' })
    })

    it('can fetch again after a failure', async () => {
      backends.registry.failure = new Error('connection reset')
      await expect(cache.getOrFetch(demo)).rejects.toThrow()
      backends.registry.failure = undefined
      const outcome = await cache.getOrFetch(demo)
      expect(outcome.origin).toBe('fetched')
    })

    it('refetches an entry that lost its marker', async () => {
      await cache.getOrFetch(demo)
      await rm(layout.entryMarker(demoFingerprint))
      expect(await cache.entryState(demoFingerprint)).toBe('absent')

      const outcome = await cache.getOrFetch(demo)
      expect(outcome.origin).toBe('recovered')
      expect(backends.registry.materialized).toHaveLength(2)
      expect(await cache.entryState(demoFingerprint)).toBe('complete')
    })

    it('reports corruption when the refetch fails', async () => {
      await mkdir(layout.entry(demoFingerprint), { recursive: true })
      await writeFile(join(layout.entry(demoFingerprint), 'stray'), 'x')
      backends.registry.failure = new Error('connection reset')

      await expect(cache.getOrFetch(demo)).rejects.toBeInstanceOf(CacheCorruptionError)
      expect(await cache.entryState(demoFingerprint)).toBe('absent')
    })
  })

  // ==========================================================================
  // Deadlines and cancellation
  // ==========================================================================

  describe('deadlines', () => {
    it('times out and cleans up the abandoned fetch', async () => {
      backends.registry.gate = new Gate()
      const error = await cache.getOrFetch(demo, { timeout: 30 }).catch((err: unknown) => err)
      expect(error).toBeInstanceOf(FetchTimeoutError)
      expect(await tempDirs()).toEqual([])
      expect(await cache.entryState(demoFingerprint)).toBe('absent')
    })

    it('cancels when the caller aborts', async () => {
      backends.registry.gate = new Gate()
      const controller = new AbortController()
      const pending = cache.getOrFetch(demo, { signal: controller.signal })
      setTimeout(() => controller.abort(), 10)
      await expect(pending).rejects.toBeInstanceOf(FetchCancelledError)
      expect(await tempDirs()).toEqual([])
    })

    it('keeps the shared fetch alive while another caller still waits', async () => {
      const gate = new Gate()
      backends.registry.gate = gate
      const patient = cache.getOrFetch(demo)
      const hasty = cache.getOrFetch(demo, { timeout: 20 })

      await expect(hasty).rejects.toBeInstanceOf(FetchTimeoutError)
      gate.open()
      const outcome = await patient
      expect(outcome.origin).toBe('fetched')
      expect(backends.registry.materialized).toEqual(['demo@1.0.0'])
    })
  })

  // ==========================================================================
  // Separate cache instances on one root
  // ==========================================================================

  describe('separate instances', () => {
    it('waits on the entry lock and then serves the entry the other built', async () => {
      const gate = new Gate()
      backends.registry.gate = gate
      const other = new FetchCache({ layout, backends, lock: { stale: 5000 } })

      const first = other.getOrFetch(demo)
      await vi.waitFor(() => expect(backends.registry.materialized).toHaveLength(1))
      const second = cache.getOrFetch(demo)
      await new Promise((resolve) => setTimeout(resolve, 150))
      gate.open()

      expect((await first).origin).toBe('fetched')
      expect((await second).origin).toBe('cached')
      expect(backends.registry.materialized).toEqual(['demo@1.0.0'])
    })

    it('honors the deadline while another instance holds the entry lock', async () => {
      const gate = new Gate()
      backends.registry.gate = gate
      const other = new FetchCache({ layout, backends, lock: { stale: 5000 } })

      const held = other.getOrFetch(demo)
      await vi.waitFor(() => expect(backends.registry.materialized).toHaveLength(1))

      const started = Date.now()
      const error = await cache.getOrFetch(demo, { timeout: 100 }).catch((err: unknown) => err)
      expect(error).toBeInstanceOf(FetchTimeoutError)
      expect(Date.now() - started).toBeLessThan(1500)

      gate.open()
      expect((await held).origin).toBe('fetched')
      expect(backends.registry.materialized).toEqual(['demo@1.0.0'])
    })
  })

  // ==========================================================================
  // Git and path packages
  // ==========================================================================

  describe('git packages', () => {
    beforeEach(() => {
      backends.git
        .setRef(REPO, 'HEAD', COMMIT_B)
        .setRef(REPO, 'tag v0.2.0', COMMIT_B)
        .setRef(REPO, 'tag v0.1.0', COMMIT_A)
        .addCommit(COMMIT_A, '0.1.0')
        .addCommit(COMMIT_B, '0.2.0', 'crates/demo')
    })

    it('keys entries by commit and resolves the package root inside the tree', async () => {
      const pkg = createPackage('demo', '0.2.0', git(REPO))
      const outcome = await cache.getOrFetch(pkg)
      const fingerprint = entryFingerprint({ kind: 'git', locator: `git+${REPO}`, name: 'demo', revision: COMMIT_B })
      expect(outcome.fingerprint).toBe(fingerprint)
      expect(outcome.commit).toBe(COMMIT_B)
      expect(outcome.root).toBe(join(layout.entryContents(fingerprint), 'crates/demo'))
    })

    it('shares an entry between references that name the same commit', async () => {
      await cache.getOrFetch(createPackage('demo', '0.2.0', git(REPO)))
      const byTag = await cache.getOrFetch(createPackage('demo', '0.2.0', git(REPO, tag('v0.2.0'))))
      expect(byTag.origin).toBe('cached')
      expect(backends.git.materialized).toEqual([COMMIT_B])
    })

    it('rejects a manifest version that differs from the pinned one', async () => {
      const pkg = createPackage('demo', '0.2.0', git(REPO, tag('v0.1.0')))
      await expect(cache.getOrFetch(pkg)).rejects.toBeInstanceOf(ConstraintNotSatisfiedError)
      expect(await tempDirs()).toEqual([])
    })

    it('accepts any manifest version under the reference policy', async () => {
      const lenient = new FetchCache({ layout, backends, gitConstraintPolicy: 'reference' })
      const outcome = await lenient.getOrFetch(createPackage('demo', '0.2.0', git(REPO, tag('v0.1.0'))))
      expect(outcome.commit).toBe(COMMIT_A)
    })

    it('fails on an unknown reference', async () => {
      const pkg = createPackage('demo', '0.2.0', git(REPO, tag('v9.9.9')))
      await expect(cache.getOrFetch(pkg)).rejects.toBeInstanceOf(RevisionNotFoundError)
    })
  })

  describe('path packages', () => {
    it('returns the directory itself without creating an entry', async () => {
      const dir = join(root, 'local-demo')
      await writePackageDir(dir, 'demo', '0.5.0')
      const outcome = await cache.getOrFetch(createPackage('demo', '0.5.0', path(dir)))
      expect(outcome).toEqual({ package: createPackage('demo', '0.5.0', path(dir)), root: dir, origin: 'local' })
      expect(await cache.listEntries()).toEqual([])
    })

    it('rejects a directory holding another version', async () => {
      const dir = join(root, 'local-demo')
      await writePackageDir(dir, 'demo', '0.5.0')
      await expect(cache.getOrFetch(createPackage('demo', '0.6.0', path(dir)))).rejects.toBeInstanceOf(
        ConstraintNotSatisfiedError
      )
    })
  })

  // ==========================================================================
  // Administration
  // ==========================================================================

  describe('administration', () => {
    it('lists complete entries with their metadata', async () => {
      await cache.getOrFetch(demo)
      const entries = await cache.listEntries()
      expect(entries).toHaveLength(1)
      expect(entries[0]?.fingerprint).toBe(demoFingerprint)
      expect(entries[0]?.metadata).toMatchObject({
        formatVersion: 1,
        name: 'demo',
        version: '1.0.0',
        sourceKind: 'registry',
        locator: 'registry+https://registry.example.com/index',
        subdir: '',
      })
    })

    it('reads one entry by fingerprint', async () => {
      expect(await cache.readEntry(demoFingerprint)).toBeNull()
      await cache.getOrFetch(demo)
      expect((await cache.readEntry(demoFingerprint))?.root).toBe(layout.entryContents(demoFingerprint))
      expect(await cache.readEntry('not-a-fingerprint')).toBeNull()
    })

    it('removes an entry', async () => {
      await cache.getOrFetch(demo)
      expect(await cache.removeEntry(demoFingerprint)).toBe(true)
      expect(await cache.entryState(demoFingerprint)).toBe('absent')
      expect(await cache.removeEntry(demoFingerprint)).toBe(false)
      expect(await cache.removeEntry('../escape')).toBe(false)
    })

    it('measures an entry', async () => {
      expect(await cache.entrySize(demoFingerprint)).toBeNull()
      await cache.getOrFetch(demo)
      expect(await cache.entrySize(demoFingerprint)).toBeGreaterThan(0)
    })

    it('prunes stale temp directories only', async () => {
      const stale = join(layout.temp, `${demoFingerprint}.000000000000.tmp`)
      const fresh = join(layout.temp, `${demoFingerprint}.111111111111.tmp`)
      await mkdir(stale)
      await mkdir(fresh)
      const hourAgo = new Date(Date.now() - 3600_000)
      await utimes(stale, hourAgo, hourAgo)

      expect(await cache.pruneTemp({ olderThan: 60_000 })).toBe(1)
      expect(await tempDirs()).toEqual([`${demoFingerprint}.111111111111.tmp`])
    })

    it('keeps the marker beside the package contents', async () => {
      await cache.getOrFetch(demo)
      expect((await readdir(layout.entry(demoFingerprint))).sort()).toEqual([ENTRY_MARKER, 'pkg'])
    })
  })
})
