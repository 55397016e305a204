/**
 * Tests for the git backend against local repositories reached through
 * `file://` URLs.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { InvalidPackageLayoutError, RevisionNotFoundError } from '../../core/errors.js'
import { silentLogger } from '../../core/logger.js'
import { branch, git as gitSource, revision, tag } from '../../core/types/source.js'
import { CacheLayout } from '../../store/paths.js'
import { commitFiles, git, initRepo, manifest } from '../../test-support/fixtures.js'
import { GitCliBackend, repoHash } from './backend.js'

const ctx = { logger: silentLogger }

describe('repoHash', () => {
  test('is a stable 32 character hex digest', () => {
    expect(repoHash('https://example.com/repo')).toMatch(/^[0-9a-f]{32}$/)
    expect(repoHash('https://example.com/repo')).toBe(repoHash('https://example.com/repo'))
    expect(repoHash('https://example.com/repo')).not.toBe(repoHash('https://example.com/other'))
  })
})

describe('GitCliBackend', () => {
  let workDir: string
  let repoDir: string
  let url: string
  let first: string
  let second: string
  let backend: GitCliBackend

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'crate-fetch-git-'))
    repoDir = join(workDir, 'upstream')
    url = await initRepo(repoDir)
    first = await commitFiles(repoDir, { 'Cargo.toml': manifest('demo', '0.1.0'), 'src/lib.rs': '// v1\n' }, 'v1')
    await git(repoDir, 'tag', 'v0.1.0')
    second = await commitFiles(
      repoDir,
      {
        'Cargo.toml': '[workspace]\nmembers = ["crates/*"]\n\n[workspace.package]\nversion = "0.2.0"\n',
        'crates/demo/Cargo.toml': '[package]\nname = "demo"\nversion.workspace = true\n',
        'crates/demo/src/lib.rs': '// v2\n',
        'crates/helper/Cargo.toml': manifest('helper', '0.9.0'),
      },
      'v2'
    )
    await git(repoDir, 'rm', '--quiet', 'src/lib.rs')
    await git(repoDir, 'commit', '--quiet', '-m', 'cleanup')
    await git(repoDir, 'branch', 'stable', first)
    backend = new GitCliBackend({ layout: new CacheLayout(join(workDir, 'cache')) })
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  test('resolves every kind of reference', async () => {
    const head = await git(repoDir, 'rev-parse', 'HEAD')
    expect(await backend.resolveReference('demo', gitSource(url), ctx)).toBe(head)
    expect(await backend.resolveReference('demo', gitSource(url, branch('stable')), ctx)).toBe(first)
    expect(await backend.resolveReference('demo', gitSource(url, tag('v0.1.0')), ctx)).toBe(first)
    expect(await backend.resolveReference('demo', gitSource(url, revision(second)), ctx)).toBe(second)
    expect(await backend.resolveReference('demo', gitSource(url, revision(second.slice(0, 10))), ctx)).toBe(second)
  })

  test('a caller that gives up does not fail others resolving the same source', async () => {
    const head = await git(repoDir, 'rev-parse', 'HEAD')
    const source = gitSource(url)
    const controller = new AbortController()

    const leaving = backend.resolveReference('demo', source, { ...ctx, signal: controller.signal })
    const staying = backend.resolveReference('helper', source, ctx)
    controller.abort(new Error('caller left'))

    await expect(leaving).rejects.toThrow('caller left')
    await expect(staying).resolves.toBe(head)
  })

  test('a missing reference is reported as such', async () => {
    await expect(
      backend.resolveReference('demo', gitSource(url, branch('missing')), ctx)
    ).rejects.toBeInstanceOf(RevisionNotFoundError)
    await expect(
      backend.resolveReference('demo', gitSource(url, revision('deadbeef')), ctx)
    ).rejects.toBeInstanceOf(RevisionNotFoundError)
  })

  test('reads versions from root and nested manifests', async () => {
    const source = gitSource(url)
    await backend.resolveReference('demo', source, ctx)
    expect((await backend.readVersion('demo', source, first, ctx)).raw).toBe('0.1.0')
    expect((await backend.readVersion('demo', source, second, ctx)).raw).toBe('0.2.0')
    expect((await backend.readVersion('helper', source, second, ctx)).raw).toBe('0.9.0')
  })

  test('a package no manifest declares is a layout error', async () => {
    const source = gitSource(url)
    const commit = await backend.resolveReference('demo', source, ctx)
    await expect(backend.readVersion('absent', source, commit, ctx)).rejects.toBeInstanceOf(
      InvalidPackageLayoutError
    )
  })

  test('materializes the tree at a commit and locates the package in it', async () => {
    const source = gitSource(url, branch('main'))
    const commit = await backend.resolveReference('demo', source, ctx)
    const dest = join(workDir, 'out')

    const identity = await backend.materialize({ name: 'demo', source, commit, dest }, ctx)

    expect(identity).toMatchObject({ commit, subdir: 'crates/demo' })
    expect(identity.version.raw).toBe('0.2.0')
    expect(await readFile(join(dest, 'crates', 'demo', 'src', 'lib.rs'), 'utf8')).toBe('// v2\n')
  })
})
