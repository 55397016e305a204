/**
 * Tests for the registry backend against a local registry directory.
 */

import { existsSync } from 'node:fs'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  ConstraintNotSatisfiedError,
  IntegrityError,
  PackageNotFoundError,
  PathNotFoundError,
} from '../../core/errors.js'
import { silentLogger } from '../../core/logger.js'
import { localRegistry } from '../../core/types/source.js'
import { parseVersion } from '../../core/types/version.js'
import { CacheLayout } from '../../store/paths.js'
import { createLocalRegistry } from '../../test-support/fixtures.js'
import { CrateRegistryBackend, sha256Hex } from './backend.js'

const ctx = { logger: silentLogger }

let workDir: string
let registryDir: string
let backend: CrateRegistryBackend

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'crate-fetch-registry-'))
  registryDir = join(workDir, 'registry')
  await createLocalRegistry(registryDir, [
    { name: 'demo', version: '1.0.0' },
    { name: 'demo', version: '1.2.0', files: { 'README.md': 'demo 1.2.0\n' } },
    { name: 'demo', version: '1.3.0', yanked: true },
    { name: 'tampered', version: '0.1.0', checksum: '0'.repeat(64) },
  ])
  backend = new CrateRegistryBackend({ layout: new CacheLayout(join(workDir, 'cache')) })
})

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true })
})

describe('sha256Hex', () => {
  test('hashes bytes', () => {
    expect(sha256Hex(new TextEncoder().encode('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    )
  })
})

describe('listVersions', () => {
  test('lists every published version with its yanked flag', async () => {
    const versions = await backend.listVersions('demo', localRegistry(registryDir), ctx)
    expect(versions.map((v) => [v.version.raw, v.yanked])).toEqual([
      ['1.0.0', false],
      ['1.2.0', false],
      ['1.3.0', true],
    ])
  })

  test('an unknown name is not found', async () => {
    await expect(backend.listVersions('absent', localRegistry(registryDir), ctx)).rejects.toBeInstanceOf(
      PackageNotFoundError
    )
  })

  test('a directory without an index is not found', async () => {
    await expect(backend.listVersions('demo', localRegistry(join(workDir, 'nowhere')), ctx)).rejects.toBeInstanceOf(
      PathNotFoundError
    )
  })
})

describe('materialize', () => {
  test('extracts the archive into the destination', async () => {
    const dest = join(workDir, 'out')
    const identity = await backend.materialize(
      { name: 'demo', version: parseVersion('1.2.0'), source: localRegistry(registryDir), dest },
      ctx
    )

    expect(identity.version.raw).toBe('1.2.0')
    expect(identity.subdir).toBe('')
    expect(await readFile(join(dest, 'README.md'), 'utf8')).toBe('demo 1.2.0\n')
    expect(await readFile(join(dest, 'src', 'lib.rs'), 'utf8')).toBe('// demo 1.2.0\n')
    expect(existsSync(`${dest}.crate`)).toBe(false)
  })

  test('rejects an archive whose checksum does not match the index', async () => {
    const dest = join(workDir, 'out')
    await expect(
      backend.materialize(
        { name: 'tampered', version: parseVersion('0.1.0'), source: localRegistry(registryDir), dest },
        ctx
      )
    ).rejects.toBeInstanceOf(IntegrityError)
  })

  test('rejects a version the index does not list', async () => {
    await expect(
      backend.materialize(
        { name: 'demo', version: parseVersion('9.0.0'), source: localRegistry(registryDir), dest: join(workDir, 'out') },
        ctx
      )
    ).rejects.toBeInstanceOf(ConstraintNotSatisfiedError)
  })
})
