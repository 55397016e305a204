/**
 * CLI package tests.
 *
 * Commands run in process against a temp cache root and path sources, so
 * nothing touches the network.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { createProgram, main } from './index.js'

let workDir: string
let cacheRoot: string
let crateDir: string

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'crate-fetch-cli-'))
  cacheRoot = join(workDir, 'cache')
  crateDir = join(workDir, 'demo')
  await mkdir(crateDir)
  await writeFile(join(crateDir, 'Cargo.toml'), '[package]\nname = "demo"\nversion = "0.3.1"\n')
})

afterEach(async () => {
  vi.restoreAllMocks()
  process.exitCode = undefined
  await rm(workDir, { recursive: true, force: true })
})

function captureStdout(): string[] {
  const lines: string[] = []
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    lines.push(String(line))
  })
  vi.spyOn(console, 'error').mockImplementation(() => {})
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  return lines
}

describe('createProgram', () => {
  test('registers resolve, fetch and cache commands', () => {
    const names = createProgram().commands.map((command) => command.name())
    expect(names).toEqual(['resolve', 'fetch', 'cache'])
  })

  test('cache group has path, list, remove and prune-tmp', () => {
    const cache = createProgram().commands.find((command) => command.name() === 'cache')
    expect(cache?.commands.map((command) => command.name())).toEqual(['path', 'list', 'remove', 'prune-tmp'])
  })
})

describe('resolve', () => {
  test('prints a path package as JSON', async () => {
    const out = captureStdout()
    await main(['node', 'crate-fetch', '--cache-root', cacheRoot, 'resolve', 'demo', '--source', `path+${crateDir}`, '--json'])

    expect(out).toHaveLength(1)
    expect(JSON.parse(out[0] ?? '')).toEqual({
      id: `demo v0.3.1 (path+file://${crateDir})`,
      name: 'demo',
      version: '0.3.1',
      source: `path+file://${crateDir}`,
    })
  })

  test('--all lists nothing when the constraint excludes the only version', async () => {
    const out = captureStdout()
    await main([
      'node',
      'crate-fetch',
      '--cache-root',
      cacheRoot,
      'resolve',
      'demo',
      '^1.0',
      '--source',
      `path+${crateDir}`,
      '--all',
      '--json',
    ])

    expect(out).toEqual(['[]'])
  })
})

describe('fetch', () => {
  test('reports the directory of a path package in place', async () => {
    const out = captureStdout()
    await main(['node', 'crate-fetch', '--cache-root', cacheRoot, 'fetch', 'demo@^0.3', '--source', `path+${crateDir}`, '--json'])

    expect(JSON.parse(out[0] ?? '')).toEqual({
      ok: true,
      results: [
        {
          id: `demo v0.3.1 (path+file://${crateDir})`,
          status: 'ok',
          version: '0.3.1',
          root: crateDir,
          origin: 'local',
        },
      ],
    })
    expect(process.exitCode).toBeUndefined()
  })

  test('sets exit code 1 when a package fails', async () => {
    const out = captureStdout()
    await main(['node', 'crate-fetch', '--cache-root', cacheRoot, 'fetch', 'demo@^2', '--source', `path+${crateDir}`, '--json'])

    const report = JSON.parse(out[0] ?? '')
    expect(report.ok).toBe(false)
    expect(report.results[0].status).toBe('error')
    expect(report.results[0].code).toBe('CONSTRAINT_NOT_SATISFIED')
    expect(process.exitCode).toBe(1)
  })
})

describe('cache', () => {
  test('path prints the cache root', async () => {
    const out = captureStdout()
    await main(['node', 'crate-fetch', '--cache-root', cacheRoot, 'cache', 'path'])
    expect(out).toEqual([cacheRoot])
  })

  test('list prints JSON for an empty cache', async () => {
    const out = captureStdout()
    await main(['node', 'crate-fetch', '--cache-root', cacheRoot, 'cache', 'list', '--json'])
    expect(out).toEqual(['[]'])
  })
})
