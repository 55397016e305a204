/**
 * Tests for temp directories and atomic publishing.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { isDirectory, makeTempDir, publishDir, removeDir, writeJsonDurable } from './atomic.js'

let tmpDir: string

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crate-fetch-atomic-'))
})

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true })
})

describe('makeTempDir', () => {
  test('creates a labelled directory under the parent', async () => {
    const dir = await makeTempDir(path.join(tmpDir, '.tmp'), 'abc')
    expect(path.dirname(dir)).toBe(path.join(tmpDir, '.tmp'))
    expect(path.basename(dir)).toMatch(/^abc\.[0-9a-f]{12}\.tmp$/)
    expect(await isDirectory(dir)).toBe(true)
  })
})

describe('publishDir', () => {
  test('moves the directory into place', async () => {
    const tmp = await makeTempDir(tmpDir, 'entry')
    await writeJsonDurable(path.join(tmp, 'marker.json'), { ok: true })
    const target = path.join(tmpDir, 'final')

    expect(await publishDir(tmp, target)).toBe('published')
    expect(await isDirectory(tmp)).toBe(false)
    expect(JSON.parse(await fs.promises.readFile(path.join(target, 'marker.json'), 'utf8'))).toEqual({ ok: true })
  })

  test('discards the temp directory when the target is already populated', async () => {
    const target = path.join(tmpDir, 'final')
    await fs.promises.mkdir(target)
    await fs.promises.writeFile(path.join(target, 'winner'), '1')
    const tmp = await makeTempDir(tmpDir, 'entry')
    await fs.promises.writeFile(path.join(tmp, 'loser'), '2')

    expect(await publishDir(tmp, target)).toBe('exists')
    expect(await isDirectory(tmp)).toBe(false)
    expect(await fs.promises.readdir(target)).toEqual(['winner'])
  })
})

describe('removeDir', () => {
  test('missing directories are not an error', async () => {
    await expect(removeDir(path.join(tmpDir, 'absent'))).resolves.toBeUndefined()
  })
})
