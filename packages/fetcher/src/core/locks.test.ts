/**
 * Tests for file locking utilities.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { LockError, LockTimeoutError } from './errors.js'
import { acquireLock, isLocked, withLock } from './locks.js'

let tmpDir: string

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crate-fetch-lock-'))
})

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true })
})

describe('acquireLock', () => {
  test('acquires and releases lock', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')

    const handle = await acquireLock(lockPath)
    expect(handle.path).toBe(lockPath)
    expect(await isLocked(lockPath)).toBe(true)

    await handle.release()
    expect(await isLocked(lockPath)).toBe(false)
  })

  test('creates parent directories for lock file', async () => {
    const lockPath = path.join(tmpDir, '.locks', 'nested', 'entry.lock')

    const handle = await acquireLock(lockPath)
    expect(fs.existsSync(lockPath)).toBe(true)
    await handle.release()
  })

  test('can release lock multiple times safely', async () => {
    const handle = await acquireLock(path.join(tmpDir, 'entry.lock'))
    await handle.release()
    await handle.release()
  })

  test('times out when lock is held by another', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')
    const held = await acquireLock(lockPath)

    const startTime = Date.now()
    const attempt = acquireLock(lockPath, { timeout: 300 })
    await expect(attempt).rejects.toBeInstanceOf(LockTimeoutError)
    await expect(attempt).rejects.toMatchObject({ lockPath, timeout: 300 })
    expect(Date.now() - startTime).toBeGreaterThanOrEqual(100)

    await held.release()
  })

  test('stops waiting for a held lock when the signal aborts', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')
    const held = await acquireLock(lockPath)
    const controller = new AbortController()

    const startTime = Date.now()
    const attempt = acquireLock(lockPath, { timeout: 60000, signal: controller.signal })
    setTimeout(() => controller.abort(), 50)
    await expect(attempt).rejects.toBeInstanceOf(LockError)
    await expect(attempt).rejects.toThrow('Lock acquisition aborted')
    expect(Date.now() - startTime).toBeLessThan(1500)

    await held.release()
  })

  test('rejects at once for an already aborted signal', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')

    await expect(acquireLock(lockPath, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(LockError)
    expect(await isLocked(lockPath)).toBe(false)
  })

  test('second acquisition succeeds after release', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')
    const first = await acquireLock(lockPath)
    await first.release()

    const second = await acquireLock(lockPath)
    expect(second.path).toBe(lockPath)
    await second.release()
  })
})

describe('isLocked', () => {
  test('returns false for a missing or unlocked file', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')
    expect(await isLocked(lockPath)).toBe(false)
    await fs.promises.writeFile(lockPath, '')
    expect(await isLocked(lockPath)).toBe(false)
  })
})

describe('withLock', () => {
  test('runs with the lock held and returns the result', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')

    const result = await withLock(lockPath, async () => ({ held: await isLocked(lockPath) }))

    expect(result).toEqual({ held: true })
    expect(await isLocked(lockPath)).toBe(false)
  })

  test('releases lock on error', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')

    await expect(
      withLock(lockPath, async () => {
        throw new Error('test error')
      })
    ).rejects.toThrow('test error')

    expect(await isLocked(lockPath)).toBe(false)
  })

  test('serializes concurrent operations', async () => {
    const lockPath = path.join(tmpDir, 'entry.lock')
    const order: string[] = []
    const task = (id: string) =>
      withLock(lockPath, async () => {
        order.push(`${id}:start`)
        await new Promise((resolve) => setTimeout(resolve, 50))
        order.push(`${id}:end`)
      })

    await Promise.all([task('a'), task('b')])

    expect(order).toHaveLength(4)
    expect(order[0]?.endsWith(':start')).toBe(true)
    expect(order[1]).toBe(order[0]?.replace(':start', ':end'))
  })
})
