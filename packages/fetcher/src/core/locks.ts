/**
 * Cross-process file locking primitives
 *
 * Uses proper-lockfile for file locking that works across independent
 * processes sharing one cache root. Each cache entry (and each git database
 * or index checkout) is guarded by its own lock file under `.locks/`.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError } from './errors.js'

/** Lock options */
export interface LockOptions {
  /** How long to wait for a held lock, in milliseconds (default: 600000) */
  timeout?: number | undefined
  /** Stale lock threshold in milliseconds (default: 30000) */
  stale?: number | undefined
  /** Stops waiting for a held lock */
  signal?: AbortSignal | undefined
}

/** Default lock options */
const DEFAULT_LOCK_OPTIONS: { timeout: number; stale: number } = {
  timeout: 600000,
  stale: 30000,
}

/** Delay between acquisition attempts */
const RETRY_INTERVAL = 100

/** Lock release function */
export type ReleaseFn = () => Promise<void>

/** Lock handle returned by lock acquisition */
export interface LockHandle {
  /** Release the lock */
  release: ReleaseFn
  /** Path that is locked */
  path: string
}

/**
 * Ensure a file exists (create empty if needed) for locking
 */
async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  try {
    await fs.promises.access(lockPath)
  } catch {
    await fs.promises.writeFile(lockPath, '', { flag: 'a' })
  }
}

/** Whether proper-lockfile refused because another holder has the lock */
function isHeldElsewhere(err: unknown): boolean {
  if ((err as NodeJS.ErrnoException | undefined)?.code === 'ELOCKED') {
    return true
  }
  return err instanceof Error && (err.message.includes('ELOCKED') || err.message.includes('already being held'))
}

/** Wait before the next attempt; an abort cuts the wait short */
async function pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
  try {
    await sleep(ms, undefined, { signal })
  } catch (err) {
    if (!signal?.aborted) throw err
  }
}

function wrapRelease(release: () => Promise<void>, lockPath: string): LockHandle {
  let released = false
  return {
    release: async () => {
      if (released) return
      released = true
      try {
        await release()
      } catch (err) {
        // Already released (or compromised and cleaned up by the library)
        if (
          err instanceof Error &&
          !err.message.includes('not acquired') &&
          !err.message.includes('already released')
        ) {
          throw new LockError(`Failed to release lock: ${err.message}`, lockPath)
        }
      }
    },
    path: lockPath,
  }
}

/**
 * Acquire a lock on a file
 *
 * Attempts are retried every RETRY_INTERVAL until the lock is free, the
 * timeout elapses or `options.signal` aborts.
 *
 * @param lockPath - Path to lock (will create if needed)
 * @returns Lock handle with release function
 * @throws LockTimeoutError if lock cannot be acquired within timeout
 * @throws LockError if aborted, and for other lock failures
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const opts = {
    timeout: options.timeout ?? DEFAULT_LOCK_OPTIONS.timeout,
    stale: options.stale ?? DEFAULT_LOCK_OPTIONS.stale,
  }
  const { signal } = options
  const deadline = Date.now() + opts.timeout

  await ensureLockFile(lockPath)

  for (;;) {
    if (signal?.aborted) {
      throw new LockError('Lock acquisition aborted', lockPath)
    }
    try {
      const release = await lockfile.lock(lockPath, { stale: opts.stale, retries: 0 })
      return wrapRelease(release, lockPath)
    } catch (err) {
      if (!isHeldElsewhere(err)) {
        throw new LockError(err instanceof Error ? err.message : String(err), lockPath)
      }
    }
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, opts.timeout)
    }
    await pause(RETRY_INTERVAL, signal)
  }
}

/**
 * Check if a file is currently locked
 */
export async function isLocked(lockPath: string, options: LockOptions = {}): Promise<boolean> {
  try {
    await fs.promises.access(lockPath)
    return await lockfile.check(lockPath, { stale: options.stale ?? DEFAULT_LOCK_OPTIONS.stale })
  } catch {
    return false
  }
}

/**
 * Execute a function with a lock held
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const handle = await acquireLock(lockPath, options)
  try {
    return await fn()
  } finally {
    await handle.release()
  }
}
