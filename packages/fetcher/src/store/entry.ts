/**
 * Cache entries: fingerprints, markers and inspection.
 *
 * An entry directory is complete iff its marker is present, valid, names the
 * entry's own fingerprint, and the package root it points at exists. Any
 * other non-empty state is corruption.
 */

import { createHash } from 'node:crypto'
import { readFile, readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'

import { isDirectory } from '../core/atomic.js'
import { validateCacheEntry } from '../core/schemas/index.js'
import type { CacheEntryMetadata, CachedSourceKind } from '../core/types/cache.js'
import type { CacheLayout } from './paths.js'

/** What a cache entry is keyed by */
export interface EntryKey {
  kind: CachedSourceKind
  /** Normalized locator of the repository or registry */
  locator: string
  name: string
  /** Version for registries, commit for git */
  revision: string
}

/**
 * Entry fingerprint:
 * `sha256("crate-fetch-v1\0<kind>\0<locator>\0<name>\0<version-or-commit>\n")`
 */
export function entryFingerprint(key: EntryKey): string {
  return createHash('sha256')
    .update(`crate-fetch-v1\0${key.kind}\0${key.locator}\0${key.name}\0${key.revision}\n`)
    .digest('hex')
}

/** A complete entry */
export interface CacheEntry {
  fingerprint: string
  /** Package root inside the entry */
  root: string
  metadata: CacheEntryMetadata
}

export type EntryInspection =
  | { state: 'absent' }
  | { state: 'complete'; entry: CacheEntry }
  | { state: 'corrupt'; reason: string }

function isMissing(err: unknown): boolean {
  const code = (err as NodeJS.ErrnoException | undefined)?.code
  return code === 'ENOENT' || code === 'ENOTDIR'
}

/**
 * Classify the on-disk state of one entry without modifying it
 */
export async function inspectEntry(layout: CacheLayout, fingerprint: string): Promise<EntryInspection> {
  let content: string
  try {
    content = await readFile(layout.entryMarker(fingerprint), 'utf8')
  } catch (err) {
    if (!isMissing(err)) {
      const message = err instanceof Error ? err.message : String(err)
      return { state: 'corrupt', reason: `marker is unreadable: ${message}` }
    }
    if (await isDirectory(layout.entry(fingerprint))) {
      return { state: 'corrupt', reason: 'entry has no completion marker' }
    }
    return { state: 'absent' }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch {
    return { state: 'corrupt', reason: 'marker is not valid JSON' }
  }

  const result = validateCacheEntry(parsed)
  if (!result.valid) {
    const details = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
    return { state: 'corrupt', reason: `marker is invalid (${details})` }
  }
  const metadata = result.data
  if (metadata.fingerprint !== fingerprint) {
    return { state: 'corrupt', reason: `marker belongs to ${metadata.fingerprint}` }
  }

  const root = join(layout.entryContents(fingerprint), metadata.subdir)
  if (!(await isDirectory(root))) {
    return { state: 'corrupt', reason: `package root ${root} is missing` }
  }

  return { state: 'complete', entry: { fingerprint, root, metadata } }
}

/**
 * Total size in bytes of the files under a directory
 */
export async function computeDirSize(dirPath: string): Promise<number> {
  let size = 0
  const items = await readdir(dirPath, { withFileTypes: true })

  for (const item of items) {
    const itemPath = join(dirPath, item.name)
    if (item.isDirectory()) {
      size += await computeDirSize(itemPath)
    } else {
      const stats = await stat(itemPath)
      size += stats.size
    }
  }

  return size
}
