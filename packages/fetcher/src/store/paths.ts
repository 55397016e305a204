/**
 * Cache root layout.
 *
 * <cache-root>/
 * ├── <fingerprint>/               # One complete entry per fingerprint
 * │   ├── .crate-fetch-entry.json  # Completion marker + metadata
 * │   └── pkg/                     # Materialized package contents
 * ├── .tmp/                        # Entries under construction
 * ├── .locks/                      # Per-fingerprint lock files
 * ├── .git-db/<hash>/              # Bare mirrors of git sources
 * ├── .index/<hash>/               # Bare clones of git-hosted registry indexes
 * └── config.toml                  # Optional configuration
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'

import { CONFIG_FILE_NAME } from '../core/config.js'

/** Name of the completion marker inside an entry */
export const ENTRY_MARKER = '.crate-fetch-entry.json'

/** Name of the contents directory inside an entry */
export const ENTRY_CONTENTS = 'pkg'

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/

/** Whether a directory name under the cache root is an entry fingerprint */
export function isFingerprint(value: string): boolean {
  return FINGERPRINT_PATTERN.test(value)
}

/**
 * Path builder for one cache root. Components receive a layout instead of
 * reading process-wide state, so tests can point them at temp directories.
 */
export class CacheLayout {
  readonly root: string

  constructor(root: string) {
    this.root = root
  }

  get temp(): string {
    return join(this.root, '.tmp')
  }

  get locks(): string {
    return join(this.root, '.locks')
  }

  get gitDb(): string {
    return join(this.root, '.git-db')
  }

  get index(): string {
    return join(this.root, '.index')
  }

  get configFile(): string {
    return join(this.root, CONFIG_FILE_NAME)
  }

  entry(fingerprint: string): string {
    return join(this.root, fingerprint)
  }

  entryMarker(fingerprint: string): string {
    return join(this.entry(fingerprint), ENTRY_MARKER)
  }

  entryContents(fingerprint: string): string {
    return join(this.entry(fingerprint), ENTRY_CONTENTS)
  }

  /** Lock file guarding one entry, git database or index clone */
  lock(name: string): string {
    return join(this.locks, `${name}.lock`)
  }

  gitRepo(hash: string): string {
    return join(this.gitDb, hash)
  }

  indexRepo(hash: string): string {
    return join(this.index, hash)
  }

  async ensureAll(): Promise<void> {
    await Promise.all([
      mkdir(this.temp, { recursive: true }),
      mkdir(this.locks, { recursive: true }),
    ])
  }
}
