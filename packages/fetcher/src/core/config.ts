/**
 * Fetcher configuration.
 *
 * Settings come from three layers, highest precedence first:
 * 1. explicit options passed by the caller
 * 2. a TOML config file (`<cache-root>/config.toml`, or a file named explicitly)
 * 3. built-in defaults
 */

import { readFile } from 'node:fs/promises'
import { availableParallelism, homedir } from 'node:os'
import { join, resolve } from 'node:path'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError } from './errors.js'
import { validateConfigFile } from './schemas/index.js'
import type { FetcherConfigFile, GitConstraintPolicy, Verbosity } from './types/config.js'
import { CRATES_IO_INDEX } from './types/source.js'

/** Name of the config file looked up inside the cache root */
export const CONFIG_FILE_NAME = 'config.toml'

/** Fully resolved settings */
export interface FetcherSettings {
  cacheRoot: string
  verbosity: Verbosity
  fetch: {
    maxParallel: number
    /** Per-package deadline; undefined means no deadline */
    timeoutMs: number | undefined
    failFast: boolean
  }
  gitConstraintPolicy: GitConstraintPolicy
  /** Package ids whose yanked versions stay eligible */
  allowYanked: ReadonlySet<string>
  cratesIoIndex: string
  /** Named registries, name -> index URL */
  registries: Readonly<Record<string, string>>
  gitTimeoutMs: number
  lock: {
    timeout: number
    stale: number
  }
}

/** Caller overrides; every field is optional */
export interface SettingsOverrides {
  cacheRoot?: string | undefined
  verbosity?: Verbosity | undefined
  maxParallel?: number | undefined
  timeoutMs?: number | undefined
  failFast?: boolean | undefined
  gitConstraintPolicy?: GitConstraintPolicy | undefined
  allowYanked?: Iterable<string> | undefined
  cratesIoIndex?: string | undefined
  gitTimeoutMs?: number | undefined
  lockTimeout?: number | undefined
  lockStale?: number | undefined
}

export const DEFAULT_GIT_TIMEOUT_MS = 300000
export const DEFAULT_LOCK_TIMEOUT_MS = 600000
export const DEFAULT_LOCK_STALE_MS = 30000

type Env = Readonly<Record<string, string | undefined>>

/**
 * Default cache root:
 * `$CRATE_FETCH_HOME`, else `$XDG_CACHE_HOME/crate-fetch`, else `~/.cache/crate-fetch`
 */
export function getCacheHome(env: Env = process.env): string {
  const explicit = env['CRATE_FETCH_HOME']
  if (explicit !== undefined && explicit !== '') {
    return resolve(explicit)
  }
  const xdg = env['XDG_CACHE_HOME']
  if (xdg !== undefined && xdg !== '') {
    return join(resolve(xdg), 'crate-fetch')
  }
  return join(homedir(), '.cache', 'crate-fetch')
}

/**
 * Parse config file content into a validated FetcherConfigFile
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseConfigToml(content: string, filePath?: string): FetcherConfigFile {
  const source = filePath ?? CONFIG_FILE_NAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateConfigFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError('Invalid configuration', source, result.errors)
  }
  return result.data
}

/**
 * Read and parse a config file from disk
 *
 * @param filePath - Path to the config file
 * @param options.optional - Return undefined instead of failing when the file is missing
 */
export async function loadConfigFile(
  filePath: string,
  options: { optional?: boolean } = {}
): Promise<FetcherConfigFile | undefined> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    const code = (err as NodeJS.ErrnoException | undefined)?.code
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      if (options.optional) return undefined
      throw new ConfigParseError('File not found', filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseConfigToml(content, filePath)
}

/**
 * Merge overrides, file values and defaults into settings
 */
export function resolveSettings(
  file: FetcherConfigFile | undefined,
  overrides: SettingsOverrides = {},
  env: Env = process.env
): FetcherSettings {
  const cfg = file ?? {}
  return {
    cacheRoot: resolve(overrides.cacheRoot ?? cfg['cache-root'] ?? getCacheHome(env)),
    verbosity: overrides.verbosity ?? cfg.verbosity ?? 'normal',
    fetch: {
      maxParallel: overrides.maxParallel ?? cfg.fetch?.['max-parallel'] ?? availableParallelism(),
      timeoutMs: overrides.timeoutMs ?? cfg.fetch?.['timeout-ms'],
      failFast: overrides.failFast ?? cfg.fetch?.['fail-fast'] ?? false,
    },
    gitConstraintPolicy:
      overrides.gitConstraintPolicy ?? cfg.resolve?.['git-constraints'] ?? 'semver',
    allowYanked: new Set([...(cfg.resolve?.['allow-yanked'] ?? []), ...(overrides.allowYanked ?? [])]),
    cratesIoIndex: overrides.cratesIoIndex ?? cfg['crates-io']?.index ?? CRATES_IO_INDEX,
    registries: { ...(cfg.registries ?? {}) },
    gitTimeoutMs: overrides.gitTimeoutMs ?? cfg.git?.['timeout-ms'] ?? DEFAULT_GIT_TIMEOUT_MS,
    lock: {
      timeout: overrides.lockTimeout ?? cfg.lock?.['timeout-ms'] ?? DEFAULT_LOCK_TIMEOUT_MS,
      stale: overrides.lockStale ?? cfg.lock?.['stale-ms'] ?? DEFAULT_LOCK_STALE_MS,
    },
  }
}
