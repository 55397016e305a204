/**
 * Registry index file format.
 *
 * An index file holds one JSON object per line, one line per published
 * version. `config.json` at the index root names the download endpoint.
 */

import { InvalidSourceError } from '../../core/errors.js'
import { tryParseVersion } from '../../core/types/version.js'
import type { RegistryVersion } from '../types.js'
import { indexPrefix } from './index-path.js'

/** Fields of an index line this package reads */
export interface IndexLine {
  name: string
  vers: string
  cksum?: string | undefined
  yanked?: boolean | undefined
}

/** Index root `config.json` */
export interface RegistryConfig {
  /** Download URL, or a template with {crate}, {version}, ... markers */
  dl: string
  api?: string | undefined
}

const TEMPLATE_MARKERS = ['{crate}', '{version}', '{prefix}', '{lowerprefix}', '{sha256-checksum}']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toIndexLine(value: unknown): IndexLine | null {
  if (!isRecord(value)) return null
  const { name, vers, cksum, yanked } = value
  if (typeof name !== 'string' || typeof vers !== 'string') return null
  return {
    name,
    vers,
    cksum: typeof cksum === 'string' ? cksum : undefined,
    yanked: yanked === true,
  }
}

/**
 * Parse an index file into the versions it lists for `name`.
 *
 * Lines that are not valid JSON, belong to another name (names compare
 * case-insensitively) or carry an unparseable version are skipped.
 */
export function parseIndexFile(content: string, name: string): RegistryVersion[] {
  const wanted = name.toLowerCase()
  const versions: RegistryVersion[] = []

  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (trimmed === '') continue

    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    } catch {
      continue
    }

    const entry = toIndexLine(parsed)
    if (entry === null || entry.name.toLowerCase() !== wanted) continue

    const version = tryParseVersion(entry.vers)
    if (version === null) continue

    versions.push({ version, yanked: entry.yanked === true, checksum: entry.cksum })
  }

  return versions
}

/**
 * Parse the index root `config.json`
 *
 * @throws InvalidSourceError if the file is not valid or has no `dl` key
 */
export function parseRegistryConfig(content: string, locator: string): RegistryConfig {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new InvalidSourceError('Registry config.json is not valid JSON', locator, { cause: err })
  }
  if (!isRecord(parsed) || typeof parsed['dl'] !== 'string') {
    throw new InvalidSourceError('Registry config.json has no "dl" key', locator)
  }
  const api = parsed['api']
  return { dl: parsed['dl'], api: typeof api === 'string' ? api : undefined }
}

/**
 * Download URL for one version.
 *
 * Without template markers the URL is `<dl>/<crate>/<version>/download`.
 */
export function downloadUrl(
  config: RegistryConfig,
  name: string,
  version: string,
  checksum: string | undefined
): string {
  const { dl } = config
  if (!TEMPLATE_MARKERS.some((marker) => dl.includes(marker))) {
    return `${dl.replace(/\/+$/, '')}/${name}/${version}/download`
  }
  const prefix = indexPrefix(name)
  return dl
    .replaceAll('{crate}', name)
    .replaceAll('{version}', version)
    .replaceAll('{prefix}', prefix)
    .replaceAll('{lowerprefix}', prefix.toLowerCase())
    .replaceAll('{sha256-checksum}', checksum ?? '')
}
