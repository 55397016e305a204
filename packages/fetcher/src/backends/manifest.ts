/**
 * Minimal package manifest (Cargo.toml) reader.
 *
 * Only the package's own name and version are read; dependencies and every
 * other table are ignored.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import TOML from '@iarna/toml'

import { InvalidPackageLayoutError, InvalidVersionError, PathNotFoundError } from '../core/errors.js'
import { type Version, parseVersion } from '../core/types/version.js'

export const MANIFEST_FILE = 'Cargo.toml'

/** Version assumed when a manifest omits `version` */
const IMPLICIT_VERSION = '0.0.0'

export interface ManifestInfo {
  name: string
  version: Version
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseToml(content: string, file: string): Record<string, unknown> {
  try {
    return TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new InvalidPackageLayoutError(file, `malformed manifest: ${message}`)
  }
}

/**
 * `[workspace.package].version` of a workspace root manifest, if declared
 */
export function parseWorkspaceVersion(content: string, file = MANIFEST_FILE): string | undefined {
  const workspace = parseToml(content, file)['workspace']
  if (!isRecord(workspace) || !isRecord(workspace['package'])) {
    return undefined
  }
  const version = workspace['package']['version']
  return typeof version === 'string' ? version : undefined
}

/**
 * `[package].name` of a manifest, or undefined for virtual manifests
 */
export function parseManifestName(content: string, file = MANIFEST_FILE): string | undefined {
  const pkg = parseToml(content, file)['package']
  if (!isRecord(pkg)) {
    return undefined
  }
  const name = pkg['name']
  return typeof name === 'string' ? name : undefined
}

/**
 * Parse name and version from manifest content
 *
 * @param options.workspaceVersion - Version inherited through `version.workspace = true`
 * @throws InvalidPackageLayoutError if the manifest has no package or no usable version
 */
export function parseManifest(
  content: string,
  file = MANIFEST_FILE,
  options: { workspaceVersion?: string | undefined } = {}
): ManifestInfo {
  const pkg = parseToml(content, file)['package']
  if (!isRecord(pkg) || typeof pkg['name'] !== 'string') {
    throw new InvalidPackageLayoutError(file, 'manifest has no [package] name')
  }

  const declared = pkg['version']
  let raw: string
  if (declared === undefined) {
    raw = IMPLICIT_VERSION
  } else if (typeof declared === 'string') {
    raw = declared
  } else if (isRecord(declared) && declared['workspace'] === true) {
    if (options.workspaceVersion === undefined) {
      throw new InvalidPackageLayoutError(file, 'version is inherited from a workspace that declares none')
    }
    raw = options.workspaceVersion
  } else {
    throw new InvalidPackageLayoutError(file, 'version must be a string')
  }

  try {
    return { name: pkg['name'], version: parseVersion(raw) }
  } catch (err) {
    if (err instanceof InvalidVersionError) {
      throw new InvalidPackageLayoutError(file, `invalid version "${raw}"`)
    }
    throw err
  }
}

/**
 * Read the manifest of a package directory
 *
 * @throws PathNotFoundError if the directory is missing
 * @throws InvalidPackageLayoutError if the manifest is missing or malformed
 */
export async function readManifest(dir: string): Promise<ManifestInfo> {
  const file = join(dir, MANIFEST_FILE)
  let content: string
  try {
    content = await readFile(file, 'utf8')
  } catch (err) {
    const code = (err as NodeJS.ErrnoException | undefined)?.code
    if (code === 'ENOENT') {
      throw new InvalidPackageLayoutError(dir, `no ${MANIFEST_FILE} found`)
    }
    if (code === 'ENOTDIR') {
      throw new PathNotFoundError(dir)
    }
    throw err
  }
  return parseManifest(content, file)
}
