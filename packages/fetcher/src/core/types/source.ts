/**
 * Package source model.
 *
 * A source says where a package comes from:
 * - `crates-io`: the default public registry
 * - `registry`: a custom registry index (sparse HTTP or git hosted)
 * - `local-registry`: a directory holding an index and `.crate` archives
 * - `git`: a repository plus a reference (branch, tag, revision, default branch)
 * - `path`: a package directory on the local filesystem
 *
 * Construction validates syntax only; nothing is fetched or read from disk.
 */

import { createHash } from 'node:crypto'
import { resolve } from 'node:path'

import { InvalidSourceError } from '../errors.js'

/** Index of the default public registry */
export const CRATES_IO_INDEX = 'sparse+https://index.crates.io/'

/** Git reference selecting a commit */
export type GitReference =
  | { readonly kind: 'default-branch' }
  | { readonly kind: 'branch'; readonly name: string }
  | { readonly kind: 'tag'; readonly name: string }
  | { readonly kind: 'revision'; readonly rev: string }

export type PackageSource =
  | { readonly kind: 'crates-io'; readonly indexUrl: string }
  | { readonly kind: 'registry'; readonly indexUrl: string }
  | { readonly kind: 'local-registry'; readonly dir: string }
  | { readonly kind: 'git'; readonly url: string; readonly reference: GitReference }
  | { readonly kind: 'path'; readonly dir: string }

export type SourceKind = PackageSource['kind']

/** Sources whose versions come from a registry index */
export type RegistrySource = Extract<PackageSource, { kind: 'crates-io' | 'registry' | 'local-registry' }>
export type GitSource = Extract<PackageSource, { kind: 'git' }>
export type PathSource = Extract<PackageSource, { kind: 'path' }>

export interface PathSourceOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string | undefined
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize a URL to scheme + host + path.
 *
 * Scheme and host are lower-cased, the port is kept, trailing slashes are
 * stripped, and query and fragment are dropped.
 */
export function normalizeUrl(input: string): string {
  let url: URL
  try {
    url = new URL(input.trim())
  } catch (err) {
    throw new InvalidSourceError('Malformed URL', input, { cause: err })
  }

  const scheme = url.protocol.toLowerCase()
  const host = url.host.toLowerCase()
  if (host === '' && scheme !== 'file:') {
    throw new InvalidSourceError('URL has no host', input)
  }
  if (url.password !== '') {
    throw new InvalidSourceError('URL must not embed credentials', input)
  }

  const user = url.username === '' ? '' : `${url.username}@`
  const path = url.pathname.replace(/\/+$/, '')
  return `${scheme}//${user}${host}${path}`
}

function normalizeDir(dir: string, options: PathSourceOptions): string {
  if (dir.trim() === '' || dir.includes('\0')) {
    throw new InvalidSourceError('Invalid filesystem path', dir)
  }
  // resolve() never touches the filesystem, so symlinks are left alone
  return resolve(options.cwd ?? process.cwd(), dir)
}

const REF_NAME = /^[^\s\0-]\S*$/

function checkRefName(value: string, what: string): string {
  if (!REF_NAME.test(value) || value.includes('..') || value.includes('\0')) {
    throw new InvalidSourceError(`Invalid git ${what}`, value)
  }
  return value
}

// ============================================================================
// Constructors
// ============================================================================

/** The default public registry, optionally through a mirror index */
export function cratesIo(indexUrl: string = CRATES_IO_INDEX): PackageSource {
  return { kind: 'crates-io', indexUrl: normalizeUrl(indexUrl) }
}

/** A custom registry index (`sparse+https://...` or a git URL) */
export function registry(indexUrl: string): PackageSource {
  return { kind: 'registry', indexUrl: normalizeUrl(indexUrl) }
}

/** A registry laid out on the local filesystem */
export function localRegistry(dir: string, options: PathSourceOptions = {}): RegistrySource {
  return { kind: 'local-registry', dir: normalizeDir(dir, options) }
}

/** A git repository; the reference defaults to the remote's default branch */
export function git(url: string, reference: GitReference = { kind: 'default-branch' }): GitSource {
  return { kind: 'git', url: normalizeUrl(url), reference: checkReference(reference) }
}

/** A package directory on the local filesystem */
export function path(dir: string, options: PathSourceOptions = {}): PathSource {
  return { kind: 'path', dir: normalizeDir(dir, options) }
}

export function branch(name: string): GitReference {
  return { kind: 'branch', name: checkRefName(name, 'branch') }
}

export function tag(name: string): GitReference {
  return { kind: 'tag', name: checkRefName(name, 'tag') }
}

export function revision(rev: string): GitReference {
  return { kind: 'revision', rev: checkRefName(rev, 'revision') }
}

export const DEFAULT_BRANCH: GitReference = { kind: 'default-branch' }

function checkReference(reference: GitReference): GitReference {
  switch (reference.kind) {
    case 'default-branch':
      return reference
    case 'branch':
      return branch(reference.name)
    case 'tag':
      return tag(reference.name)
    case 'revision':
      return revision(reference.rev)
  }
}

// ============================================================================
// Identity
// ============================================================================

/** Query-string form of a git reference, empty for the default branch */
export function gitReferenceQuery(reference: GitReference): string {
  switch (reference.kind) {
    case 'default-branch':
      return ''
    case 'branch':
      return `branch=${reference.name}`
    case 'tag':
      return `tag=${reference.name}`
    case 'revision':
      return `rev=${reference.rev}`
  }
}

/** Human readable git reference */
export function formatGitReference(reference: GitReference): string {
  switch (reference.kind) {
    case 'default-branch':
      return 'HEAD'
    case 'branch':
      return `branch ${reference.name}`
    case 'tag':
      return `tag ${reference.name}`
    case 'revision':
      return `rev ${reference.rev}`
  }
}

/** Normalized locator string, unique per source */
export function sourceLocator(source: PackageSource): string {
  switch (source.kind) {
    case 'crates-io':
      return `crates-io+${source.indexUrl}`
    case 'registry':
      return `registry+${source.indexUrl}`
    case 'local-registry':
      return `local-registry+file://${source.dir}`
    case 'git': {
      const query = gitReferenceQuery(source.reference)
      return query === '' ? `git+${source.url}` : `git+${source.url}?${query}`
    }
    case 'path':
      return `path+file://${source.dir}`
  }
}

/**
 * Stable fingerprint of a source: sha256 over the kind discriminator and the
 * normalized locator.
 */
export function sourceFingerprint(source: PackageSource): string {
  return createHash('sha256')
    .update(`crate-fetch-source-v1\0${source.kind}\0${sourceLocator(source)}\n`)
    .digest('hex')
}

export function sameSource(a: PackageSource, b: PackageSource): boolean {
  return sourceLocator(a) === sourceLocator(b)
}

export function isRegistrySource(source: PackageSource): source is RegistrySource {
  return source.kind === 'crates-io' || source.kind === 'registry' || source.kind === 'local-registry'
}

// ============================================================================
// Source specs
// ============================================================================

function parseGitSpec(spec: string, rest: string): PackageSource {
  const hash = rest.lastIndexOf('#')
  if (hash === -1) {
    return git(rest)
  }
  const url = rest.slice(0, hash)
  const fragment = rest.slice(hash + 1)
  const eq = fragment.indexOf('=')
  const key = eq === -1 ? '' : fragment.slice(0, eq)
  const value = fragment.slice(eq + 1)
  switch (key) {
    case 'branch':
      return git(url, branch(value))
    case 'tag':
      return git(url, tag(value))
    case 'rev':
      return git(url, revision(value))
    default:
      throw new InvalidSourceError('Expected #branch=, #tag= or #rev=', spec)
  }
}

/**
 * Parse a source spec string:
 * - `crates-io`
 * - `registry+<index-url>` or `sparse+<url>`
 * - `local+<dir>`
 * - `git+<url>[#branch=<name>|#tag=<name>|#rev=<rev>]`
 * - `path+<dir>`
 */
export function parseSourceSpec(spec: string, options: PathSourceOptions = {}): PackageSource {
  const trimmed = spec.trim()
  if (trimmed === 'crates-io') {
    return cratesIo()
  }
  if (trimmed.startsWith('sparse+')) {
    return registry(trimmed)
  }

  const plus = trimmed.indexOf('+')
  if (plus === -1) {
    throw new InvalidSourceError('Unknown source spec', spec)
  }
  const prefix = trimmed.slice(0, plus)
  const rest = trimmed.slice(plus + 1)
  switch (prefix) {
    case 'registry':
      return registry(rest)
    case 'local':
      return localRegistry(rest, options)
    case 'git':
      return parseGitSpec(spec, rest)
    case 'path':
      return path(rest, options)
    default:
      throw new InvalidSourceError('Unknown source spec', spec)
  }
}
