/**
 * Version and version-constraint model.
 *
 * Versions follow semver 2.0.0 precedence. Constraint syntax:
 * - Exact: `=1.2.3`, or a bare full version `1.2.3`
 * - Caret: `^1.2.3`, `^1.2`, `^1`
 * - Tilde: `~1.2.3`, `~1.2`, `~1`
 * - Wildcard: `*`, `1.*`, `1.2.*` (also `x`/`X`), or a bare partial version `1.2`
 * - Range: comma separated comparators, e.g. `>=1.2, <2`
 */

import * as semver from 'semver'

import { InvalidConstraintError, InvalidVersionError } from '../errors.js'

/** A parsed semantic version */
export interface Version {
  readonly major: number
  readonly minor: number
  readonly patch: number
  readonly prerelease: readonly string[]
  readonly build: readonly string[]
  /** Canonical string form, build metadata included */
  readonly raw: string
}

/** A version with optional trailing components, as written in constraints */
export interface PartialVersion {
  readonly major: number
  readonly minor?: number | undefined
  readonly patch?: number | undefined
  readonly prerelease: readonly string[]
}

/** Comparator operators usable inside a range */
export type ComparatorOp = '=' | '>' | '>=' | '<' | '<=' | '^' | '~'

export interface Comparator {
  readonly op: ComparatorOp
  readonly version: PartialVersion
}

/** Parsed version constraint */
export type VersionConstraint =
  | { readonly kind: 'exact'; readonly version: Version }
  | { readonly kind: 'caret'; readonly version: PartialVersion }
  | { readonly kind: 'tilde'; readonly version: PartialVersion }
  | { readonly kind: 'wildcard'; readonly major?: number | undefined; readonly minor?: number | undefined }
  | { readonly kind: 'range'; readonly comparators: readonly Comparator[] }

// ============================================================================
// Versions
// ============================================================================

/**
 * Parse a version string.
 *
 * Unlike `semver.parse`, a leading `v` or `=` and surrounding whitespace are
 * rejected: the input must be exactly `major.minor.patch[-pre][+build]`.
 */
export function parseVersion(input: string): Version {
  if (!/^\d/.test(input) || input !== input.trim()) {
    throw new InvalidVersionError(input)
  }
  const parsed = semver.parse(input)
  if (parsed === null) {
    throw new InvalidVersionError(input)
  }
  const prerelease = parsed.prerelease.map(String)
  const build = [...parsed.build]
  return {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
    prerelease,
    build,
    raw: render(parsed.major, parsed.minor, parsed.patch, prerelease, build),
  }
}

/** Parse a version, returning null instead of throwing */
export function tryParseVersion(input: string): Version | null {
  try {
    return parseVersion(input)
  } catch {
    return null
  }
}

export function isValidVersion(input: string): boolean {
  return tryParseVersion(input) !== null
}

function render(
  major: number,
  minor: number,
  patch: number,
  prerelease: readonly string[],
  build: readonly string[]
): string {
  let out = `${major}.${minor}.${patch}`
  if (prerelease.length > 0) out += `-${prerelease.join('.')}`
  if (build.length > 0) out += `+${build.join('.')}`
  return out
}

export function formatVersion(version: Version): string {
  return version.raw
}

/** Compare by semver precedence; build metadata is ignored */
export function compareVersions(a: Version, b: Version): number {
  return semver.compare(a.raw, b.raw)
}

/** Strict equality, build metadata included */
export function versionsEqual(a: Version, b: Version): boolean {
  return a.raw === b.raw
}

/** Highest version by precedence, or null for an empty list */
export function maxVersion(versions: readonly Version[]): Version | null {
  let best: Version | null = null
  for (const v of versions) {
    if (best === null || compareVersions(v, best) > 0) {
      best = v
    }
  }
  return best
}

/** Sort versions highest first (returns a new array) */
export function sortVersionsDescending(versions: readonly Version[]): Version[] {
  return [...versions].sort((a, b) => compareVersions(b, a))
}

// ============================================================================
// Constraints
// ============================================================================

const NUMERIC = /^(0|[1-9]\d*)$/
const WILDCARD = /^[*xX]$/
const IDENTIFIERS = /^[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*$/
const OPERATOR = /^(>=|<=|>|<|=|\^|~)?\s*(.*)$/

type Segment = number | 'wild' | undefined

const COMPARATOR_OPS: readonly string[] = ['=', '>', '>=', '<', '<=', '^', '~']

function isComparatorOp(value: string): value is ComparatorOp {
  return COMPARATOR_OPS.includes(value)
}

interface ParsedTerm {
  op: ComparatorOp | undefined
  segments: [number | 'wild', Segment, Segment]
  prerelease: string[]
}

function parseNumeric(text: string, input: string): number {
  if (!NUMERIC.test(text)) {
    throw new InvalidConstraintError(input, `"${text}" is not a version number`)
  }
  const value = Number(text)
  if (!Number.isSafeInteger(value)) {
    throw new InvalidConstraintError(input, `"${text}" is too large`)
  }
  return value
}

function parseSegment(text: string | undefined, input: string): Segment {
  if (text === undefined) return undefined
  if (WILDCARD.test(text)) return 'wild'
  return parseNumeric(text, input)
}

function parseTerm(term: string, input: string): ParsedTerm {
  const match = OPERATOR.exec(term.trim())
  const opText = match?.[1]
  const op = opText !== undefined && isComparatorOp(opText) ? opText : undefined
  let rest = match?.[2] ?? ''
  if (rest === '') {
    throw new InvalidConstraintError(input, 'missing version')
  }

  // Build metadata never affects matching
  const plus = rest.indexOf('+')
  if (plus !== -1) {
    const build = rest.slice(plus + 1)
    if (!IDENTIFIERS.test(build)) {
      throw new InvalidConstraintError(input, `invalid build metadata "${build}"`)
    }
    rest = rest.slice(0, plus)
  }

  let prerelease: string[] = []
  const dash = rest.indexOf('-')
  if (dash !== -1) {
    const pre = rest.slice(dash + 1)
    if (!IDENTIFIERS.test(pre)) {
      throw new InvalidConstraintError(input, `invalid pre-release "${pre}"`)
    }
    prerelease = pre.split('.')
    for (const id of prerelease) {
      if (/^\d+$/.test(id) && !NUMERIC.test(id)) {
        throw new InvalidConstraintError(input, `pre-release identifier "${id}" has a leading zero`)
      }
    }
    rest = rest.slice(0, dash)
  }

  const parts = rest.split('.')
  if (parts.length > 3 || parts.some((p) => p === '')) {
    throw new InvalidConstraintError(input)
  }

  const major = parseSegment(parts[0], input)
  if (major === undefined) {
    throw new InvalidConstraintError(input, 'missing version')
  }
  const segments: ParsedTerm['segments'] = [
    major,
    parseSegment(parts[1], input),
    parseSegment(parts[2], input),
  ]

  if (prerelease.length > 0 && typeof segments[2] !== 'number') {
    throw new InvalidConstraintError(input, 'a pre-release requires a full version')
  }
  return { op, segments, prerelease }
}

function toPartial(term: ParsedTerm, input: string): PartialVersion {
  const [major, minor, patch] = term.segments
  if (major === 'wild' || minor === 'wild' || patch === 'wild') {
    throw new InvalidConstraintError(input, 'wildcards cannot be combined with an operator')
  }
  return { major, minor, patch, prerelease: term.prerelease }
}

function toWildcard(term: ParsedTerm, input: string): VersionConstraint {
  const [major, minor, patch] = term.segments
  if (major === 'wild') {
    if (minor !== undefined || patch !== undefined) {
      throw new InvalidConstraintError(input)
    }
    return { kind: 'wildcard' }
  }
  if (minor === undefined || minor === 'wild') {
    if (patch !== undefined && patch !== 'wild') {
      throw new InvalidConstraintError(input)
    }
    return { kind: 'wildcard', major }
  }
  if (patch !== undefined && patch !== 'wild') {
    throw new InvalidConstraintError(input)
  }
  return { kind: 'wildcard', major, minor }
}

function hasWildcard(term: ParsedTerm): boolean {
  return term.segments.some((s) => s === 'wild')
}

function partialToString(v: PartialVersion): string {
  let out = String(v.major)
  if (v.minor !== undefined) out += `.${v.minor}`
  if (v.patch !== undefined) out += `.${v.patch}`
  if (v.prerelease.length > 0) out += `-${v.prerelease.join('.')}`
  return out
}

function singleTerm(term: ParsedTerm, input: string): VersionConstraint {
  if (hasWildcard(term)) {
    if (term.op !== undefined && term.op !== '=') {
      throw new InvalidConstraintError(input, 'wildcards cannot be combined with an operator')
    }
    return toWildcard(term, input)
  }

  const partial = toPartial(term, input)
  switch (term.op) {
    case '^':
      return { kind: 'caret', version: partial }
    case '~':
      return { kind: 'tilde', version: partial }
    case undefined:
    case '=': {
      if (partial.minor === undefined || partial.patch === undefined) {
        return { kind: 'wildcard', major: partial.major, minor: partial.minor }
      }
      return { kind: 'exact', version: parseVersion(partialToString(partial)) }
    }
    default:
      return { kind: 'range', comparators: [{ op: term.op, version: partial }] }
  }
}

/** Parse a constraint string */
export function parseConstraint(input: string): VersionConstraint {
  const trimmed = input.trim()
  if (trimmed === '') {
    throw new InvalidConstraintError(input, 'empty constraint')
  }

  const pieces = trimmed.split(',')
  if (pieces.length === 1) {
    return singleTerm(parseTerm(trimmed, input), input)
  }

  const comparators: Comparator[] = []
  for (const piece of pieces) {
    const term = parseTerm(piece, input)
    if (hasWildcard(term)) {
      throw new InvalidConstraintError(input, 'wildcards are not allowed inside a range')
    }
    comparators.push({ op: term.op ?? '=', version: toPartial(term, input) })
  }
  return { kind: 'range', comparators }
}

/** Parse a constraint, returning null instead of throwing */
export function tryParseConstraint(input: string): VersionConstraint | null {
  try {
    return parseConstraint(input)
  } catch {
    return null
  }
}

/** Canonical string form of a constraint */
export function formatConstraint(constraint: VersionConstraint): string {
  switch (constraint.kind) {
    case 'exact':
      return `=${constraint.version.raw}`
    case 'caret':
      return `^${partialToString(constraint.version)}`
    case 'tilde':
      return `~${partialToString(constraint.version)}`
    case 'wildcard':
      if (constraint.major === undefined) return '*'
      if (constraint.minor === undefined) return `${constraint.major}.*`
      return `${constraint.major}.${constraint.minor}.*`
    case 'range':
      return constraint.comparators.map((c) => `${c.op}${partialToString(c.version)}`).join(', ')
  }
}

/** Equivalent range in the `semver` package's syntax */
function toSemverRange(constraint: VersionConstraint): string {
  switch (constraint.kind) {
    case 'exact':
      return `=${constraint.version.raw}`
    case 'caret':
      return `^${partialToString(constraint.version)}`
    case 'tilde':
      return `~${partialToString(constraint.version)}`
    case 'wildcard':
      if (constraint.major === undefined) return '*'
      if (constraint.minor === undefined) return `${constraint.major}.x`
      return `${constraint.major}.${constraint.minor}.x`
    case 'range':
      return constraint.comparators.map((c) => `${c.op}${partialToString(c.version)}`).join(' ')
  }
}

/**
 * Whether `version` satisfies `constraint`.
 *
 * A bare `*` matches every version, pre-releases included. Every other
 * constraint only admits a pre-release when one of its comparators names a
 * pre-release on the same major.minor.patch.
 */
export function matches(constraint: VersionConstraint, version: Version): boolean {
  if (constraint.kind === 'wildcard' && constraint.major === undefined) {
    return true
  }
  return semver.satisfies(version.raw, toSemverRange(constraint))
}

/** Constraint that matches every version */
export const ANY_VERSION: VersionConstraint = { kind: 'wildcard' }

/** Constraint pinning exactly one version */
export function exactly(version: Version): VersionConstraint {
  return { kind: 'exact', version }
}
