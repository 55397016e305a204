/**
 * Pinned packages and unresolved package queries.
 */

import { InvalidPackageNameError } from '../errors.js'
import { type PackageSource, sourceLocator } from './source.js'
import {
  type Version,
  type VersionConstraint,
  formatConstraint,
  parseConstraint,
  parseVersion,
  versionsEqual,
} from './version.js'

/** A package pinned to one version of one source */
export interface Package {
  readonly name: string
  readonly version: Version
  readonly source: PackageSource
}

/** A package reference still carrying a version constraint */
export interface PackageQuery {
  readonly name: string
  readonly constraint: VersionConstraint
  readonly source: PackageSource
}

/** Identity of a pinned package: `<name> v<version> (<locator>)` */
export type PackageId = string & { readonly __brand: 'PackageId' }

const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/

export function isPackageName(value: string): boolean {
  return PACKAGE_NAME_PATTERN.test(value)
}

export function asPackageName(value: string): string {
  if (!isPackageName(value)) {
    throw new InvalidPackageNameError(value)
  }
  return value
}

/** Build a package; the version may be given as a string */
export function createPackage(name: string, version: Version | string, source: PackageSource): Package {
  return {
    name: asPackageName(name),
    version: typeof version === 'string' ? parseVersion(version) : version,
    source,
  }
}

/** Build a query; the constraint may be given as a string */
export function createQuery(
  name: string,
  constraint: VersionConstraint | string,
  source: PackageSource
): PackageQuery {
  return {
    name: asPackageName(name),
    constraint: typeof constraint === 'string' ? parseConstraint(constraint) : constraint,
    source,
  }
}

export function isPackage(item: Package | PackageQuery): item is Package {
  return 'version' in item
}

export function packageId(pkg: Package): PackageId {
  return `${pkg.name} v${pkg.version.raw} (${sourceLocator(pkg.source)})` as PackageId
}

/** Display form of a query, used to key results that never resolved */
export function queryLabel(query: PackageQuery): string {
  return `${query.name} ${formatConstraint(query.constraint)} (${sourceLocator(query.source)})`
}

export function samePackage(a: Package, b: Package): boolean {
  return (
    a.name === b.name &&
    versionsEqual(a.version, b.version) &&
    sourceLocator(a.source) === sourceLocator(b.source)
  )
}
