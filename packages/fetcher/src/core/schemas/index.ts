/**
 * JSON Schema validation for crate-fetch files
 */

import { createRequire } from 'node:module'
import { Ajv, type ErrorObject } from 'ajv'

import type { CacheEntryMetadata } from '../types/cache.js'
import type { FetcherConfigFile } from '../types/config.js'

const require = createRequire(import.meta.url)
const configSchema = require('./config.schema.json')
const cacheEntrySchema = require('./cache-entry.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

const validateConfigSchema = ajv.compile<FetcherConfigFile>(configSchema)
const validateCacheEntrySchema = ajv.compile<CacheEntryMetadata>(cacheEntrySchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'additionalProperties') {
    const prop = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'enum') {
    const allowed = err.params['allowedValues']
    if (Array.isArray(allowed)) {
      return `must be one of: ${allowed.map(String).join(', ')}`
    }
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a configuration file (TOML parsed to object)
 */
export function validateConfigFile(data: unknown): ValidationResult<FetcherConfigFile> {
  if (validateConfigSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateConfigSchema.errors) }
}

/**
 * Validate a cache entry marker (.crate-fetch-entry.json parsed to object)
 */
export function validateCacheEntry(data: unknown): ValidationResult<CacheEntryMetadata> {
  if (validateCacheEntrySchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateCacheEntrySchema.errors) }
}

export { cacheEntrySchema, configSchema }
