/**
 * HTTP helpers over the global fetch API.
 */

import { SourceUnavailableError } from '../../core/errors.js'

/** Statuses that mean "this index has no such file" */
const NOT_FOUND_STATUSES = new Set([404, 410, 451])

async function request(url: string, locator: string, signal: AbortSignal | undefined): Promise<Response> {
  try {
    return await fetch(url, { signal, headers: { 'user-agent': 'crate-fetch' } })
  } catch (err) {
    if (signal?.aborted) {
      throw err
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new SourceUnavailableError(locator, `request to ${url} failed: ${message}`, { cause: err })
  }
}

/**
 * GET a text resource; null when the server reports it missing
 *
 * @throws SourceUnavailableError on network failures and other error statuses
 */
export async function fetchTextOrNull(
  url: string,
  locator: string,
  signal?: AbortSignal | undefined
): Promise<string | null> {
  const response = await request(url, locator, signal)
  if (NOT_FOUND_STATUSES.has(response.status)) {
    return null
  }
  if (!response.ok) {
    throw new SourceUnavailableError(locator, `GET ${url} returned ${response.status}`)
  }
  return response.text()
}

/**
 * GET a binary resource
 *
 * @throws SourceUnavailableError on network failures and error statuses
 */
export async function fetchBytes(url: string, locator: string, signal?: AbortSignal | undefined): Promise<Buffer> {
  const response = await request(url, locator, signal)
  if (!response.ok) {
    throw new SourceUnavailableError(locator, `GET ${url} returned ${response.status}`)
  }
  return Buffer.from(await response.arrayBuffer())
}
