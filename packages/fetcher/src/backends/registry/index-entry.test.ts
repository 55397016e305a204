/**
 * Tests for index file locations, index lines and registry config.
 */

import { describe, expect, test } from 'vitest'

import { InvalidSourceError } from '../../core/errors.js'
import { downloadUrl, parseIndexFile, parseRegistryConfig } from './index-entry.js'
import { indexPath, indexPrefix } from './index-path.js'

describe('indexPath', () => {
  test('shards by name length', () => {
    expect(indexPath('a')).toBe('1/a')
    expect(indexPath('ab')).toBe('2/ab')
    expect(indexPath('abc')).toBe('3/a/abc')
    expect(indexPath('serde')).toBe('se/rd/serde')
  })

  test('lower-cases the name', () => {
    expect(indexPath('Serde_JSON')).toBe('se/rd/serde_json')
  })

  test('indexPrefix keeps the original case', () => {
    expect(indexPrefix('ABC')).toBe('3/A')
    expect(indexPrefix('Demo')).toBe('De/mo')
  })
})

describe('parseIndexFile', () => {
  const content = [
    '{"name":"demo","vers":"1.0.0","cksum":"aa","yanked":false}',
    'not json',
    '{"name":"other","vers":"9.9.9"}',
    '{"name":"demo","vers":"bogus"}',
    '',
    '{"name":"Demo","vers":"1.1.0","yanked":true}',
  ].join('\n')

  test('keeps valid lines for the package', () => {
    const versions = parseIndexFile(content, 'demo')
    expect(versions.map((v) => v.version.raw)).toEqual(['1.0.0', '1.1.0'])
    expect(versions.map((v) => v.yanked)).toEqual([false, true])
    expect(versions[0]?.checksum).toBe('aa')
    expect(versions[1]?.checksum).toBeUndefined()
  })

  test('returns nothing for an empty file', () => {
    expect(parseIndexFile('', 'demo')).toEqual([])
  })
})

describe('parseRegistryConfig', () => {
  test('reads dl and api', () => {
    expect(parseRegistryConfig('{"dl":"https://dl.example.com","api":"https://api.example.com"}', 'loc')).toEqual({
      dl: 'https://dl.example.com',
      api: 'https://api.example.com',
    })
  })

  test('rejects invalid JSON and a missing dl key', () => {
    expect(() => parseRegistryConfig('{', 'loc')).toThrow(InvalidSourceError)
    expect(() => parseRegistryConfig('{"api":"x"}', 'loc')).toThrow(InvalidSourceError)
  })
})

describe('downloadUrl', () => {
  test('appends the default path when dl has no markers', () => {
    expect(downloadUrl({ dl: 'https://dl.example.com/api/v1/crates/' }, 'demo', '1.0.0', undefined)).toBe(
      'https://dl.example.com/api/v1/crates/demo/1.0.0/download'
    )
  })

  test('fills template markers', () => {
    const dl = 'https://dl.example.com/{prefix}/{lowerprefix}/{crate}-{version}.crate?sum={sha256-checksum}'
    expect(downloadUrl({ dl }, 'Demo', '1.0.0', 'abc')).toBe(
      'https://dl.example.com/De/mo/de/mo/Demo-1.0.0.crate?sum=abc'
    )
  })
})
