/**
 * Local registry directory:
 *
 * <dir>/
 * ├── index/                     # Same sharding as remote indexes
 * └── <name>-<version>.crate     # Archives side by side
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { isDirectory } from '../../core/atomic.js'
import { PathNotFoundError } from '../../core/errors.js'
import type { BackendContext } from '../types.js'
import { indexPath } from './index-path.js'
import type { IndexReader } from './reader.js'

function isMissing(err: unknown): boolean {
  const code = (err as NodeJS.ErrnoException | undefined)?.code
  return code === 'ENOENT' || code === 'ENOTDIR'
}

export class LocalIndex implements IndexReader {
  readonly dir: string

  constructor(dir: string) {
    this.dir = dir
  }

  async readIndexFile(name: string, ctx: BackendContext): Promise<string | null> {
    const file = join(this.dir, 'index', indexPath(name))
    ctx.logger.debug(`reading ${file}`)
    try {
      return await readFile(file, 'utf8')
    } catch (err) {
      if (!isMissing(err)) {
        throw err
      }
    }
    if (!(await isDirectory(join(this.dir, 'index')))) {
      throw new PathNotFoundError(join(this.dir, 'index'))
    }
    return null
  }

  async download(name: string, version: string, _checksum: string | undefined, ctx: BackendContext): Promise<Buffer> {
    const file = join(this.dir, `${name}-${version}.crate`)
    ctx.logger.debug(`reading ${file}`)
    try {
      return await readFile(file)
    } catch (err) {
      if (isMissing(err)) {
        throw new PathNotFoundError(file)
      }
      throw err
    }
  }
}
