/**
 * Local path backend: validates a package directory in place; nothing is copied.
 */

import { stat } from 'node:fs/promises'

import { InvalidPackageLayoutError, PathNotFoundError } from '../core/errors.js'
import type { PathSource } from '../core/types/source.js'
import { MANIFEST_FILE, readManifest } from './manifest.js'
import type { BackendContext, PathBackend, ResolvedIdentity } from './types.js'

export class LocalPathBackend implements PathBackend {
  async inspect(name: string, source: PathSource, ctx: BackendContext): Promise<ResolvedIdentity> {
    try {
      const stats = await stat(source.dir)
      if (!stats.isDirectory()) {
        throw new PathNotFoundError(source.dir)
      }
    } catch (err) {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
        throw new PathNotFoundError(source.dir)
      }
      throw err
    }

    const manifest = await readManifest(source.dir)
    if (manifest.name !== name) {
      throw new InvalidPackageLayoutError(
        source.dir,
        `${MANIFEST_FILE} declares package "${manifest.name}", expected "${name}"`
      )
    }

    ctx.logger.debug(`inspected ${name} v${manifest.version.raw} at ${source.dir}`)
    return { version: manifest.version, subdir: '' }
  }
}
