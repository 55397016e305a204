/**
 * Atomic publish utilities
 *
 * Cache entries are built in a private temporary directory and published
 * with a single rename, so readers either see nothing or a complete entry.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Result of publishing a directory */
export type PublishResult = 'published' | 'exists'

/**
 * Create a uniquely named directory under `parent`
 *
 * @param parent - Directory to create the temp directory in (created if needed)
 * @param label - Readable prefix for the directory name
 * @returns Absolute path of the new directory
 */
export async function makeTempDir(parent: string, label: string): Promise<string> {
  await fs.promises.mkdir(parent, { recursive: true })
  const rand = crypto.randomBytes(6).toString('hex')
  const dir = path.join(parent, `${label}.${rand}.tmp`)
  await fs.promises.mkdir(dir)
  return dir
}

/**
 * Write a JSON file and flush it to disk before returning
 */
export async function writeJsonDurable(filePath: string, data: unknown): Promise<void> {
  const content = `${JSON.stringify(data, null, 2)}\n`
  const fd = await fs.promises.open(filePath, 'w', 0o644)
  try {
    await fd.writeFile(content)
    await fd.sync()
  } finally {
    await fd.close()
  }
}

/**
 * Move a fully populated temp directory into its final location
 *
 * The rename is atomic on a single filesystem; both paths must live under
 * the same cache root. If the target already exists (another writer won),
 * the temp directory is discarded and 'exists' is returned.
 */
export async function publishDir(tmpDir: string, targetDir: string): Promise<PublishResult> {
  await fs.promises.mkdir(path.dirname(targetDir), { recursive: true })
  try {
    await fs.promises.rename(tmpDir, targetDir)
    return 'published'
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code
    if (code === 'EEXIST' || code === 'ENOTEMPTY') {
      await removeDir(tmpDir)
      return 'exists'
    }
    throw err
  }
}

/**
 * Remove a directory tree; missing directories are not an error
 */
export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true })
}

/**
 * Whether a path exists and is a directory
 */
export async function isDirectory(dir: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(dir)
    return stats.isDirectory()
  } catch {
    return false
  }
}
