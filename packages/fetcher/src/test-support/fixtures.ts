/**
 * On-disk fixtures shared by the backend, cache and fetcher tests: package
 * directories, local registries built with real `.crate` archives, and git
 * repositories reachable through `file://` URLs.
 */

import { createHash } from 'node:crypto'
import { appendFile, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { pathToFileURL } from 'node:url'
import * as tar from 'tar'

import { gitExecStdout } from '../git/exec.js'
import { indexPath } from '../backends/registry/index-path.js'

export interface CrateSpec {
  name: string
  version: string
  yanked?: boolean | undefined
  /** Extra files, relative to the package root */
  files?: Record<string, string> | undefined
  /** Record this checksum in the index instead of the real one */
  checksum?: string | undefined
}

export function manifest(name: string, version: string): string {
  return `[package]\nname = "${name}"\nversion = "${version}"\n`
}

/**
 * Write a package directory with a manifest and the given files
 */
export async function writePackageDir(
  dir: string,
  name: string,
  version: string,
  files: Record<string, string> = {}
): Promise<void> {
  await mkdir(dir, { recursive: true })
  await writeFile(join(dir, 'Cargo.toml'), manifest(name, version))
  for (const [file, content] of Object.entries({ 'src/lib.rs': `// ${name} ${version}\n`, ...files })) {
    await mkdir(dirname(join(dir, file)), { recursive: true })
    await writeFile(join(dir, file), content)
  }
}

/**
 * Build a local registry: an `index/` tree plus one gzipped `.crate` archive
 * per version, each holding a single `<name>-<version>/` directory.
 */
export async function createLocalRegistry(dir: string, crates: readonly CrateSpec[]): Promise<void> {
  const stage = join(dir, '.stage')
  await mkdir(join(dir, 'index'), { recursive: true })

  for (const crate of crates) {
    const folder = `${crate.name}-${crate.version}`
    await writePackageDir(join(stage, folder), crate.name, crate.version, crate.files)
    const archive = join(dir, `${folder}.crate`)
    await tar.c({ gzip: true, file: archive, cwd: stage, portable: true }, [folder])

    const cksum = crate.checksum ?? createHash('sha256').update(await readFile(archive)).digest('hex')
    const line = {
      name: crate.name,
      vers: crate.version,
      deps: [],
      cksum,
      features: {},
      yanked: crate.yanked ?? false,
    }
    const indexFile = join(dir, 'index', indexPath(crate.name))
    await mkdir(dirname(indexFile), { recursive: true })
    await appendFile(indexFile, `${JSON.stringify(line)}\n`)
  }

  await rm(stage, { recursive: true, force: true })
}

const GIT_ENV = {
  GIT_AUTHOR_NAME: 'Test',
  GIT_AUTHOR_EMAIL: 'test@example.com',
  GIT_COMMITTER_NAME: 'Test',
  GIT_COMMITTER_EMAIL: 'test@example.com',
  GIT_CONFIG_NOSYSTEM: '1',
}

/** Run git in a fixture repository */
export function git(cwd: string, ...args: string[]): Promise<string> {
  return gitExecStdout(args, { cwd, env: GIT_ENV })
}

/**
 * A work tree repository on branch `main`; returns its `file://` URL
 */
export async function initRepo(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true })
  await git(dir, 'init', '--quiet', '--initial-branch=main')
  return pathToFileURL(dir).href
}

/**
 * Write files, commit them and return the new commit hash
 */
export async function commitFiles(dir: string, files: Record<string, string>, message: string): Promise<string> {
  for (const [file, content] of Object.entries(files)) {
    await mkdir(dirname(join(dir, file)), { recursive: true })
    await writeFile(join(dir, file), content)
  }
  await git(dir, 'add', '--all')
  await git(dir, 'commit', '--quiet', '-m', message)
  return git(dir, 'rev-parse', 'HEAD')
}
