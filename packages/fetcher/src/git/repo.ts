/**
 * Git repository operations over bare mirrors.
 *
 * Every remote repository is mirrored once into a bare database; package
 * contents are read or archived from it at a concrete commit without ever
 * creating a working tree.
 */

import { basename, dirname } from 'node:path'

import { isDirectory, makeTempDir, publishDir, removeDir } from '../core/atomic.js'
import { gitExec, gitExecLines } from './exec.js'

/** Shared options for repository operations */
export interface RepoOptions {
  timeout?: number | undefined
  signal?: AbortSignal | undefined
}

/**
 * Create a bare repository with `origin` pointing at `url`, unless one exists.
 * The repository is set up beside `gitDir` and renamed into place, so a
 * failed or aborted setup never leaves a mirror without its remote.
 */
export async function ensureBareRepo(gitDir: string, url: string, options: RepoOptions = {}): Promise<void> {
  if (await isDirectory(gitDir)) {
    return
  }
  const tmp = await makeTempDir(dirname(gitDir), basename(gitDir))
  try {
    await gitExec(['init', '--bare', '--quiet', tmp], options)
    await gitExec(['remote', 'add', 'origin', url], { ...options, cwd: tmp })
    await publishDir(tmp, gitDir)
  } catch (err) {
    await removeDir(tmp)
    throw err
  }
}

/**
 * Fetch refspecs from `origin` into a bare repository.
 *
 * @throws GitError if the fetch fails (unknown ref, unreachable remote)
 */
export async function fetchRefs(
  gitDir: string,
  refspecs: string[],
  options: RepoOptions & { depth?: number | undefined } = {}
): Promise<void> {
  const args = ['fetch', '--force', '--quiet', '--no-tags']
  if (options.depth !== undefined) {
    args.push('--depth', String(options.depth))
  }
  args.push('origin', ...refspecs)
  await gitExec(args, { timeout: options.timeout, signal: options.signal, cwd: gitDir })
}

/**
 * Resolve a revision to a full commit hash, or null if it does not exist.
 */
export async function revParseCommit(
  gitDir: string,
  rev: string,
  options: RepoOptions = {}
): Promise<string | null> {
  const result = await gitExec(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], {
    ...options,
    cwd: gitDir,
    ignoreExitCode: true,
  })
  if (result.exitCode !== 0) {
    return null
  }
  const sha = result.stdout.trim()
  return sha === '' ? null : sha
}

/**
 * Read file contents at a specific commit.
 *
 * @throws GitError if the file doesn't exist at that commit
 */
export async function showFile(
  gitDir: string,
  commit: string,
  path: string,
  options: RepoOptions = {}
): Promise<string> {
  const result = await gitExec(['show', `${commit}:${path}`], { ...options, cwd: gitDir })
  return result.stdout
}

/**
 * Read file contents at a specific commit, or null if the file doesn't exist.
 */
export async function showFileOrNull(
  gitDir: string,
  commit: string,
  path: string,
  options: RepoOptions = {}
): Promise<string | null> {
  const result = await gitExec(['cat-file', 'blob', `${commit}:${path}`], {
    ...options,
    cwd: gitDir,
    ignoreExitCode: true,
  })
  return result.exitCode === 0 ? result.stdout : null
}

/**
 * List every file path in the tree of a commit.
 */
export async function listFiles(gitDir: string, commit: string, options: RepoOptions = {}): Promise<string[]> {
  return gitExecLines(['ls-tree', '-r', '--name-only', '--full-tree', commit], {
    ...options,
    cwd: gitDir,
  })
}

/**
 * Write a tar archive of the whole tree at `commit` to `outFile`.
 */
export async function archiveCommit(
  gitDir: string,
  commit: string,
  outFile: string,
  options: RepoOptions = {}
): Promise<void> {
  await gitExec(['archive', '--format=tar', `--output=${outFile}`, commit], {
    ...options,
    cwd: gitDir,
  })
}
