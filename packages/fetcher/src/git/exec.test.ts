/**
 * Tests for git command execution.
 */

import { mkdtemp, readdir, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { GitError } from '../core/errors.js'
import { commitFiles, initRepo } from '../test-support/fixtures.js'
import { gitExec, gitExecLines, gitExecStdout } from './exec.js'
import { archiveCommit, ensureBareRepo, fetchRefs, listFiles, revParseCommit, showFileOrNull } from './repo.js'

describe('gitExec', () => {
  it('should execute git version and return result', async () => {
    const result = await gitExec(['--version'])
    expect(result.exitCode).toBe(0)
    expect(result.stdout).toContain('git version')
  })

  it('should handle non-zero exit codes with ignoreExitCode', async () => {
    const result = await gitExec(['status', '--invalid-flag'], { ignoreExitCode: true })
    expect(result.exitCode).not.toBe(0)
  })

  it('should throw GitError on failed commands', async () => {
    await expect(gitExec(['status', '--invalid-flag'])).rejects.toBeInstanceOf(GitError)
  })

  it('should refuse to start when already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(gitExec(['--version'], { signal: controller.signal })).rejects.toMatchObject({
      code: 'GIT_ERROR',
      stderr: 'Aborted',
    })
  })
})

describe('gitExecStdout', () => {
  it('should return trimmed stdout', async () => {
    const stdout = await gitExecStdout(['--version'])
    expect(stdout.startsWith('git version')).toBe(true)
    expect(stdout.endsWith('\n')).toBe(false)
  })
})

describe('gitExecLines', () => {
  it('should filter empty lines', async () => {
    const lines = await gitExecLines(['--version'])
    expect(lines).toHaveLength(1)
    expect(lines.every((line) => line.length > 0)).toBe(true)
  })
})

describe('bare mirrors', () => {
  let workDir: string
  let url: string
  let head: string

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'crate-fetch-git-'))
    url = await initRepo(join(workDir, 'work'))
    head = await commitFiles(join(workDir, 'work'), { 'README.md': 'hello\n', 'src/lib.rs': '' }, 'initial')
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  it('mirrors a remote and reads from a commit', async () => {
    const gitDir = join(workDir, 'mirror.git')
    await ensureBareRepo(gitDir, url)
    await ensureBareRepo(gitDir, url)
    await fetchRefs(gitDir, ['+refs/heads/*:refs/remotes/origin/*'])

    expect(await revParseCommit(gitDir, 'refs/remotes/origin/main')).toBe(head)
    expect(await revParseCommit(gitDir, 'refs/remotes/origin/missing')).toBeNull()
    expect(await showFileOrNull(gitDir, head, 'README.md')).toBe('hello\n')
    expect(await showFileOrNull(gitDir, head, 'absent.txt')).toBeNull()
    expect(await listFiles(gitDir, head)).toEqual(['README.md', 'src/lib.rs'])

    const archive = join(workDir, 'tree.tar')
    await archiveCommit(gitDir, head, archive)
    expect((await stat(archive)).size).toBeGreaterThan(0)
  })

  it('creates the mirror with its origin remote in one step', async () => {
    const gitDir = join(workDir, 'mirror.git')
    await ensureBareRepo(gitDir, url)

    expect(await gitExecStdout(['remote', 'get-url', 'origin'], { cwd: gitDir })).toBe(url)
    expect((await readdir(workDir)).sort()).toEqual(['mirror.git', 'work'])
  })

  it('leaves nothing behind when creating the mirror fails', async () => {
    const gitDir = join(workDir, 'mirror.git')
    await expect(ensureBareRepo(gitDir, url, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(GitError)

    expect(await readdir(workDir)).toEqual(['work'])

    await ensureBareRepo(gitDir, url)
    expect(await gitExecStdout(['remote', 'get-url', 'origin'], { cwd: gitDir })).toBe(url)
  })
})
