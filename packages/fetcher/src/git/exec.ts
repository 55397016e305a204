/**
 * Safe git command execution using argv arrays (no shell interpolation).
 *
 * Repository URLs and reference names come from callers, so arguments are
 * passed straight to the git binary through child_process.spawn, never
 * through a shell.
 */

import { spawn } from 'node:child_process'

import { GitError } from '../core/errors.js'

/**
 * Result of a git command execution.
 */
export interface GitExecResult {
  /** Exit code from the git process */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * Options for git command execution.
 */
export interface GitExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Extra environment variables for the process */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: 60000ms = 1 minute) */
  timeout?: number | undefined
  /** Kills the process when aborted */
  signal?: AbortSignal | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
}

/**
 * Execute a git command safely using argv array (no shell).
 *
 * Interactive credential prompts are disabled: a repository that needs
 * authentication fails instead of hanging.
 *
 * @param args - Arguments to pass to git (not including 'git' itself)
 * @returns Result containing exitCode, stdout, and stderr
 * @throws GitError if the command fails (unless ignoreExitCode is true), times out or is aborted
 *
 * @example
 * ```typescript
 * const result = await gitExec(['rev-parse', 'HEAD'], { cwd: repoPath })
 * ```
 */
export function gitExec(args: string[], options: GitExecOptions = {}): Promise<GitExecResult> {
  const { cwd, env, timeout = 60000, signal, ignoreExitCode = false } = options
  const command = ['git', ...args].join(' ')

  return new Promise<GitExecResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GitError(command, -1, 'Aborted'))
      return
    }

    const proc = spawn('git', args, {
      cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

    let failure: string | undefined
    const kill = (reason: string): void => {
      failure ??= reason
      proc.kill()
    }

    const timeoutId = setTimeout(() => kill(`Timeout exceeded (${timeout}ms)`), timeout)
    const onAbort = (): void => kill('Aborted')
    signal?.addEventListener('abort', onAbort, { once: true })

    const cleanup = (): void => {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }

    proc.on('error', (err) => {
      cleanup()
      reject(new GitError(command, -1, err.message))
    })

    proc.on('close', (code) => {
      cleanup()
      const result: GitExecResult = {
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      }

      if (failure !== undefined) {
        reject(new GitError(command, -1, failure))
        return
      }
      if (result.exitCode !== 0 && !ignoreExitCode) {
        reject(new GitError(command, result.exitCode, result.stderr || result.stdout))
        return
      }
      resolve(result)
    })
  })
}

/**
 * Execute a git command and return stdout, trimming trailing whitespace.
 *
 * @throws GitError if the command fails
 */
export async function gitExecStdout(args: string[], options: GitExecOptions = {}): Promise<string> {
  const result = await gitExec(args, options)
  return result.stdout.trim()
}

/**
 * Execute a git command and return non-empty stdout lines.
 *
 * @throws GitError if the command fails
 */
export async function gitExecLines(args: string[], options: GitExecOptions = {}): Promise<string[]> {
  const stdout = await gitExecStdout(args, options)
  if (!stdout) {
    return []
  }
  return stdout.split('\n').filter((line) => line.length > 0)
}
