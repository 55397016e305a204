/**
 * Terminal UI utilities for the crate-fetch CLI.
 *
 * Results go to stdout, progress and diagnostics to stderr, so that
 * `--json` output and plain listings stay pipeable.
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  info: chalk.hex('#6366f1'), // indigo
  warn: chalk.hex('#f59e0b'), // amber
  error: chalk.hex('#ef4444'), // red
  muted: chalk.hex('#6b7280'), // gray-500
  emphasis: chalk.hex('#f3f4f6'), // gray-100
  code: chalk.hex('#a78bfa'), // violet-400
  dim: chalk.hex('#4b5563'), // gray-600
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  info: colors.info(figures.info),
  pointer: colors.muted(figures.pointer),
  bullet: colors.muted(figures.bullet),
  arrow: colors.muted('→'),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Spinner on stderr. Disabled (prints nothing) when stderr is not a TTY.
 */
export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
    stream: process.stderr,
    isEnabled: process.stderr.isTTY === true,
  })
}

// ═══════════════════════════════════════════════════════════════════════════
// Layout Components
// ═══════════════════════════════════════════════════════════════════════════

export function header(text: string): void {
  console.log()
  console.log(colors.emphasis(text))
}

export function success(text: string): void {
  console.log(`${symbols.success} ${text}`)
}

export function error(text: string): void {
  console.error(`${symbols.error} ${colors.error(text)}`)
}

export function warning(text: string): void {
  console.error(`${symbols.warning} ${colors.warn(text)}`)
}

/**
 * Print an indented label/value line
 */
export function info(label: string, value: string): void {
  console.log(`  ${colors.muted(label)} ${value}`)
}

/**
 * Print a summary block at the end
 */
export function summaryBlock(items: { label: string; value: string }[]): void {
  console.log()
  for (const item of items) {
    console.log(`  ${colors.muted(item.label.padEnd(12))} ${item.value}`)
  }
}

export function blank(): void {
  console.log()
}

/** Print a value as indented JSON on stdout */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string, home: string = process.env['HOME'] ?? ''): string {
  if (home) {
    return filePath.replaceAll(home, '~')
  }
  return filePath
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  return `${(ms / 1000).toFixed(1)}s`
}

/**
 * Format bytes as human-readable string.
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let value = bytes
  let unitIndex = 0

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024
    unitIndex++
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`
}
