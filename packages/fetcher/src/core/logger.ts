/**
 * Status and diagnostic output.
 *
 * Library components never write to the console directly; they receive a
 * Logger. The default writes chalk-styled lines to stderr, filtered by
 * verbosity:
 * - quiet: errors only
 * - normal: status lines, warnings, errors
 * - verbose: everything, including debug detail
 */

import { Chalk, type ChalkInstance } from 'chalk'

import type { Verbosity } from './types/config.js'

/** Anything lines can be written to */
export interface LogStream {
  write(chunk: string): unknown
  isTTY?: boolean | undefined
}

export interface Logger {
  /** Right-aligned status verb followed by detail, e.g. `Fetching serde v1.0.0` */
  status(verb: string, detail: string): void
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  /** Output level (default: normal) */
  verbosity?: Verbosity | undefined
  /** Destination (default: process.stderr) */
  stream?: LogStream | undefined
  /** Force colors on or off (default: stream is a TTY) */
  color?: boolean | undefined
}

const LEVEL: Record<Verbosity, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
}

const STATUS_WIDTH = 12

export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr
  const level = LEVEL[options.verbosity ?? 'normal']
  const useColor = options.color ?? stream.isTTY === true
  const c: ChalkInstance = new Chalk({ level: useColor ? 1 : 0 })

  const write = (line: string): void => {
    stream.write(`${line}\n`)
  }

  return {
    status(verb, detail) {
      if (level >= LEVEL.normal) {
        write(`${c.green.bold(verb.padStart(STATUS_WIDTH))} ${detail}`)
      }
    },
    debug(message) {
      if (level >= LEVEL.verbose) {
        write(c.gray(`debug: ${message}`))
      }
    },
    info(message) {
      if (level >= LEVEL.normal) {
        write(message)
      }
    },
    warn(message) {
      if (level >= LEVEL.normal) {
        write(`${c.yellow.bold('warning:')} ${message}`)
      }
    },
    error(message) {
      write(`${c.red.bold('error:')} ${message}`)
    },
  }
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  status: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
