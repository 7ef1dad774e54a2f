/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import type { Logger } from 'yubisetup'

type Stream = Pick<NodeJS.WriteStream, 'isTTY' | 'write'>

/**
 * Whether ANSI sequences may be written to `stream`. Checked at call time
 * (not module load time).
 */
function useColor(stream: Stream): boolean {
  const noColor = process.env.NO_COLOR
  return (stream.isTTY ?? false) && (noColor === undefined || noColor === '')
}

function paint(stream: Stream, open: number, close: number, text: string): string {
  return useColor(stream) ? `\x1b[${String(open)}m${text}\x1b[${String(close)}m` : text
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return paint(process.stdout, 1, 22, text)
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return paint(process.stdout, 2, 22, text)
}

const red = (stream: Stream, text: string): string => paint(stream, 31, 39, text)
const green = (stream: Stream, text: string): string => paint(stream, 32, 39, text)
const yellow = (stream: Stream, text: string): string => paint(stream, 33, 39, text)
const blue = (stream: Stream, text: string): string => paint(stream, 34, 39, text)

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Options for {@link ConsoleLogger}. */
export interface ConsoleLoggerOptions {
  /** Show `debug` messages. */
  verbose?: boolean | undefined
}

/**
 * {@link Logger} that writes progress to stdout and problems to stderr.
 *
 * `error` messages are written as given; the pipeline prefixes them with the
 * run's tracking id.
 */
export class ConsoleLogger implements Logger {
  readonly #verbose: boolean

  constructor(options: ConsoleLoggerOptions = {}) {
    this.#verbose = options.verbose ?? false
  }

  info(message: string): void {
    process.stdout.write(`${blue(process.stdout, '[INFO]')} ${message}\n`)
  }

  success(message: string): void {
    process.stdout.write(`${green(process.stdout, '[SUCCESS]')} ${message}\n`)
  }

  warn(message: string): void {
    process.stderr.write(`${yellow(process.stderr, '[WARNING]')} ${message}\n`)
  }

  error(message: string): void {
    process.stderr.write(`${red(process.stderr, message)}\n`)
  }

  debug(message: string): void {
    if (this.#verbose) {
      process.stdout.write(`${dim(`[DEBUG] ${message}`)}\n`)
    }
  }

  step(index: number, total: number, title: string): void {
    process.stdout.write(`\n${bold(`[${String(index)}/${String(total)}] ${title}`)}\n`)
  }

  print(line: string): void {
    process.stdout.write(`${line}\n`)
  }
}
