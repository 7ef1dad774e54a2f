/**
 * Logger that keeps everything it is given.
 */

import type { Logger } from 'yubisetup'

/** Level of a {@link LogEntry}. @public */
export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug' | 'step' | 'print'

/** One recorded log call. @public */
export interface LogEntry {
  level: LogLevel
  /** For `step` entries: `[index/total] title`. */
  message: string
}

/**
 * A `Logger` that records entries in memory instead of writing them.
 *
 * @public
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = []

  info(message: string): void {
    this.entries.push({ level: 'info', message })
  }

  success(message: string): void {
    this.entries.push({ level: 'success', message })
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message })
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message })
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message })
  }

  step(index: number, total: number, title: string): void {
    this.entries.push({ level: 'step', message: `[${String(index)}/${String(total)}] ${title}` })
  }

  print(line: string): void {
    this.entries.push({ level: 'print', message: line })
  }

  /** Messages recorded at `level`, in order. */
  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message)
  }
}
