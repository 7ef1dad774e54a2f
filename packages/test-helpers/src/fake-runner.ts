/**
 * Scriptable command runner for testing.
 */

import type { CommandRunner, ExecCommandResult } from 'yubisetup'

/** A command the fake runner received. @public */
export interface RecordedCommand {
  command: string
  args: string[]
  /** `command` and `args` joined with spaces. */
  line: string
  /** Data written to stdin, for `runWithInput`. */
  input?: string | undefined
}

/** What a rule answers with. Missing fields default to success with no output. @public */
export type FakeResponse =
  | Partial<ExecCommandResult>
  | ((call: RecordedCommand) => Partial<ExecCommandResult>)

interface Rule {
  matcher: string | RegExp
  response: FakeResponse
}

/**
 * A `CommandRunner` that records every call and answers from rules.
 *
 * @remarks
 * A string matcher must equal the whole command line; a `RegExp` is tested
 * against it. Rules added later take precedence. Commands matching no rule
 * exit 0 with empty output.
 *
 * @example
 * ```ts
 * const runner = new FakeCommandRunner().on('which brew', { exitCode: 1 })
 * ```
 *
 * @public
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = []
  readonly #rules: Rule[] = []

  /** Answer commands matching `matcher` with `response`. */
  on(matcher: string | RegExp, response: FakeResponse): this {
    this.#rules.unshift({ matcher, response })
    return this
  }

  run(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#answer({ command, args, line: [command, ...args].join(' ') })
  }

  capture(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#answer({ command, args, line: [command, ...args].join(' ') })
  }

  runWithInput(command: string, args: string[], input: string): Promise<ExecCommandResult> {
    return this.#answer({ command, args, line: [command, ...args].join(' '), input })
  }

  /** Command lines received so far, in order. */
  get lines(): string[] {
    return this.calls.map((call) => call.line)
  }

  /** Number of calls whose command line matches `matcher`. */
  count(matcher: string | RegExp): number {
    return this.calls.filter((call) => matches(matcher, call.line)).length
  }

  #answer(call: RecordedCommand): Promise<ExecCommandResult> {
    this.calls.push(call)
    const rule = this.#rules.find((candidate) => matches(candidate.matcher, call.line))
    const partial =
      rule === undefined
        ? {}
        : typeof rule.response === 'function'
          ? rule.response(call)
          : rule.response
    return Promise.resolve({
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
      exitCode: partial.exitCode ?? 0,
    })
  }
}

function matches(matcher: string | RegExp, line: string): boolean {
  return typeof matcher === 'string' ? matcher === line : matcher.test(line)
}
