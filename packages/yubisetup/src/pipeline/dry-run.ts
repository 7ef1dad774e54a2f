import { formatCommandLine } from '../util/exec.js'
import type { CommandRunner, ExecCommandResult } from '../util/exec.js'
import type { Logger } from '../types.js'

/**
 * {@link CommandRunner} that logs each command instead of running it and
 * reports a successful, silent exit.
 *
 * @internal
 */
export class DryRunCommandRunner implements CommandRunner {
  readonly #log: Logger

  constructor(log: Logger) {
    this.#log = log
  }

  run(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#describe(command, args)
  }

  capture(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#describe(command, args)
  }

  runWithInput(command: string, args: string[], _input: string): Promise<ExecCommandResult> {
    return this.#describe(command, args)
  }

  #describe(command: string, args: string[]): Promise<ExecCommandResult> {
    this.#log.info(`DRY RUN: Would execute: ${formatCommandLine(command, args)}`)
    return Promise.resolve({ stdout: '', stderr: '', exitCode: 0 })
  }
}
