import * as readline from 'node:readline'
import type { Prompter } from 'yubisetup'

/** Streams used by {@link ReadlinePrompter}. */
export interface ReadlinePrompterOptions {
  /** Defaults to `process.stdin`. */
  input?: NodeJS.ReadableStream | undefined
  /** Defaults to `process.stderr`. */
  output?: Pick<NodeJS.WritableStream, 'write'> | undefined
}

/**
 * {@link Prompter} that reads answers from stdin, one line per question.
 *
 * @remarks
 * One line reader serves every question of a run, so answers piped in ahead
 * of time are consumed in order. Questions are written to stderr so stdout
 * carries only progress output. Call {@link ReadlinePrompter.close} when the
 * run ends to release stdin.
 *
 * @internal
 */
export class ReadlinePrompter implements Prompter {
  readonly #input: NodeJS.ReadableStream
  readonly #output: Pick<NodeJS.WritableStream, 'write'>
  #rl: readline.Interface | undefined
  #lines: AsyncIterator<string> | undefined

  constructor(options: ReadlinePrompterOptions = {}) {
    this.#input = options.input ?? process.stdin
    this.#output = options.output ?? process.stderr
  }

  async ask(question: string): Promise<string> {
    this.#output.write(question)
    const next = await this.#reader().next()
    if (next.done === true) {
      throw new Error('Input closed before an answer was given')
    }
    return next.value
  }

  close(): void {
    this.#rl?.close()
    this.#rl = undefined
    this.#lines = undefined
  }

  #reader(): AsyncIterator<string> {
    if (this.#lines === undefined) {
      const rl = readline.createInterface({ input: this.#input, terminal: false })
      this.#rl = rl
      this.#lines = rl[Symbol.asyncIterator]()
    }
    return this.#lines
  }
}
