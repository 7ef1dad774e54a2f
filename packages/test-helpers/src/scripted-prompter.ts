import type { Prompter } from 'yubisetup'

/**
 * A `Prompter` that replays fixed answers in order and records the questions.
 *
 * @remarks
 * Asking more questions than there are answers rejects, so a test notices an
 * unexpected prompt.
 *
 * @public
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []
  readonly #answers: string[]

  constructor(answers: string[] = []) {
    this.#answers = [...answers]
  }

  ask(question: string): Promise<string> {
    this.questions.push(question)
    const answer = this.#answers.shift()
    if (answer === undefined) {
      return Promise.reject(new Error(`No scripted answer for: ${question}`))
    }
    return Promise.resolve(answer)
  }
}
