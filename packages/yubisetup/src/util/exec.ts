/**
 * CLI spawn wrapper for executing external commands.
 */

import { spawn } from 'node:child_process'

/** Options for command execution. */
export interface ExecCommandOptions {
  /** Input to write to stdin */
  stdin?: string | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
  /** Environment for the child process. Defaults to `process.env`. */
  env?: Record<string, string | undefined> | undefined
}

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127

/**
 * Execute a command and return the full result.
 *
 * Spawn errors (e.g. `ENOENT` for a missing binary) reject the promise.
 */
export function execCommandFull(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [options?.stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      env: options?.env ?? process.env,
    })
    let stdout = ''
    let stderr = ''
    let timer: NodeJS.Timeout | undefined

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options?.stdin !== undefined && proc.stdin) {
      proc.stdin.write(options.stdin)
      proc.stdin.end()
    }

    if (options?.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs
      timer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(timeoutMs)}ms`))
      }, timeoutMs)
    }

    proc.on('close', (code) => {
      clearTimeout(timer)
      resolve({ stdout, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      clearTimeout(timer)
      reject(error)
    })
  })
}

/**
 * Executes external programs on behalf of the pipeline and the checks.
 *
 * @remarks
 * Every method resolves with the exit status rather than rejecting on a
 * non-zero code, so callers decide what counts as failure. A binary that
 * cannot be started resolves with {@link SPAWN_FAILURE_EXIT_CODE}.
 */
export interface CommandRunner {
  /** Run a command, caring only about its exit status. */
  run(command: string, args: string[]): Promise<ExecCommandResult>
  /** Run a command whose stdout the caller inspects. */
  capture(command: string, args: string[]): Promise<ExecCommandResult>
  /** Run a command with `input` piped to its stdin. */
  runWithInput(command: string, args: string[], input: string): Promise<ExecCommandResult>
}

/** Options for {@link NodeCommandRunner}. */
export interface NodeCommandRunnerOptions {
  /**
   * Environment map for child processes. The same object is read at every
   * spawn, so changes made by the pipeline are seen by later commands.
   */
  env?: Record<string, string | undefined> | undefined
  /** Per-command timeout. Unset means commands may block indefinitely. */
  timeoutMs?: number | undefined
  /** Called with the command line before each spawn. */
  onSpawn?: ((commandLine: string) => void) | undefined
}

/**
 * {@link CommandRunner} backed by `child_process.spawn`.
 */
export class NodeCommandRunner implements CommandRunner {
  readonly #options: NodeCommandRunnerOptions

  constructor(options: NodeCommandRunnerOptions = {}) {
    this.#options = options
  }

  run(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#exec(command, args, undefined)
  }

  capture(command: string, args: string[]): Promise<ExecCommandResult> {
    return this.#exec(command, args, undefined)
  }

  runWithInput(command: string, args: string[], input: string): Promise<ExecCommandResult> {
    return this.#exec(command, args, input)
  }

  async #exec(
    command: string,
    args: string[],
    stdin: string | undefined,
  ): Promise<ExecCommandResult> {
    this.#options.onSpawn?.(formatCommandLine(command, args))
    try {
      return await execCommandFull(command, args, {
        stdin,
        env: this.#options.env,
        timeoutMs: this.#options.timeoutMs,
      })
    } catch (err) {
      return {
        stdout: '',
        stderr: err instanceof Error ? err.message : String(err),
        exitCode: SPAWN_FAILURE_EXIT_CODE,
      }
    }
  }
}

/** Join a command and its arguments for display. */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].join(' ')
}
