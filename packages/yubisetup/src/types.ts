/**
 * Shared types and interfaces for yubisetup.
 */

/** Operating systems the provisioning pipeline supports. */
export type OperatingSystem = 'linux' | 'darwin'

/** Facts about the machine and user being provisioned. */
export interface HostInfo {
  /** Raw platform identifier, as reported by `process.platform`. */
  platform: string
  /** Absolute path of the user's home directory. */
  homeDir: string
  /** Numeric user id, used in Linux runtime socket paths. */
  uid: number
  /** Login name, used to derive the fallback e-mail identifier. */
  username: string
  /**
   * Environment passed to every spawned command. The pipeline reads and
   * clears `SSH_AUTH_SOCK` and sets `GPG_TTY` on this map.
   */
  env: Record<string, string | undefined>
}

/** Paths and expressions derived from the operating system. */
export interface PlatformProfile {
  os: OperatingSystem
  /** Shell startup file that receives the `SSH_AUTH_SOCK` line. */
  shellProfilePath: string
  /** Pinentry binary used by the agent to prompt for the token PIN. */
  pinentryProgramPath: string
  /** Value assigned to `SSH_AUTH_SOCK` in the shell profile. */
  sshAuthSockExpression: string
}

/**
 * Sink for human-readable progress output.
 *
 * Implementations decide where each level goes; the CLI writes `error` and
 * `warn` to stderr and everything else to stdout.
 */
export interface Logger {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  /** Only shown in verbose mode. */
  debug(message: string): void
  step(index: number, total: number, title: string): void
  /** Write a line verbatim, without a level prefix. */
  print(line: string): void
}

/** Reads a line of interactive input from the user. */
export interface Prompter {
  /** Show `question` and resolve with the raw line the user entered. */
  ask(question: string): Promise<string>
}

/** Persistent settings loaded from `config.json`. */
export interface SetupConfig {
  version: 1
  /** Domain of the fallback identifier `<user>@<emailDomain>`. */
  emailDomain: string
  /** Key id whose presence in `gpg --list-keys` means the import already happened. */
  knownKeyId: string
  /** Wait between killing the agent and checking that it is gone. */
  agentRestartDelayMs: number
  /** Default public key file when `--gpg-key` is not given. */
  keyFile?: string | undefined
  /** Where users obtain their PIN and public key. */
  supportUrl: string
}

/** Status of a single preflight check. */
export type PreflightCheckStatus = 'pass' | 'warn' | 'fail'

/** Result of one read-only check run by `yubisetup check`. */
export interface PreflightCheck {
  /** Heading the check is grouped under (e.g. `'SSH Agent'`). */
  section: string
  /** Human-readable name of the thing being checked. */
  name: string
  status: PreflightCheckStatus
  /** Explanation shown when the status is not `'pass'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results, in display order. */
  checks: PreflightCheck[]
  /** `true` if no check has status `'fail'`. */
  ready: boolean
}
