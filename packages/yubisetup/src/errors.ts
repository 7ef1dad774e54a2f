/**
 * Error hierarchy for yubisetup.
 *
 * Every fatal provisioning failure is one of these classes. The pipeline
 * reports them together with the run's tracking identifier.
 *
 * @packageDocumentation
 */

/**
 * Broad class of a provisioning failure.
 *
 * - `environment`: the host cannot run the tool (OS, package manager, Git).
 * - `precondition`: something the user must supply is missing (PIN, key file).
 * - `tool`: an external command or filesystem write failed.
 * - `identifier`: no candidate key identifier was accepted by GPG.
 * - `hardware`: the token is not detected or not advertised to SSH.
 */
export type ErrorCategory = 'environment' | 'precondition' | 'tool' | 'identifier' | 'hardware'

/** Base error for all yubisetup errors. */
export class ProvisionError extends Error {
  readonly category: ErrorCategory

  /** Remediation text shown to the user below the error line. */
  readonly hint: string | undefined

  constructor(message: string, category: ErrorCategory, hint?: string) {
    super(message)
    this.name = 'ProvisionError'
    this.category = category
    this.hint = hint
  }
}

// --- Environment incompatibility ---

/**
 * Thrown when the operating system is neither Linux nor macOS.
 */
export class UnsupportedPlatformError extends ProvisionError {
  /** The raw platform identifier that was rejected (e.g. `'win32'`). */
  readonly platform: string

  constructor(platform: string) {
    super(
      `OS '${platform}' is not supported. This tool only works on Linux and macOS.`,
      'environment',
    )
    this.name = 'UnsupportedPlatformError'
    this.platform = platform
  }
}

/**
 * Thrown when a required system dependency (package manager, Homebrew, Git,
 * the pinentry binary) is missing.
 */
export class SetupError extends ProvisionError {
  /**
   * The name of the dependency that caused the setup failure.
   */
  readonly dependency: string

  constructor(message: string, dependency: string, hint?: string) {
    super(message, 'environment', hint)
    this.name = 'SetupError'
    this.dependency = dependency
  }
}

// --- User preconditions ---

/**
 * Thrown when the user cannot satisfy a precondition, such as owning the
 * token PIN or having the public key file at hand.
 */
export class PreconditionError extends ProvisionError {
  constructor(message: string, hint?: string) {
    super(message, 'precondition', hint)
    this.name = 'PreconditionError'
  }
}

// --- Tool failures ---

/**
 * Thrown when an external command exits with a non-zero status where success
 * is required.
 */
export class CommandFailedError extends ProvisionError {
  /** The command line that failed, joined with spaces. */
  readonly command: string

  readonly exitCode: number

  constructor(message: string, command: string, exitCode: number) {
    super(message, 'tool')
    this.name = 'CommandFailedError'
    this.command = command
    this.exitCode = exitCode
  }
}

/**
 * Thrown when a filesystem operation fails (e.g. the shell profile is not
 * writable).
 */
export class FilesystemError extends ProvisionError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The access that was required (`'read'` or `'write'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string) {
    super(message, 'tool')
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}

// --- Identifier resolution ---

/**
 * Thrown when every candidate identifier (key id, then e-mail address) was
 * rejected by GPG.
 */
export class IdentifierResolutionError extends ProvisionError {
  /** The identifiers that were tried, in order. */
  readonly attempted: string[]

  constructor(message: string, attempted: string[], hint?: string) {
    super(message, 'identifier', hint)
    this.name = 'IdentifierResolutionError'
    this.attempted = attempted
  }
}

// --- Hardware ---

/**
 * Thrown when the hardware token is not detected by GPG or its SSH identity
 * is not advertised by the agent.
 */
export class DeviceNotPresentError extends ProvisionError {
  constructor(message: string, hint = 'Replug your YubiKey and run the setup again.') {
    super(message, 'hardware', hint)
    this.name = 'DeviceNotPresentError'
  }
}
