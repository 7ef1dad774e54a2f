/** Options parsed from the `yubisetup setup` command line. */
export interface SetupCommandOptions {
  /** Path to the GPG public key file. */
  gpgKey?: string | undefined
  /** Do not ask whether the user has the PIN. */
  skipPin: boolean
  /** Describe every change instead of making it. */
  dryRun: boolean
  /** Show debug output, including each command line. */
  verbose: boolean
  /** Directory holding `config.json`. */
  configDir?: string | undefined
}
