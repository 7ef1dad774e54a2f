/**
 * yubisetup provisions a YubiKey for GPG, SSH and Git signing.
 *
 * @packageDocumentation
 */

export {
  ProvisionError,
  UnsupportedPlatformError,
  SetupError,
  PreconditionError,
  CommandFailedError,
  FilesystemError,
  IdentifierResolutionError,
  DeviceNotPresentError,
} from './errors.js'
export type { ErrorCategory } from './errors.js'

export type {
  OperatingSystem,
  HostInfo,
  PlatformProfile,
  Logger,
  Prompter,
  SetupConfig,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
} from './types.js'

export {
  CONFIG_FILE_NAME,
  getDefaultConfigDir,
  defaultConfig,
  validateConfig,
  loadConfig,
} from './config.js'

export {
  execCommandFull,
  NodeCommandRunner,
  formatCommandLine,
  SPAWN_FAILURE_EXIT_CODE,
} from './util/exec.js'
export type {
  CommandRunner,
  ExecCommandOptions,
  ExecCommandResult,
  NodeCommandRunnerOptions,
} from './util/exec.js'

export {
  detectHost,
  expandHome,
  isSupportedPlatform,
  resolvePlatformProfile,
  LINUX_PINENTRY_PATH,
  DARWIN_PINENTRY_PATH,
} from './util/platform.js'

export { runProvisioning } from './pipeline/runner.js'
export type { ProvisionOptions } from './pipeline/runner.js'
export { createContext } from './pipeline/context.js'
export type { ProvisioningContext, CreateContextOptions } from './pipeline/context.js'
export { DryRunCommandRunner } from './pipeline/dry-run.js'
export { PROVISIONING_STEPS } from './pipeline/steps/index.js'
export { fallbackIdentifiers, tryCandidates } from './pipeline/candidates.js'
export {
  containsKey,
  hasSmartcardIdentity,
  parsePrimaryKeyId,
  shellProfileLine,
  hasShellProfileEntry,
  DRY_RUN_KEY_ID,
  SMARTCARD_SSH_MARKER,
} from './pipeline/parsers.js'
export type {
  StepId,
  StepOutcome,
  StepServices,
  ProvisioningStep,
  StepReport,
  ProvisionResult,
} from './pipeline/types.js'

export { runDoctor, CHECK_TIMEOUT_MS } from './doctor/index.js'
export type { RunDoctorOptions } from './doctor/index.js'
