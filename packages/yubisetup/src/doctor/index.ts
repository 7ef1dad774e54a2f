/**
 * Doctor/preflight system barrel export.
 *
 * @packageDocumentation
 */

export { runDoctor, CHECK_TIMEOUT_MS } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export type { DoctorCheckFn } from './types.js'
export type { PreflightCheckStatus, PreflightCheck, PreflightResult } from './types.js'
export {
  checkOperatingSystem,
  checkPrerequisites,
  checkGnupgSetup,
  checkYubikey,
  checkSshAgent,
  PREREQUISITE_COMMANDS,
  GNUPG_CONFIG_FILES,
} from './checks.js'
export type { CheckInput } from './checks.js'
