/**
 * @yubisetup/test-helpers: test doubles for the provisioning pipeline.
 *
 * @packageDocumentation
 */

export { FakeCommandRunner } from './fake-runner.js'
export type { RecordedCommand, FakeResponse } from './fake-runner.js'
export {
  createWorkstationRunner,
  WORKSTATION_KEY_ID,
  WORKSTATION_SSH_KEY,
  WORKSTATION_EXPORT,
  WORKSTATION_CIPHERTEXT,
} from './workstation.js'
export { RecordingLogger } from './recording-logger.js'
export type { LogEntry, LogLevel } from './recording-logger.js'
export { ScriptedPrompter } from './scripted-prompter.js'
export { createTempHome, testHost, writePublicKey } from './temp-home.js'
export type { TempHome } from './temp-home.js'
