import type { ProvisioningStep } from '../types.js'
import { confirmPinStep, installPackagesStep, keyFileStep, resolvePlatformStep } from './environment.js'
import { agentConfigStep, clearSshAuthSockStep, gnupgConfigStep, shellProfileStep } from './gnupg.js'
import { detectTokenStep, importKeyStep, restartAgentStep, sshIdentityStep } from './agent.js'
import { discoverKeyIdStep, encryptionTestStep, trustKeyStep } from './keys.js'
import { gitSigningStep, instructionsStep } from './finish.js'

/** The provisioning sequence. Order is significant. */
export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  resolvePlatformStep,
  confirmPinStep,
  keyFileStep,
  installPackagesStep,
  gnupgConfigStep,
  agentConfigStep,
  shellProfileStep,
  clearSshAuthSockStep,
  importKeyStep,
  restartAgentStep,
  detectTokenStep,
  sshIdentityStep,
  discoverKeyIdStep,
  trustKeyStep,
  encryptionTestStep,
  gitSigningStep,
  instructionsStep,
]

export { LINUX_PACKAGES, DARWIN_PACKAGES } from './environment.js'
export { gnupgHome } from './gnupg.js'
export { DEFAULT_GPG_TTY, encryptionRoundTrip, setUltimateTrust } from './keys.js'
