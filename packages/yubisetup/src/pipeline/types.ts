/**
 * Step model shared by the provisioning pipeline and its steps.
 */

import type { CommandRunner } from '../util/exec.js'
import type { Logger, Prompter } from '../types.js'
import type { ProvisioningContext } from './context.js'

/** Stable identifiers of the provisioning steps, in execution order. */
export type StepId =
  | 'platform'
  | 'pin'
  | 'key-file'
  | 'packages'
  | 'gnupg-config'
  | 'agent-config'
  | 'shell-profile'
  | 'ssh-auth-sock'
  | 'import-key'
  | 'restart-agent'
  | 'detect-token'
  | 'ssh-identity'
  | 'discover-key-id'
  | 'trust'
  | 'encryption-test'
  | 'git-signing'
  | 'instructions'

/** What a step reports when it returns normally. */
export type StepOutcome =
  | { readonly status: 'completed'; readonly detail?: string | undefined }
  | { readonly status: 'skipped'; readonly detail: string }

/** Collaborators handed to every step. */
export interface StepServices {
  /** Already swapped for a describing runner in dry-run mode. */
  runner: CommandRunner
  log: Logger
  prompter: Prompter
  sleep: (ms: number) => Promise<void>
}

/** One named unit of the provisioning sequence. */
export interface ProvisioningStep {
  readonly id: StepId
  readonly title: string
  run(ctx: ProvisioningContext, services: StepServices): Promise<StepOutcome>
}

/** Per-step entry in a {@link ProvisionResult}. */
export interface StepReport {
  id: StepId
  title: string
  status: 'completed' | 'skipped' | 'failed'
  detail?: string | undefined
}

/** Outcome of a whole provisioning run. */
export interface ProvisionResult {
  /** `false` only when a fatal error stopped the run. */
  ok: boolean
  trackingId: string
  dryRun: boolean
  /** Reports for every step that ran, in order. */
  steps: StepReport[]
  /** Steps whose failure was downgraded to a warning by dry-run mode. */
  downgraded: StepReport[]
  /** The step and error that stopped the run. */
  failure?: { step: StepId; error: unknown } | undefined
}

/** Build a `completed` outcome. */
export function completed(detail?: string): StepOutcome {
  return { status: 'completed', detail }
}

/** Build a `skipped` outcome. */
export function skipped(detail: string): StepOutcome {
  return { status: 'skipped', detail }
}
