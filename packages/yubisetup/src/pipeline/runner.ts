/**
 * Provisioning runner: executes the step sequence against one context.
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'node:timers/promises'
import { ProvisionError, UnsupportedPlatformError } from '../errors.js'
import type { CommandRunner } from '../util/exec.js'
import { detectHost } from '../util/platform.js'
import { defaultConfig } from '../config.js'
import type { HostInfo, Logger, Prompter, SetupConfig } from '../types.js'
import { createContext } from './context.js'
import type { ProvisioningContext } from './context.js'
import { DryRunCommandRunner } from './dry-run.js'
import { PROVISIONING_STEPS } from './steps/index.js'
import type { ProvisionResult, ProvisioningStep, StepReport, StepServices } from './types.js'

/** Options for {@link runProvisioning}. */
export interface ProvisionOptions {
  /** Executes commands outside dry-run mode. */
  runner: CommandRunner
  log: Logger
  prompter: Prompter
  /** Defaults to the current process's host. */
  host?: HostInfo | undefined
  /** Defaults to {@link defaultConfig}. */
  config?: SetupConfig | undefined
  dryRun?: boolean | undefined
  skipPinCheck?: boolean | undefined
  /** Public key file; overrides `config.keyFile`. */
  keyFile?: string | undefined
  /** Override the wait used while restarting the agent. */
  sleep?: ((ms: number) => Promise<void>) | undefined
  /** Override the generated tracking id. */
  trackingId?: string | undefined
}

function describeError(err: unknown): string {
  if (err instanceof ProvisionError) {
    return err.message
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/**
 * Whether a failure may be downgraded in dry-run mode. Nothing can run
 * without a platform profile, so an unsupported OS always stops the run.
 */
function isDowngradable(ctx: ProvisioningContext, err: unknown): boolean {
  return ctx.dryRun && !(err instanceof UnsupportedPlatformError)
}

/**
 * Run the provisioning steps in order against a fresh context.
 *
 * @remarks
 * The first fatal error stops the run: its hint and an
 * `[ERROR-<trackingId>]` line are logged and the result has `ok: false`. In
 * dry-run mode failures are logged as warnings and the run continues, except
 * for an unsupported operating system.
 */
export async function runProvisioning(
  options: ProvisionOptions,
  steps: readonly ProvisioningStep[] = PROVISIONING_STEPS,
): Promise<ProvisionResult> {
  const { log } = options
  const ctx = createContext({
    host: options.host ?? detectHost(),
    config: options.config ?? defaultConfig(),
    dryRun: options.dryRun,
    skipPinCheck: options.skipPinCheck,
    keyFile: options.keyFile,
    trackingId: options.trackingId,
  })

  const services: StepServices = {
    runner: ctx.dryRun ? new DryRunCommandRunner(log) : options.runner,
    log,
    prompter: options.prompter,
    sleep: options.sleep ?? ((ms) => delay(ms)),
  }

  if (ctx.dryRun) {
    log.warn('DRY RUN MODE - No changes will be made')
  }
  log.debug(`Tracking ID: ${ctx.trackingId}`)

  const reports: StepReport[] = []
  const downgraded: StepReport[] = []

  for (const [index, step] of steps.entries()) {
    log.step(index + 1, steps.length, step.title)
    try {
      const outcome = await step.run(ctx, services)
      reports.push({ id: step.id, title: step.title, status: outcome.status, detail: outcome.detail })
    } catch (err) {
      const message = describeError(err)
      const report: StepReport = { id: step.id, title: step.title, status: 'failed', detail: message }
      reports.push(report)

      if (isDowngradable(ctx, err)) {
        downgraded.push(report)
        log.warn(`DRY RUN: Would have failed: ${message}`)
        continue
      }

      if (err instanceof ProvisionError && err.hint !== undefined) {
        log.warn(err.hint)
      }
      log.error(`[ERROR-${ctx.trackingId}] ${message}`)
      return {
        ok: false,
        trackingId: ctx.trackingId,
        dryRun: ctx.dryRun,
        steps: reports,
        downgraded,
        failure: { step: step.id, error: err },
      }
    }
  }

  return { ok: true, trackingId: ctx.trackingId, dryRun: ctx.dryRun, steps: reports, downgraded }
}
