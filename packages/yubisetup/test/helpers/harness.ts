/**
 * Shared test helpers for running individual provisioning steps.
 */

import {
  RecordingLogger,
  ScriptedPrompter,
  createWorkstationRunner,
  testHost,
} from '@yubisetup/test-helpers'
import type { FakeCommandRunner } from '@yubisetup/test-helpers'
import type { HostInfo } from '../../src/types.js'
import { defaultConfig } from '../../src/config.js'
import { assignPlatform, createContext } from '../../src/pipeline/context.js'
import type { ProvisioningContext } from '../../src/pipeline/context.js'
import { DryRunCommandRunner } from '../../src/pipeline/dry-run.js'
import type { StepServices } from '../../src/pipeline/types.js'
import { resolvePlatformProfile } from '../../src/util/platform.js'

/** Everything a step test needs. */
export interface StepHarness {
  ctx: ProvisioningContext
  services: StepServices
  runner: FakeCommandRunner
  log: RecordingLogger
  prompter: ScriptedPrompter
  sleeps: number[]
}

export interface HarnessOptions {
  homeDir: string
  host?: Partial<HostInfo> | undefined
  answers?: string[] | undefined
  dryRun?: boolean | undefined
  skipPinCheck?: boolean | undefined
  keyFile?: string | undefined
  /** Resolve the platform up front, as step 1 would. Defaults to true. */
  resolvePlatform?: boolean | undefined
}

/**
 * Build a context on a scripted workstation. In dry-run mode the services
 * get a {@link DryRunCommandRunner}, as the pipeline runner does; the fake
 * runner then sees no calls.
 */
export function createHarness(options: HarnessOptions): StepHarness {
  const runner = createWorkstationRunner()
  const log = new RecordingLogger()
  const prompter = new ScriptedPrompter(options.answers)
  const sleeps: number[] = []

  const ctx = createContext({
    host: testHost(options.homeDir, options.host),
    config: defaultConfig(),
    dryRun: options.dryRun,
    skipPinCheck: options.skipPinCheck,
    keyFile: options.keyFile,
    trackingId: 'test-tracking-id',
  })
  if (options.resolvePlatform ?? true) {
    assignPlatform(ctx, resolvePlatformProfile(ctx.host))
  }

  const services: StepServices = {
    runner: ctx.dryRun ? new DryRunCommandRunner(log) : runner,
    log,
    prompter,
    sleep: (ms) => {
      sleeps.push(ms)
      return Promise.resolve()
    },
  }

  return { ctx, services, runner, log, prompter, sleeps }
}
