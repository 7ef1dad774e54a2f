/**
 * Doctor runner: runs the read-only checks and aggregates results.
 *
 * @packageDocumentation
 */

import * as os from 'node:os'
import {
  checkOperatingSystem,
  checkPrerequisites,
  checkGnupgSetup,
  checkYubikey,
  checkSshAgent,
} from './checks.js'
import { NodeCommandRunner } from '../util/exec.js'
import type { CommandRunner } from '../util/exec.js'
import type { PreflightResult } from '../types.js'
import type { DoctorCheckFn } from './types.js'

/** Upper bound for a single probe; nothing here should wait for the user. */
export const CHECK_TIMEOUT_MS = 10_000

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Override the platform detection (useful for testing). */
  platform?: string | undefined
  /** Override the home directory. */
  homeDir?: string | undefined
  /** Override the command runner. */
  runner?: CommandRunner | undefined
}

/** Checks in display order. */
const CHECKS: readonly DoctorCheckFn[] = [
  checkOperatingSystem,
  checkPrerequisites,
  checkGnupgSetup,
  checkYubikey,
  checkSshAgent,
]

/**
 * Run every check and aggregate the results. Never throws for a failed
 * check; failures are reported in the result.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const input = {
    platform: options?.platform ?? process.platform,
    homeDir: options?.homeDir ?? os.homedir(),
    runner: options?.runner ?? new NodeCommandRunner({ timeoutMs: CHECK_TIMEOUT_MS }),
  }

  const sections = await Promise.all(CHECKS.map((check) => check(input)))
  const checks = sections.flat()
  const ready = checks.every((check) => check.status !== 'fail')

  return { checks, ready }
}
