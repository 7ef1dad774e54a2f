/**
 * Doctor/preflight system types.
 */

import type { PreflightCheck } from '../types.js'
import type { CheckInput } from './checks.js'

export type { PreflightCheckStatus, PreflightCheck, PreflightResult } from '../types.js'

/**
 * A function that runs one section of read-only checks.
 * @internal
 */
export type DoctorCheckFn = (input: CheckInput) => Promise<PreflightCheck[]>
