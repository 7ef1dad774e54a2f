/**
 * The mutable state threaded through every provisioning step.
 */

import * as crypto from 'node:crypto'
import { PreconditionError } from '../errors.js'
import type { HostInfo, PlatformProfile, SetupConfig } from '../types.js'

/**
 * State for a single provisioning run.
 *
 * @remarks
 * `host`, `config`, `trackingId` and the flags are fixed at creation.
 * `platform` and `keyId` are written once by their steps through
 * {@link assignPlatform} and {@link assignKeyId}.
 */
export interface ProvisioningContext {
  readonly host: HostInfo
  readonly config: SetupConfig
  /** Random identifier attached to fatal error output. */
  readonly trackingId: string
  readonly dryRun: boolean
  readonly skipPinCheck: boolean
  /** Key file path supplied up front (flag or config), not yet validated. */
  readonly requestedKeyPath: string | undefined
  /** Set by the platform step. */
  platform: Readonly<PlatformProfile> | undefined
  /** Absolute path of the public key, set once it is known to be a readable file. */
  gpgPublicKeyPath: string | undefined
  /** Primary key id, empty until discovered. */
  keyId: string
}

/** Options for {@link createContext}. */
export interface CreateContextOptions {
  host: HostInfo
  config: SetupConfig
  dryRun?: boolean | undefined
  skipPinCheck?: boolean | undefined
  keyFile?: string | undefined
  /** Override the generated tracking id. */
  trackingId?: string | undefined
}

/** Create the context for a new run. */
export function createContext(options: CreateContextOptions): ProvisioningContext {
  return {
    host: options.host,
    config: options.config,
    trackingId: options.trackingId ?? crypto.randomUUID(),
    dryRun: options.dryRun ?? false,
    skipPinCheck: options.skipPinCheck ?? false,
    requestedKeyPath: options.keyFile ?? options.config.keyFile,
    platform: undefined,
    gpgPublicKeyPath: undefined,
    keyId: '',
  }
}

/** Record the resolved platform profile. */
export function assignPlatform(ctx: ProvisioningContext, profile: PlatformProfile): void {
  if (ctx.platform !== undefined) {
    throw new Error('Platform profile is already resolved for this run')
  }
  ctx.platform = Object.freeze({ ...profile })
}

/** Record the discovered key id. */
export function assignKeyId(ctx: ProvisioningContext, keyId: string): void {
  if (ctx.keyId !== '') {
    throw new Error(`Key id is already set to ${ctx.keyId}`)
  }
  ctx.keyId = keyId
}

/** Return the platform profile, or throw if the platform step has not succeeded. */
export function requirePlatform(ctx: ProvisioningContext): Readonly<PlatformProfile> {
  if (ctx.platform === undefined) {
    throw new PreconditionError('Operating system has not been resolved')
  }
  return ctx.platform
}

/** Return the validated key file path, or throw. */
export function requireKeyFile(ctx: ProvisioningContext): string {
  if (ctx.gpgPublicKeyPath === undefined) {
    throw new PreconditionError('GPG public key file has not been validated')
  }
  return ctx.gpgPublicKeyPath
}

/** Return the discovered key id, or throw. */
export function requireKeyId(ctx: ProvisioningContext): string {
  if (ctx.keyId === '') {
    throw new PreconditionError('PGP key id has not been discovered')
  }
  return ctx.keyId
}
