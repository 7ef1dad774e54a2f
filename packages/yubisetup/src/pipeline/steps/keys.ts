/**
 * Steps 13-15: key id discovery, ultimate trust, encryption round trip.
 */

import { CommandFailedError, IdentifierResolutionError } from '../../errors.js'
import { formatCommandLine } from '../../util/exec.js'
import type { CommandRunner } from '../../util/exec.js'
import { fallbackIdentifiers, tryCandidates } from '../candidates.js'
import { assignKeyId, requireKeyId } from '../context.js'
import type { ProvisioningContext } from '../context.js'
import { DRY_RUN_KEY_ID, parsePrimaryKeyId } from '../parsers.js'
import { ENCRYPTION_TEST_PAYLOAD, TRUST_SCRIPT } from '../templates.js'
import { completed } from '../types.js'
import type { ProvisioningStep } from '../types.js'

/** Terminal GPG uses for pinentry when `GPG_TTY` is not already set. */
export const DEFAULT_GPG_TTY = '/dev/tty'

const LIST_KEYS_ARGS = ['--list-keys', '--keyid-format', '0xlong']

function candidatesFor(ctx: ProvisioningContext): string[] {
  return fallbackIdentifiers(requireKeyId(ctx), ctx.host.username, ctx.config.emailDomain)
}

/** Set ultimate trust on `identifier`. */
export async function setUltimateTrust(runner: CommandRunner, identifier: string): Promise<boolean> {
  const result = await runner.runWithInput(
    'gpg',
    ['--edit-key', identifier, '--command-fd', '0'],
    TRUST_SCRIPT,
  )
  return result.exitCode === 0
}

/** Encrypt the test payload to `recipient`, decrypt it, and require plaintext back. */
export async function encryptionRoundTrip(runner: CommandRunner, recipient: string): Promise<boolean> {
  const encrypted = await runner.runWithInput(
    'gpg2',
    ['--encrypt', '--armor', '--recipient', recipient],
    ENCRYPTION_TEST_PAYLOAD,
  )
  if (encrypted.exitCode !== 0 || encrypted.stdout === '') {
    return false
  }
  const decrypted = await runner.runWithInput('gpg2', ['--decrypt'], encrypted.stdout)
  return decrypted.exitCode === 0 && decrypted.stdout.trim() !== ''
}

export const discoverKeyIdStep: ProvisioningStep = {
  id: 'discover-key-id',
  title: 'Discover PGP key id',
  async run(ctx, { runner, log }) {
    log.info('Getting PGP Key ID...')
    const listing = await runner.capture('gpg2', LIST_KEYS_ARGS)

    if (ctx.dryRun) {
      assignKeyId(ctx, DRY_RUN_KEY_ID)
      log.success(`PGP Key ID: ${DRY_RUN_KEY_ID}`)
      return completed(DRY_RUN_KEY_ID)
    }

    if (listing.exitCode !== 0) {
      throw new CommandFailedError(
        'Could not list GPG keys',
        formatCommandLine('gpg2', LIST_KEYS_ARGS),
        listing.exitCode,
      )
    }

    const keyId = parsePrimaryKeyId(listing.stdout)
    if (keyId === undefined) {
      throw new IdentifierResolutionError('Could not determine PGP Key ID', [])
    }
    assignKeyId(ctx, keyId)
    log.success(`PGP Key ID: ${keyId}`)
    return completed(keyId)
  },
}

export const trustKeyStep: ProvisioningStep = {
  id: 'trust',
  title: 'Set ultimate key trust',
  async run(ctx, { runner, log }) {
    log.info('Setting key trust to ultimate...')
    const candidates = candidatesFor(ctx)
    log.print(`Setting trust level to 5 (ultimate) for key ${ctx.keyId}`)

    if (ctx.dryRun) {
      log.info('DRY RUN: Would set key trust to ultimate')
      return completed()
    }

    const accepted = await tryCandidates(
      candidates,
      (identifier) => setUltimateTrust(runner, identifier),
      (identifier) => {
        log.warn(`Trying with email: ${identifier}`)
      },
    )
    if (accepted === undefined) {
      throw new IdentifierResolutionError('Failed to set key trust', candidates)
    }
    return completed(accepted)
  },
}

export const encryptionTestStep: ProvisioningStep = {
  id: 'encryption-test',
  title: 'Test encryption and decryption',
  async run(ctx, { runner, log }) {
    log.info('Testing encryption and decryption...')
    const candidates = candidatesFor(ctx)

    if (ctx.dryRun) {
      log.info('DRY RUN: Would test encryption/decryption')
      return completed()
    }

    if (ctx.host.env.GPG_TTY === undefined) {
      ctx.host.env.GPG_TTY = DEFAULT_GPG_TTY
    }
    log.print('Please enter your PIN when prompted and touch your YubiKey when it blinks...')

    const accepted = await tryCandidates(
      candidates,
      (recipient) => encryptionRoundTrip(runner, recipient),
      (recipient) => {
        log.warn(`Trying encryption test with email: ${recipient}`)
      },
    )
    if (accepted === undefined) {
      throw new IdentifierResolutionError(
        'Encryption/decryption test failed.',
        candidates,
        'Make sure pinentry-gnome3 is set and GPG_TTY is exported.',
      )
    }
    log.success('Encryption/decryption test passed!')
    return completed(accepted)
  },
}
