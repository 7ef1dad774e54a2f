/**
 * Steps 1-4: platform, PIN confirmation, public key file, prerequisites.
 */

import * as path from 'node:path'
import { PreconditionError, SetupError } from '../../errors.js'
import { expandHome, resolvePlatformProfile } from '../../util/platform.js'
import { assignPlatform, requirePlatform } from '../context.js'
import { completed, skipped } from '../types.js'
import type { ProvisioningStep } from '../types.js'
import { commandExists, isReadableFile, requireSuccess } from './shared.js'

/** Debian packages installed on Linux. */
export const LINUX_PACKAGES = [
  'gnupg2',
  'gnupg-agent',
  'pinentry-curses',
  'scdaemon',
  'pcscd',
  'libusb-1.0-0-dev',
  'pinentry-gnome3',
] as const

/** Homebrew formulae installed on macOS, one `brew install` each. */
export const DARWIN_PACKAGES = ['gnupg', 'yubikey-personalization', 'pinentry-mac'] as const

export const resolvePlatformStep: ProvisioningStep = {
  id: 'platform',
  title: 'Check operating system compatibility',
  run(ctx, { log }) {
    log.info('Checking operating system compatibility...')
    const profile = resolvePlatformProfile(ctx.host)
    assignPlatform(ctx, profile)
    log.success(`${profile.os === 'linux' ? 'Linux' : 'macOS'} detected - supported`)
    return Promise.resolve(completed(profile.os))
  },
}

export const confirmPinStep: ProvisioningStep = {
  id: 'pin',
  title: 'Confirm YubiKey PIN',
  async run(ctx, { log, prompter }) {
    if (ctx.skipPinCheck) {
      log.warn('Skipping PIN check (not recommended)')
      return skipped('PIN check disabled')
    }

    const answer = (await prompter.ask('Do you have your YubiKey PIN? (y/n): ')).trim().toLowerCase()
    if (answer !== 'y' && answer !== 'yes') {
      throw new PreconditionError(
        'You need your YubiKey PIN to proceed.',
        `Ask your administrator for your PIN. Reference: ${ctx.config.supportUrl}`,
      )
    }
    return completed()
  },
}

export const keyFileStep: ProvisioningStep = {
  id: 'key-file',
  title: 'Locate GPG public key',
  async run(ctx, { log, prompter }) {
    let requested = ctx.requestedKeyPath
    if (requested !== undefined) {
      log.info(`Using provided GPG key path: ${requested}`)
    } else {
      requested = (
        await prompter.ask('Enter the path to your GPG public key (e.g., ~/abc.key): ')
      ).trim()
    }

    const hint = `Get it from ${ctx.config.supportUrl} and try again.`
    if (requested === '') {
      throw new PreconditionError('No GPG public key path was given.', hint)
    }

    const resolved = path.resolve(expandHome(requested, ctx.host.homeDir))
    if (!(await isReadableFile(resolved))) {
      throw new PreconditionError(`GPG public key file not found at '${resolved}'.`, hint)
    }

    ctx.gpgPublicKeyPath = resolved
    log.success(`GPG public key found at: ${resolved}`)
    return completed(resolved)
  },
}

export const installPackagesStep: ProvisioningStep = {
  id: 'packages',
  title: 'Install prerequisites',
  async run(ctx, { runner, log }) {
    log.info('Installing prerequisites...')
    const { os } = requirePlatform(ctx)

    if (os === 'linux') {
      if (!(await commandExists(runner, 'apt-get'))) {
        throw new SetupError(
          'apt-get not found.',
          'apt-get',
          `Please install prerequisites manually: ${LINUX_PACKAGES.join(' ')}`,
        )
      }
      if ((await runner.run('dpkg', ['-s', 'gnupg2'])).exitCode === 0) {
        log.info('gnupg2 is already installed, skipping package installation')
        return skipped('gnupg2 already installed')
      }

      log.info('Installing Linux prerequisites...')
      await requireSuccess(runner, 'sudo', ['apt-get', 'update'], 'Failed to update package list')
      await requireSuccess(
        runner,
        'sudo',
        ['apt-get', 'install', '-y', ...LINUX_PACKAGES],
        'Failed to install prerequisites',
      )
      return completed(LINUX_PACKAGES.join(' '))
    }

    if (!(await commandExists(runner, 'brew'))) {
      throw new SetupError(
        'Homebrew not found.',
        'brew',
        'Please install Homebrew first: https://brew.sh/',
      )
    }
    if ((await runner.run('brew', ['list', 'gnupg'])).exitCode === 0) {
      log.info('gnupg is already installed, skipping package installation')
      return skipped('gnupg already installed')
    }

    log.info('Installing macOS prerequisites...')
    for (const formula of DARWIN_PACKAGES) {
      await requireSuccess(
        runner,
        'brew',
        ['install', formula],
        `Failed to install prerequisite ${formula}`,
      )
    }
    return completed(DARWIN_PACKAGES.join(' '))
  },
}
