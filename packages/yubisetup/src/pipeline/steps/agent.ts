/**
 * Steps 9-12: key import, agent restart, token detection, SSH identity.
 */

import { DeviceNotPresentError, ProvisionError } from '../../errors.js'
import { LINUX_PINENTRY_PATH } from '../../util/platform.js'
import { requireKeyFile, requirePlatform } from '../context.js'
import { containsKey, hasSmartcardIdentity } from '../parsers.js'
import { completed, skipped } from '../types.js'
import type { ProvisioningStep } from '../types.js'
import { commandExists, requireSuccess } from './shared.js'

export const importKeyStep: ProvisioningStep = {
  id: 'import-key',
  title: 'Import GPG public key',
  async run(ctx, { runner, log }) {
    log.info('Importing GPG public key...')
    const keyPath = requireKeyFile(ctx)
    const known = ctx.config.knownKeyId

    const listing = await runner.capture('gpg', ['--list-keys'])
    if (listing.exitCode === 0 && containsKey(listing.stdout, known)) {
      log.warn(`Key ${known} already exists, skipping import`)
      return skipped(`${known} already imported`)
    }

    await requireSuccess(runner, 'gpg', ['--import', keyPath], `Failed to import GPG key from ${keyPath}`)
    log.success(`Imported ${keyPath}`)
    return completed(keyPath)
  },
}

export const restartAgentStep: ProvisioningStep = {
  id: 'restart-agent',
  title: 'Restart GPG agent',
  async run(ctx, { runner, log, sleep }) {
    log.info('Restarting GPG agent...')

    // pkill exits 1 when nothing matched.
    await runner.run('pkill', ['gpg-agent'])

    const delayMs = ctx.config.agentRestartDelayMs
    if (ctx.dryRun) {
      log.info(`DRY RUN: Would wait ${String(delayMs)}ms for gpg-agent to exit`)
    } else {
      await sleep(delayMs)
    }

    const probe = await runner.run('pgrep', ['gpg-agent'])
    if (probe.exitCode === 0 && !ctx.dryRun) {
      throw new ProvisionError(
        'GPG agent still running after kill attempt',
        'tool',
        'Stop it with `gpgconf --kill gpg-agent` and run the setup again.',
      )
    }

    const started = await runner.run('gpg-agent', ['--daemon'])
    if (started.exitCode !== 0) {
      log.warn(
        `gpg-agent --daemon exited with code ${String(started.exitCode)}; GPG will start the agent on demand`,
      )
    }
    return completed()
  },
}

export const detectTokenStep: ProvisioningStep = {
  id: 'detect-token',
  title: 'Detect YubiKey',
  async run(ctx, { runner, log, prompter }) {
    log.info('Checking YubiKey detection...')
    const { os } = requirePlatform(ctx)

    if (!ctx.dryRun) {
      await prompter.ask('Please insert your YubiKey if not already inserted and press Enter to continue...')
    }

    const status = await runner.run('gpg2', ['--card-status'])
    if (status.exitCode !== 0) {
      throw new DeviceNotPresentError('YubiKey not detected.')
    }
    log.success('YubiKey detected')

    if (os === 'linux' && (await commandExists(runner, 'update-alternatives'))) {
      log.info('Setting pinentry to pinentry-gnome3...')
      const install = await runner.run('sudo', [
        'update-alternatives',
        '--install',
        '/usr/bin/pinentry',
        'pinentry',
        LINUX_PINENTRY_PATH,
        '1',
      ])
      const select = await runner.run('sudo', ['update-alternatives', '--set', 'pinentry', LINUX_PINENTRY_PATH])
      if (install.exitCode !== 0 || select.exitCode !== 0) {
        log.warn('Could not select pinentry-gnome3 as the pinentry alternative')
      }
    }
    return completed()
  },
}

export const sshIdentityStep: ProvisioningStep = {
  id: 'ssh-identity',
  title: 'Check SSH identity',
  async run(ctx, { runner, log }) {
    log.info('Checking SSH support...')
    const result = await runner.capture('ssh-add', ['-L'])

    if (ctx.dryRun) {
      return skipped('identity check bypassed in dry run')
    }

    if (result.exitCode !== 0 || !hasSmartcardIdentity(result.stdout)) {
      throw new DeviceNotPresentError(
        'YubiKey card number not found in ssh-add -L output.',
        'Replug your YubiKey and restart the setup.',
      )
    }
    log.success('YubiKey SSH identity is available')
    return completed()
  },
}
