/**
 * Steps 16-17: Git commit signing and the closing instructions.
 */

import { SetupError } from '../../errors.js'
import { requireKeyId, requirePlatform } from '../context.js'
import { firstLine, headLines } from '../parsers.js'
import { completed } from '../types.js'
import type { ProvisioningStep } from '../types.js'
import { commandExists, requireSuccess } from './shared.js'

/** Lines of the armored public key shown in the instructions. */
const EXPORT_PREVIEW_LINES = 10

export const gitSigningStep: ProvisioningStep = {
  id: 'git-signing',
  title: 'Configure Git signing',
  async run(ctx, { runner, log }) {
    log.info('Configuring Git signing...')
    const keyId = requireKeyId(ctx)

    if (!(await commandExists(runner, 'git'))) {
      throw new SetupError('Git is not installed.', 'git', 'Please install Git first.')
    }

    await requireSuccess(
      runner,
      'git',
      ['config', '--global', 'user.signingkey', keyId],
      'Failed to set Git signing key',
    )
    await requireSuccess(
      runner,
      'git',
      ['config', '--global', 'commit.gpgsign', 'true'],
      'Failed to enable Git commit signing',
    )

    log.success('Git signing configured successfully!')
    return completed(keyId)
  },
}

export const instructionsStep: ProvisioningStep = {
  id: 'instructions',
  title: 'Show next steps',
  async run(ctx, { runner, log }) {
    const profile = requirePlatform(ctx)
    const keyId = requireKeyId(ctx)

    log.print('')
    log.info('Next steps:')
    log.print('1. Add your SSH public key to your Git server:')
    log.print('   - Settings -> SSH/GPG Keys -> Manage SSH Keys')
    log.print('   - Use this key:')
    log.print('')
    const ssh = await runner.capture('ssh-add', ['-L'])
    const sshKey = ssh.exitCode === 0 ? firstLine(ssh.stdout) : undefined
    if (sshKey !== undefined) {
      log.print(sshKey)
    }

    log.print('')
    log.print('2. Add your GPG public key to your Git server:')
    log.print('   - Settings -> SSH/GPG Keys -> Manage GPG Keys')
    log.print('   - Use this key:')
    log.print('')
    const exported = await runner.capture('gpg', ['--export', '-a', keyId])
    if (exported.exitCode === 0) {
      for (const line of headLines(exported.stdout, EXPORT_PREVIEW_LINES)) {
        log.print(line)
      }
      log.print('   [... truncated for display ...]')
    }

    log.print('')
    log.print('3. Source your shell configuration:')
    log.print(`   source ${profile.shellProfilePath}`)
    log.print('')
    log.print('4. Test Git signing in a repository:')
    log.print("   git commit -S -m 'test commit'")
    log.print('')
    log.success(`Setup completed successfully! Error tracking ID: ${ctx.trackingId}`)
    return completed()
  },
}
