/**
 * Steps 5-8: GnuPG and agent configuration files, shell profile, and the
 * inherited `SSH_AUTH_SOCK`.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { FilesystemError, SetupError } from '../../errors.js'
import { requirePlatform } from '../context.js'
import { hasShellProfileEntry, shellProfileLine } from '../parsers.js'
import { DIRMNGR_CONF, GPG_CONF, darwinAgentConf, linuxAgentConf } from '../templates.js'
import { completed, skipped } from '../types.js'
import type { ProvisioningStep } from '../types.js'
import { pathExists, writeConfigFile } from './shared.js'

/** `~/.gnupg` for the given home directory. */
export function gnupgHome(homeDir: string): string {
  return path.join(homeDir, '.gnupg')
}

async function ensurePrivateDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true, mode: 0o700 })
    await fs.chmod(dir, 0o700)
  } catch (err) {
    throw new FilesystemError(
      `Failed to create ${dir}: ${err instanceof Error ? err.message : String(err)}`,
      dir,
      'write',
    )
  }
}

async function readIfPresent(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return ''
    }
    throw new FilesystemError(`Failed to read ${filePath}`, filePath, 'read')
  }
}

export const gnupgConfigStep: ProvisioningStep = {
  id: 'gnupg-config',
  title: 'Write GPG configuration',
  async run(ctx, { log }) {
    log.info('Configuring GPG...')
    const dir = gnupgHome(ctx.host.homeDir)

    if (ctx.dryRun) {
      log.info(`DRY RUN: Would create directory: ${dir}`)
    } else {
      await ensurePrivateDir(dir)
    }

    await writeConfigFile(ctx, log, path.join(dir, 'gpg.conf'), GPG_CONF, 'GPG config')
    await writeConfigFile(ctx, log, path.join(dir, 'dirmngr.conf'), DIRMNGR_CONF, 'dirmngr config')
    return completed(dir)
  },
}

export const agentConfigStep: ProvisioningStep = {
  id: 'agent-config',
  title: 'Write GPG agent configuration',
  async run(ctx, { log }) {
    log.info('Configuring GPG agent...')
    const profile = requirePlatform(ctx)

    let content: string
    if (profile.os === 'linux') {
      content = linuxAgentConf(ctx.host.uid)
    } else {
      if (!ctx.dryRun && !(await pathExists(profile.pinentryProgramPath))) {
        throw new SetupError(
          `pinentry-mac not found at ${profile.pinentryProgramPath}.`,
          'pinentry-mac',
          "Please ensure it's installed correctly (brew install pinentry-mac).",
        )
      }
      content = darwinAgentConf(profile.pinentryProgramPath)
    }

    const filePath = path.join(gnupgHome(ctx.host.homeDir), 'gpg-agent.conf')
    await writeConfigFile(ctx, log, filePath, content, 'GPG agent config')
    return completed(filePath)
  },
}

export const shellProfileStep: ProvisioningStep = {
  id: 'shell-profile',
  title: 'Configure shell environment',
  async run(ctx, { log }) {
    log.info('Configuring shell environment...')
    const profile = requirePlatform(ctx)
    const target = profile.shellProfilePath
    const line = shellProfileLine(profile)

    const existing = await readIfPresent(target)
    if (hasShellProfileEntry(existing, profile)) {
      log.info(`${target} already sets SSH_AUTH_SOCK, leaving it unchanged`)
      return skipped('already configured')
    }

    if (ctx.dryRun) {
      log.info(`DRY RUN: Would add to ${target}: ${line}`)
      return completed(line)
    }

    try {
      await fs.appendFile(target, `\n${line}\n`, { encoding: 'utf8', mode: 0o644 })
    } catch {
      throw new FilesystemError(`Failed to update ${target}`, target, 'write')
    }
    log.success(`Added to ${target}: ${line}`)
    return completed(line)
  },
}

export const clearSshAuthSockStep: ProvisioningStep = {
  id: 'ssh-auth-sock',
  title: 'Clear inherited SSH_AUTH_SOCK',
  run(ctx, { log }) {
    log.info('Checking for existing SSH_AUTH_SOCK...')
    if (ctx.host.env.SSH_AUTH_SOCK === undefined) {
      return Promise.resolve(skipped('not set'))
    }

    log.warn('Found existing SSH_AUTH_SOCK, unsetting it...')
    if (ctx.dryRun) {
      log.info('DRY RUN: Would unset SSH_AUTH_SOCK')
    } else {
      delete ctx.host.env.SSH_AUTH_SOCK
    }
    return Promise.resolve(completed())
  },
}
