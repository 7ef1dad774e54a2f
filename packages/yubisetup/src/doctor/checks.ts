/**
 * Individual read-only checks run by `yubisetup check`.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { isSupportedPlatform } from '../util/platform.js'
import type { CommandRunner } from '../util/exec.js'
import { hasSmartcardIdentity } from '../pipeline/parsers.js'
import type { PreflightCheck } from '../types.js'

/** Programs that must be on PATH, per operating system. */
export const PREREQUISITE_COMMANDS = {
  linux: ['gpg', 'gpg2', 'gpg-agent', 'pinentry-gnome3'],
  darwin: ['gpg', 'gpg2', 'gpg-agent', 'pinentry-mac'],
} as const

/** Files expected inside `~/.gnupg` after a setup. */
export const GNUPG_CONFIG_FILES = ['gpg.conf', 'gpg-agent.conf', 'dirmngr.conf'] as const

/** Input shared by every check. */
export interface CheckInput {
  platform: string
  homeDir: string
  runner: CommandRunner
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory()
  } catch {
    return false
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile()
  } catch {
    return false
  }
}

/**
 * Check that the operating system is Linux or macOS.
 * @internal
 */
export function checkOperatingSystem({ platform }: CheckInput): Promise<PreflightCheck[]> {
  const section = 'Operating System'
  if (platform === 'linux') {
    return Promise.resolve([{ section, name: 'Linux (supported)', status: 'pass' }])
  }
  if (platform === 'darwin') {
    return Promise.resolve([{ section, name: 'macOS (supported)', status: 'pass' }])
  }
  return Promise.resolve([
    { section, name: platform, status: 'fail', reason: 'not supported' },
  ])
}

/**
 * Check that GnuPG and the pinentry program are on PATH.
 * @internal
 */
export async function checkPrerequisites({ platform, runner }: CheckInput): Promise<PreflightCheck[]> {
  const section = 'Prerequisites'
  if (!isSupportedPlatform(platform)) {
    return [
      {
        section,
        name: 'packages',
        status: 'warn',
        reason: 'Cannot check prerequisites for this OS',
      },
    ]
  }

  const checks: PreflightCheck[] = []
  for (const name of PREREQUISITE_COMMANDS[platform]) {
    const found = (await runner.run('which', [name])).exitCode === 0
    checks.push(
      found
        ? { section, name, status: 'pass' }
        : { section, name, status: 'fail', reason: 'not found in PATH' },
    )
  }
  return checks
}

/**
 * Check that `~/.gnupg` and its config files exist.
 * @internal
 */
export async function checkGnupgSetup({ homeDir }: CheckInput): Promise<PreflightCheck[]> {
  const section = 'GPG Configuration'
  const gnupgDir = path.join(homeDir, '.gnupg')

  const checks: PreflightCheck[] = [
    (await isDirectory(gnupgDir))
      ? { section, name: '.gnupg directory', status: 'pass' }
      : { section, name: '.gnupg directory', status: 'fail', reason: `${gnupgDir} does not exist` },
  ]

  for (const file of GNUPG_CONFIG_FILES) {
    checks.push(
      (await isFile(path.join(gnupgDir, file)))
        ? { section, name: file, status: 'pass' }
        : { section, name: file, status: 'warn', reason: 'missing' },
    )
  }
  return checks
}

/**
 * Check that the token answers `gpg2 --card-status` and that secret keys are
 * listed.
 * @internal
 */
export async function checkYubikey({ runner }: CheckInput): Promise<PreflightCheck[]> {
  const section = 'YubiKey'
  const card = await runner.run('gpg2', ['--card-status'])
  if (card.exitCode !== 0) {
    return [{ section, name: 'YubiKey detected', status: 'fail', reason: 'gpg2 --card-status failed' }]
  }

  const secret = await runner.capture('gpg', ['--list-secret-keys'])
  const hasSecretKeys = secret.exitCode === 0 && secret.stdout.trim() !== ''
  return [
    { section, name: 'YubiKey detected', status: 'pass' },
    hasSecretKeys
      ? { section, name: 'GPG secret keys', status: 'pass' }
      : { section, name: 'GPG secret keys', status: 'warn', reason: 'no secret keys listed' },
  ]
}

/**
 * Check that the SSH agent lists keys and that one of them is on the token.
 * @internal
 */
export async function checkSshAgent({ runner }: CheckInput): Promise<PreflightCheck[]> {
  const section = 'SSH Agent'
  const result = await runner.capture('ssh-add', ['-L'])
  if (result.exitCode !== 0 || result.stdout.trim() === '') {
    return [
      { section, name: 'SSH agent keys', status: 'fail', reason: 'agent not running or no keys' },
    ]
  }
  return [
    { section, name: 'SSH agent keys', status: 'pass' },
    hasSmartcardIdentity(result.stdout)
      ? { section, name: 'YubiKey SSH key', status: 'pass' }
      : { section, name: 'YubiKey SSH key', status: 'warn', reason: 'no cardno: identity' },
  ]
}
