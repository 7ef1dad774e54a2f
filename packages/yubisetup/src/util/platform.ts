/**
 * Platform detection and per-OS path resolution.
 */

import * as os from 'node:os'
import * as path from 'node:path'
import { UnsupportedPlatformError } from '../errors.js'
import type { HostInfo, OperatingSystem, PlatformProfile } from '../types.js'

/** Pinentry binary installed by `pinentry-gnome3` on Debian-based systems. */
export const LINUX_PINENTRY_PATH = '/usr/bin/pinentry-gnome3'

/** Pinentry binary installed by Homebrew on Apple silicon. */
export const DARWIN_PINENTRY_PATH = '/opt/homebrew/bin/pinentry-mac'

/** Narrow a raw platform identifier to a supported operating system. */
export function isSupportedPlatform(platform: string): platform is OperatingSystem {
  return platform === 'linux' || platform === 'darwin'
}

/** Directory holding the agent's sockets on Linux. */
export function linuxRuntimeGnupgDir(uid: number): string {
  return `/run/user/${String(uid)}/gnupg`
}

/**
 * Resolve the shell profile, pinentry path and `SSH_AUTH_SOCK` expression for
 * the host's operating system.
 *
 * @throws {@link UnsupportedPlatformError} for anything but Linux and macOS.
 */
export function resolvePlatformProfile(host: Pick<HostInfo, 'platform' | 'homeDir' | 'uid'>): PlatformProfile {
  const platform = host.platform
  if (!isSupportedPlatform(platform)) {
    throw new UnsupportedPlatformError(platform)
  }

  if (platform === 'linux') {
    return {
      os: 'linux',
      shellProfilePath: path.join(host.homeDir, '.bashrc'),
      pinentryProgramPath: LINUX_PINENTRY_PATH,
      sshAuthSockExpression: `${linuxRuntimeGnupgDir(host.uid)}/S.gpg-agent.ssh`,
    }
  }

  return {
    os: 'darwin',
    shellProfilePath: path.join(host.homeDir, '.bash_profile'),
    pinentryProgramPath: DARWIN_PINENTRY_PATH,
    sshAuthSockExpression: '$(gpgconf --list-dirs agent-ssh-socket)',
  }
}

/** Collect {@link HostInfo} for the current process. */
export function detectHost(): HostInfo {
  const user = os.userInfo()
  return {
    platform: process.platform,
    homeDir: os.homedir(),
    uid: user.uid,
    username: user.username,
    env: process.env,
  }
}

/** Expand a leading `~` to the home directory. */
export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === '~') {
    return homeDir
  }
  if (filePath.startsWith('~/')) {
    return path.join(homeDir, filePath.slice(2))
  }
  return filePath
}
