/**
 * Parsing contracts for the output of external tools.
 *
 * The marker strings are matched literally; existing setups rely on them.
 *
 * @packageDocumentation
 */

import type { PlatformProfile } from '../types.js'

/** Substring that `ssh-add -L` prints for keys held on an OpenPGP card. */
export const SMARTCARD_SSH_MARKER = 'cardno:'

/** Key id reported by the key id step in dry-run mode. */
export const DRY_RUN_KEY_ID = '0x1234567890ABCDEF'

/** True if a `gpg --list-keys` listing mentions `keyId`. */
export function containsKey(listing: string, keyId: string): boolean {
  return listing.includes(keyId)
}

/** True if `ssh-add -L` output includes an identity served from the token. */
export function hasSmartcardIdentity(sshAddOutput: string): boolean {
  return sshAddOutput.includes(SMARTCARD_SSH_MARKER)
}

/**
 * Extract the primary key id from `gpg --list-keys --keyid-format 0xlong`.
 *
 * The first line starting with `pub` whose second field has the form
 * `<algo>/<id>` wins, e.g. `pub   rsa4096/0x1234567890ABCDEF 2023-01-01 [SC]`
 * yields `0x1234567890ABCDEF`.
 */
export function parsePrimaryKeyId(listing: string): string | undefined {
  for (const line of listing.split('\n')) {
    if (!line.startsWith('pub')) continue
    const field = line.trim().split(/\s+/)[1]
    if (field === undefined) continue
    const id = field.split('/')[1]
    if (id !== undefined && id !== '') {
      return id
    }
  }
  return undefined
}

/** The line appended to the shell profile for `profile`. */
export function shellProfileLine(profile: Pick<PlatformProfile, 'os' | 'sshAuthSockExpression'>): string {
  const assignment = `SSH_AUTH_SOCK=${profile.sshAuthSockExpression}`
  return profile.os === 'darwin' ? `export ${assignment}` : assignment
}

/**
 * True if the shell profile already assigns the gpg-agent socket of `profile`.
 * Other `SSH_AUTH_SOCK` assignments, such as a keyring socket under
 * `/run/user`, do not count.
 */
export function hasShellProfileEntry(
  content: string,
  profile: Pick<PlatformProfile, 'sshAuthSockExpression'>,
): boolean {
  return content.includes(`SSH_AUTH_SOCK=${profile.sshAuthSockExpression}`)
}

/** The first `count` lines of `text`, without a trailing empty line. */
export function headLines(text: string, count: number): string[] {
  const lines = text.split('\n')
  if (lines.at(-1) === '') {
    lines.pop()
  }
  return lines.slice(0, count)
}

/** The first line of `text`, or `undefined` for empty output. */
export function firstLine(text: string): string | undefined {
  const [line] = headLines(text, 1)
  return line === undefined || line === '' ? undefined : line
}
