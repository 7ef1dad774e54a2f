/**
 * A scripted workstation with a working token attached.
 */

import { FakeCommandRunner } from './fake-runner.js'

/** Key id listed by the scripted `gpg2 --list-keys`. @public */
export const WORKSTATION_KEY_ID = '0xA1B2C3D4E5F60718'

/** `ssh-add -L` line served from the scripted token. @public */
export const WORKSTATION_SSH_KEY = 'ssh-rsa AAAAB3NzaC1yc2EAAAADAQABAAABAQC7 cardno:000612345678'

/** Armored block returned by the scripted `gpg --export -a`, twelve lines long. @public */
export const WORKSTATION_EXPORT = [
  '-----BEGIN PGP PUBLIC KEY BLOCK-----',
  '',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000001',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000002',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000003',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000004',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000005',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000006',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000007',
  'mQINBGPLACEHOLDER0000000000000000000000000000000000000000000008',
  '=AbCd',
  '-----END PGP PUBLIC KEY BLOCK-----',
].join('\n') + '\n'

/** Ciphertext returned by the scripted `gpg2 --encrypt`. @public */
export const WORKSTATION_CIPHERTEXT =
  '-----BEGIN PGP MESSAGE-----\n\nhQIMPLACEHOLDER\n-----END PGP MESSAGE-----\n'

/**
 * A {@link FakeCommandRunner} scripted as a fresh workstation where every
 * provisioning command succeeds.
 *
 * @remarks
 * Packages and the key are not yet installed, `gpg-agent` exits when killed,
 * the token is present and answers encryption for any recipient. Override
 * individual commands with {@link FakeCommandRunner.on}.
 *
 * @public
 */
export function createWorkstationRunner(): FakeCommandRunner {
  return new FakeCommandRunner()
    .on('dpkg -s gnupg2', { exitCode: 1 })
    .on('brew list gnupg', { exitCode: 1 })
    .on('gpg --list-keys', { stdout: '' })
    .on('pkill gpg-agent', { exitCode: 0 })
    .on('pgrep gpg-agent', { exitCode: 1 })
    .on('gpg2 --card-status', { stdout: 'Reader ...........: Yubico YubiKey OTP FIDO CCID\n' })
    .on('ssh-add -L', { stdout: `${WORKSTATION_SSH_KEY}\n` })
    .on('gpg2 --list-keys --keyid-format 0xlong', {
      stdout:
        '/home/tester/.gnupg/pubring.kbx\n' +
        '-------------------------------\n' +
        `pub   rsa4096/${WORKSTATION_KEY_ID} 2023-01-01 [SC]\n` +
        'uid                   [ unknown] Test User <tester@example.test>\n',
    })
    .on(/^gpg2 --encrypt --armor --recipient /, { stdout: WORKSTATION_CIPHERTEXT })
    .on('gpg2 --decrypt', (call) => ({ stdout: call.input === WORKSTATION_CIPHERTEXT ? 'plaintext\n' : '' }))
    .on(/^gpg --export -a /, { stdout: WORKSTATION_EXPORT })
}
