/**
 * Contents of the files written under `~/.gnupg`.
 */

import { linuxRuntimeGnupgDir } from '../util/platform.js'

/** `gpg.conf`: cipher and digest preferences, keyserver options. */
export const GPG_CONF = `auto-key-locate keyserver
keyserver hkps://hkps.pool.sks-keyservers.net
keyserver-options no-honor-keyserver-url
personal-cipher-preferences AES256 AES192 AES CAST5
personal-digest-preferences SHA512 SHA384 SHA256 SHA224
default-preference-list SHA512 SHA384 SHA256 SHA224 AES256 AES192 AES CAST5 ZLIB BZIP2 ZIP Uncompressed
cert-digest-algo SHA512
s2k-cipher-algo AES256
s2k-digest-algo SHA512
charset utf-8
fixed-list-mode
no-comments
no-emit-version
keyid-format 0xlong
list-options show-uid-validity
verify-options show-uid-validity
with-fingerprint
use-agent
require-cross-certification
`

/** `dirmngr.conf`: keyserver list. */
export const DIRMNGR_CONF = `keyserver hkp://jirk5u4osbsr34t5.onion
keyserver hkp://keys.gnupg.net
honor-http-proxy
hkp-cacert /etc/sks-keyservers.netCA.pem
`

/** `gpg-agent.conf` for Linux, with the extra socket under the user's runtime dir. */
export function linuxAgentConf(uid: number): string {
  return `# enables SSH support (ssh-agent)
enable-ssh-support
#remote
extra-socket ${linuxRuntimeGnupgDir(uid)}/S.gpg-agent-extra
# default cache timeout of 600 seconds
default-cache-ttl 600
max-cache-ttl 7200
`
}

/** `gpg-agent.conf` for macOS, pinning the pinentry binary. */
export function darwinAgentConf(pinentryProgramPath: string): string {
  return `pinentry-program ${pinentryProgramPath}
enable-ssh-support
# default cache timeout of 600 seconds
default-cache-ttl 600
max-cache-ttl 7200
`
}

/** Keystrokes for `gpg --edit-key --command-fd 0` that set ultimate trust. */
export const TRUST_SCRIPT = 'trust\n5\ny\nsave\n'

/** Plaintext used for the encryption round-trip test. */
export const ENCRYPTION_TEST_PAYLOAD = 'yubisetup encryption round-trip test\n'
