/**
 * Disposable home directories and host descriptions.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import type { HostInfo } from 'yubisetup'

/** A temporary directory standing in for `$HOME`. @public */
export interface TempHome {
  dir: string
  /** Remove the directory and everything in it. */
  cleanup(): Promise<void>
}

/** Create an empty temporary home directory. @public */
export async function createTempHome(): Promise<TempHome> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'yubisetup-test-'))
  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  }
}

/**
 * A Linux {@link HostInfo} for user `tester` (uid 1000) with an empty
 * environment.
 *
 * @public
 */
export function testHost(homeDir: string, overrides?: Partial<HostInfo>): HostInfo {
  return {
    platform: 'linux',
    homeDir,
    uid: 1000,
    username: 'tester',
    env: {},
    ...overrides,
  }
}

/** Write a placeholder public key file into `homeDir` and return its path. @public */
export async function writePublicKey(homeDir: string, name = 'tester.key'): Promise<string> {
  const keyPath = path.join(homeDir, name)
  await fs.writeFile(keyPath, '-----BEGIN PGP PUBLIC KEY BLOCK-----\nplaceholder\n-----END PGP PUBLIC KEY BLOCK-----\n')
  return keyPath
}
