import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { createTempHome } from '@yubisetup/test-helpers'
import type { TempHome } from '@yubisetup/test-helpers'
import { createHarness } from '../../../helpers/harness.js'
import {
  agentConfigStep,
  clearSshAuthSockStep,
  gnupgConfigStep,
  shellProfileStep,
} from '../../../../src/pipeline/steps/gnupg.js'
import { DIRMNGR_CONF, GPG_CONF, linuxAgentConf } from '../../../../src/pipeline/templates.js'
import { SetupError } from '../../../../src/errors.js'

let home: TempHome

beforeEach(async () => {
  home = await createTempHome()
})

afterEach(async () => {
  await home.cleanup()
})

function gnupgPath(...parts: string[]): string {
  return path.join(home.dir, '.gnupg', ...parts)
}

// ---------------------------------------------------------------------------
// gnupg-config
// ---------------------------------------------------------------------------

describe('gnupgConfigStep', () => {
  it('creates ~/.gnupg with mode 0700 and writes both files', async () => {
    const h = createHarness({ homeDir: home.dir })
    await gnupgConfigStep.run(h.ctx, h.services)
    expect((await fs.stat(gnupgPath())).mode & 0o777).toBe(0o700)
    expect(await fs.readFile(gnupgPath('gpg.conf'), 'utf8')).toBe(GPG_CONF)
    expect(await fs.readFile(gnupgPath('dirmngr.conf'), 'utf8')).toBe(DIRMNGR_CONF)
  })

  it('tightens an existing directory and overwrites old content', async () => {
    await fs.mkdir(gnupgPath(), { mode: 0o755 })
    await fs.chmod(gnupgPath(), 0o755)
    await fs.writeFile(gnupgPath('gpg.conf'), 'stale\n')
    const h = createHarness({ homeDir: home.dir })
    await gnupgConfigStep.run(h.ctx, h.services)
    expect((await fs.stat(gnupgPath())).mode & 0o777).toBe(0o700)
    expect(await fs.readFile(gnupgPath('gpg.conf'), 'utf8')).toBe(GPG_CONF)
  })

  it('writes nothing in dry-run mode', async () => {
    const h = createHarness({ homeDir: home.dir, dryRun: true })
    await gnupgConfigStep.run(h.ctx, h.services)
    await expect(fs.stat(gnupgPath())).rejects.toThrow()
    expect(h.log.messages('info')).toEqual([
      'Configuring GPG...',
      `DRY RUN: Would create directory: ${gnupgPath()}`,
      `DRY RUN: Would write GPG config to: ${gnupgPath('gpg.conf')}`,
      `DRY RUN: Would write dirmngr config to: ${gnupgPath('dirmngr.conf')}`,
    ])
  })
})

// ---------------------------------------------------------------------------
// agent-config
// ---------------------------------------------------------------------------

describe('agentConfigStep', () => {
  it('writes the Linux agent config with the uid socket path', async () => {
    await fs.mkdir(gnupgPath())
    const h = createHarness({ homeDir: home.dir })
    await agentConfigStep.run(h.ctx, h.services)
    const content = await fs.readFile(gnupgPath('gpg-agent.conf'), 'utf8')
    expect(content).toBe(linuxAgentConf(1000))
    expect(content).toContain('extra-socket /run/user/1000/gnupg/S.gpg-agent-extra\n')
  })

  it('requires pinentry-mac outside dry-run mode on macOS', async () => {
    const h = createHarness({ homeDir: home.dir, host: { platform: 'darwin' } })
    const missing = path.join(home.dir, 'pinentry-mac')
    h.ctx.platform = { os: 'darwin', shellProfilePath: '', sshAuthSockExpression: '', pinentryProgramPath: missing }
    const error = await agentConfigStep.run(h.ctx, h.services).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SetupError)
    expect(error).toMatchObject({ message: `pinentry-mac not found at ${missing}.` })
  })

  it('writes the macOS config with the pinentry program when it exists', async () => {
    await fs.mkdir(gnupgPath())
    const pinentry = path.join(home.dir, 'pinentry-mac')
    await fs.writeFile(pinentry, '')
    const h = createHarness({ homeDir: home.dir, host: { platform: 'darwin' } })
    h.ctx.platform = { os: 'darwin', shellProfilePath: '', sshAuthSockExpression: '', pinentryProgramPath: pinentry }
    await agentConfigStep.run(h.ctx, h.services)
    const content = await fs.readFile(gnupgPath('gpg-agent.conf'), 'utf8')
    expect(content.split('\n')[0]).toBe(`pinentry-program ${pinentry}`)
  })

  it('does not check for pinentry-mac in dry-run mode', async () => {
    const h = createHarness({ homeDir: home.dir, host: { platform: 'darwin' }, dryRun: true })
    await agentConfigStep.run(h.ctx, h.services)
    expect(h.log.messages('info')).toContain(
      `DRY RUN: Would write GPG agent config to: ${gnupgPath('gpg-agent.conf')}`,
    )
  })
})

// ---------------------------------------------------------------------------
// shell-profile
// ---------------------------------------------------------------------------

describe('shellProfileStep', () => {
  const bashrc = (): string => path.join(home.dir, '.bashrc')

  it('appends the socket line to a missing profile', async () => {
    const h = createHarness({ homeDir: home.dir })
    await shellProfileStep.run(h.ctx, h.services)
    expect(await fs.readFile(bashrc(), 'utf8')).toBe(
      '\nSSH_AUTH_SOCK=/run/user/1000/gnupg/S.gpg-agent.ssh\n',
    )
  })

  it('keeps existing content and appends once across runs', async () => {
    await fs.writeFile(bashrc(), "alias ll='ls -l'\n")
    await shellProfileStep.run(...args())
    const second = await shellProfileStep.run(...args())
    expect(second).toEqual({ status: 'skipped', detail: 'already configured' })
    expect(await fs.readFile(bashrc(), 'utf8')).toBe(
      "alias ll='ls -l'\n\nSSH_AUTH_SOCK=/run/user/1000/gnupg/S.gpg-agent.ssh\n",
    )
  })

  it('appends the agent socket when the profile points at a keyring socket', async () => {
    await fs.writeFile(bashrc(), 'export SSH_AUTH_SOCK=/run/user/1000/keyring/ssh\n')
    const outcome = await shellProfileStep.run(...args())
    expect(outcome.status).toBe('completed')
    expect(await fs.readFile(bashrc(), 'utf8')).toBe(
      'export SSH_AUTH_SOCK=/run/user/1000/keyring/ssh\n\nSSH_AUTH_SOCK=/run/user/1000/gnupg/S.gpg-agent.ssh\n',
    )
  })

  it('describes the change in dry-run mode', async () => {
    const h = createHarness({ homeDir: home.dir, dryRun: true })
    await shellProfileStep.run(h.ctx, h.services)
    await expect(fs.stat(bashrc())).rejects.toThrow()
    expect(h.log.messages('info')).toContain(
      `DRY RUN: Would add to ${bashrc()}: SSH_AUTH_SOCK=/run/user/1000/gnupg/S.gpg-agent.ssh`,
    )
  })

  function args(): Parameters<typeof shellProfileStep.run> {
    const h = createHarness({ homeDir: home.dir })
    return [h.ctx, h.services]
  }
})

// ---------------------------------------------------------------------------
// ssh-auth-sock
// ---------------------------------------------------------------------------

describe('clearSshAuthSockStep', () => {
  it('unsets an inherited SSH_AUTH_SOCK', async () => {
    const h = createHarness({ homeDir: home.dir, host: { env: { SSH_AUTH_SOCK: '/tmp/ssh-agent.sock' } } })
    expect((await clearSshAuthSockStep.run(h.ctx, h.services)).status).toBe('completed')
    expect('SSH_AUTH_SOCK' in h.ctx.host.env).toBe(false)
    expect(h.log.messages('warn')).toEqual(['Found existing SSH_AUTH_SOCK, unsetting it...'])
  })

  it('skips when nothing is set', async () => {
    const h = createHarness({ homeDir: home.dir })
    expect(await clearSshAuthSockStep.run(h.ctx, h.services)).toEqual({ status: 'skipped', detail: 'not set' })
  })

  it('leaves the environment alone in dry-run mode', async () => {
    const h = createHarness({
      homeDir: home.dir,
      host: { env: { SSH_AUTH_SOCK: '/tmp/ssh-agent.sock' } },
      dryRun: true,
    })
    await clearSshAuthSockStep.run(h.ctx, h.services)
    expect(h.ctx.host.env.SSH_AUTH_SOCK).toBe('/tmp/ssh-agent.sock')
    expect(h.log.messages('info')).toContain('DRY RUN: Would unset SSH_AUTH_SOCK')
  })
})
