import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as os from 'node:os'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { configCommand } from '../../../src/commands/config.js'

describe('configCommand', () => {
  let stderrOutput: string
  let stdoutOutput: string
  let tempDir: string
  let configDir: string

  beforeEach(async () => {
    stderrOutput = ''
    stdoutOutput = ''
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'yubisetup-config-test-'))
    configDir = path.join(tempDir, 'yubisetup')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  describe('init subcommand', () => {
    it('should create config.json with the defaults and return 0', async () => {
      const code = await configCommand(['init', '--config-dir', configDir])
      expect(code).toBe(0)

      const configPath = path.join(configDir, 'config.json')
      expect(stdoutOutput).toBe(`Config created at ${configPath}\n`)

      const written: unknown = JSON.parse(await fs.readFile(configPath, 'utf8'))
      expect(written).toEqual({
        version: 1,
        emailDomain: 'obmondo.com',
        knownKeyId: '0x3996B9E90711DD51',
        agentRestartDelayMs: 2000,
        supportUrl: 'https://gitea.obmondo.com/EnableIT/pass',
      })
    })

    it('should write the file with owner-only permissions', async () => {
      await configCommand(['init', '--config-dir', configDir])
      const stat = await fs.stat(path.join(configDir, 'config.json'))
      expect(stat.mode & 0o777).toBe(0o600)
    })

    it('should refuse to overwrite an existing config', async () => {
      await configCommand(['init', '--config-dir', configDir])
      stdoutOutput = ''

      const code = await configCommand(['init', '--config-dir', configDir])
      expect(code).toBe(1)
      expect(stderrOutput).toBe(
        `Config already exists at ${path.join(configDir, 'config.json')}\n`,
      )
      expect(stdoutOutput).toBe('')
    })
  })

  describe('show subcommand', () => {
    it('should print the defaults with a notice when no file exists', async () => {
      const code = await configCommand(['show', '--config-dir', configDir])
      expect(code).toBe(0)
      expect(stderrOutput).toBe(
        `No config at ${path.join(configDir, 'config.json')}; showing defaults\n`,
      )
      const shown: unknown = JSON.parse(stdoutOutput)
      expect(shown).toMatchObject({ version: 1, emailDomain: 'obmondo.com' })
    })

    it('should print the effective config merged over the defaults', async () => {
      await fs.mkdir(configDir, { recursive: true })
      await fs.writeFile(
        path.join(configDir, 'config.json'),
        JSON.stringify({ version: 1, emailDomain: 'example.org' }),
      )

      const code = await configCommand(['show', '--config-dir', configDir])
      expect(code).toBe(0)
      expect(stderrOutput).toBe('')
      const shown: unknown = JSON.parse(stdoutOutput)
      expect(shown).toMatchObject({
        emailDomain: 'example.org',
        knownKeyId: '0x3996B9E90711DD51',
        agentRestartDelayMs: 2000,
      })
    })

    it('should return 1 for an invalid config', async () => {
      await fs.mkdir(configDir, { recursive: true })
      await fs.writeFile(path.join(configDir, 'config.json'), JSON.stringify({ version: 2 }))

      const code = await configCommand(['show', '--config-dir', configDir])
      expect(code).toBe(1)
      expect(stderrOutput).toBe('Error: Config version must be 1\n')
    })
  })

  describe('usage errors', () => {
    it('should print usage and return 1 for a missing subcommand', async () => {
      const code = await configCommand([])
      expect(code).toBe(1)
      expect(stderrOutput).toBe('Usage: yubisetup config <init|show> [--config-dir <dir>]\n')
    })

    it('should print usage and return 1 for an unknown subcommand', async () => {
      const code = await configCommand(['edit', '--config-dir', configDir])
      expect(code).toBe(1)
      expect(stderrOutput).toContain('Usage: yubisetup config')
    })

    it('should return 1 for an unknown flag', async () => {
      const code = await configCommand(['init', '--force'])
      expect(code).toBe(1)
      expect(stderrOutput).toContain('Usage: yubisetup config')
    })
  })
})
