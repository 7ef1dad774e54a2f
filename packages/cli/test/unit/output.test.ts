import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConsoleLogger, formatError } from '../../src/output.js'

describe('formatError', () => {
  it('should format Error instances with name and message', () => {
    const err = new Error('something broke')
    expect(formatError(err)).toBe('Error: something broke')
  })

  it('should format custom error classes', () => {
    class CustomError extends Error {
      constructor(message: string) {
        super(message)
        this.name = 'CustomError'
      }
    }
    expect(formatError(new CustomError('bad'))).toBe('CustomError: bad')
  })

  it('should stringify non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
    expect(formatError(null)).toBe('null')
  })
})

describe('ConsoleLogger', () => {
  let stdoutOutput: string
  let stderrOutput: string

  beforeEach(() => {
    stdoutOutput = ''
    stderrOutput = ''
    Object.defineProperty(process.stdout, 'isTTY', { value: false, configurable: true })
    Object.defineProperty(process.stderr, 'isTTY', { value: false, configurable: true })
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true })
    Object.defineProperty(process.stderr, 'isTTY', { value: undefined, configurable: true })
  })

  it('should write progress levels to stdout', () => {
    const log = new ConsoleLogger()
    log.info('Checking operating system compatibility...')
    log.success('Linux detected - supported')
    log.print('   source ~/.bashrc')
    expect(stdoutOutput).toBe(
      '[INFO] Checking operating system compatibility...\n' +
        '[SUCCESS] Linux detected - supported\n' +
        '   source ~/.bashrc\n',
    )
    expect(stderrOutput).toBe('')
  })

  it('should write warnings and errors to stderr', () => {
    const log = new ConsoleLogger()
    log.warn('Skipping PIN check (not recommended)')
    log.error('[ERROR-test-id] YubiKey not detected.')
    expect(stderrOutput).toBe(
      '[WARNING] Skipping PIN check (not recommended)\n[ERROR-test-id] YubiKey not detected.\n',
    )
  })

  it('should number steps', () => {
    new ConsoleLogger().step(3, 17, 'Locate GPG public key')
    expect(stdoutOutput).toBe('\n[3/17] Locate GPG public key\n')
  })

  it('should show debug output only when verbose', () => {
    new ConsoleLogger().debug('hidden')
    new ConsoleLogger({ verbose: true }).debug('Executing: gpg2 --card-status')
    expect(stdoutOutput).toBe('[DEBUG] Executing: gpg2 --card-status\n')
  })

  it('should color the error line on a TTY', () => {
    vi.stubEnv('NO_COLOR', '')
    Object.defineProperty(process.stderr, 'isTTY', { value: true, configurable: true })
    new ConsoleLogger().error('[ERROR-test-id] boom')
    expect(stderrOutput).toBe('\x1b[31m[ERROR-test-id] boom\x1b[39m\n')
    vi.unstubAllEnvs()
  })
})
