import { describe, it, expect } from 'vitest'
import {
  execCommandFull,
  formatCommandLine,
  NodeCommandRunner,
  SPAWN_FAILURE_EXIT_CODE,
} from '../../../src/util/exec.js'

describe('execCommandFull', () => {
  it('returns full result with stdout, stderr, and exitCode on success', async () => {
    const result = await execCommandFull('echo', ['hello'])
    expect(result.stdout.trim()).toBe('hello')
    expect(result.stderr).toBe('')
    expect(result.exitCode).toBe(0)
  })

  it('returns non-zero exitCode without throwing', async () => {
    const result = await execCommandFull('sh', ['-c', 'exit 42'])
    expect(result.exitCode).toBe(42)
  })

  it('captures stderr output', async () => {
    const result = await execCommandFull('sh', ['-c', 'echo errout >&2'])
    expect(result.stderr.trim()).toBe('errout')
    expect(result.exitCode).toBe(0)
  })

  it('kills the process and rejects after timeout', async () => {
    await expect(
      execCommandFull('sleep', ['10'], { timeoutMs: 50 }),
    ).rejects.toThrow(/timed out/)
  }, 5000)

  it('pipes stdin to the process', async () => {
    const result = await execCommandFull('cat', [], { stdin: 'from-stdin' })
    expect(result.stdout).toBe('from-stdin')
    expect(result.exitCode).toBe(0)
  })

  it('passes the given environment to the child', async () => {
    const result = await execCommandFull('sh', ['-c', 'printf %s "$PROBE"'], {
      env: { PATH: process.env.PATH, PROBE: 'visible' },
    })
    expect(result.stdout).toBe('visible')
  })
})

describe('NodeCommandRunner', () => {
  it('resolves with exit code 127 when the binary does not exist', async () => {
    const runner = new NodeCommandRunner()
    const result = await runner.run('yubisetup-no-such-binary', [])
    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE)
    expect(result.stderr).toContain('ENOENT')
  })

  it('feeds input through runWithInput', async () => {
    const runner = new NodeCommandRunner()
    const result = await runner.runWithInput('cat', [], 'trust\n5\n')
    expect(result.stdout).toBe('trust\n5\n')
  })

  it('reads the shared environment map at every spawn', async () => {
    const env: Record<string, string | undefined> = { PATH: process.env.PATH, PROBE: 'one' }
    const runner = new NodeCommandRunner({ env })
    expect((await runner.capture('sh', ['-c', 'printf %s "$PROBE"'])).stdout).toBe('one')
    delete env.PROBE
    expect((await runner.capture('sh', ['-c', 'printf %s "${PROBE:-unset}"'])).stdout).toBe('unset')
  })

  it('reports each command line to onSpawn', async () => {
    const seen: string[] = []
    const runner = new NodeCommandRunner({ onSpawn: (line) => seen.push(line) })
    await runner.run('echo', ['a', 'b'])
    expect(seen).toEqual(['echo a b'])
  })
})

describe('formatCommandLine', () => {
  it('joins the command and its arguments with spaces', () => {
    expect(formatCommandLine('gpg', ['--import', '/tmp/k.key'])).toBe('gpg --import /tmp/k.key')
  })
})
