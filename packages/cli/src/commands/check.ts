import { parseArgs } from 'node:util'
import { CHECK_TIMEOUT_MS, NodeCommandRunner, runDoctor } from 'yubisetup'
import type { PreflightCheck, PreflightCheckStatus } from 'yubisetup'
import { ConsoleLogger, bold, formatError } from '../output.js'

const ICONS: Record<PreflightCheckStatus, string> = {
  pass: '✓',
  warn: '⚠',
  fail: '✗',
}

function formatCheck(check: PreflightCheck): string {
  const reason = check.reason !== undefined ? ` — ${check.reason}` : ''
  return `  ${ICONS[check.status]} ${check.name}${reason}\n`
}

export async function checkCommand(args: string[]): Promise<number> {
  let verbose: boolean
  try {
    const { values } = parseArgs({
      args,
      options: { verbose: { type: 'boolean', short: 'v', default: false } },
      strict: true,
      allowPositionals: false,
    })
    verbose = values.verbose
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write('Usage: yubisetup check [--verbose]\n')
    return 1
  }

  const log = new ConsoleLogger({ verbose })

  try {
    const result = await runDoctor({
      runner: new NodeCommandRunner({
        timeoutMs: CHECK_TIMEOUT_MS,
        onSpawn: (line) => {
          log.debug(`Executing: ${line}`)
        },
      }),
    })

    let section: string | undefined
    for (const check of result.checks) {
      if (check.section !== section) {
        section = check.section
        process.stdout.write(`\n${bold(section)}\n`)
      }
      process.stdout.write(formatCheck(check))
    }

    if (result.ready) {
      process.stdout.write('\nAll required checks passed.\n')
      return 0
    }

    process.stdout.write('\nSome checks failed. Run `yubisetup setup` to provision your YubiKey.\n')
    return 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
