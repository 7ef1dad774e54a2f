/**
 * The `yubisetup setup` command: provisions the YubiKey for GPG, SSH and Git.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import {
  NodeCommandRunner,
  detectHost,
  loadConfig,
  runProvisioning,
} from 'yubisetup'
import type { ProvisionResult } from 'yubisetup'
import { ConsoleLogger, formatError } from '../output.js'
import { ReadlinePrompter } from '../prompt.js'
import type { SetupCommandOptions } from '../types.js'

const USAGE =
  'Usage: yubisetup setup [--gpg-key <path>] [--skip-pin] [--dry-run] [--verbose] [--config-dir <dir>]\n'

/**
 * Parse the `setup` flags.
 * @throws If an unknown flag or a stray argument is given.
 */
export function parseSetupArgs(args: string[]): SetupCommandOptions {
  const { values } = parseArgs({
    args,
    options: {
      'gpg-key': { type: 'string', short: 'k' },
      'skip-pin': { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      'config-dir': { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  })

  return {
    gpgKey: values['gpg-key'],
    skipPin: values['skip-pin'],
    dryRun: values['dry-run'],
    verbose: values.verbose,
    configDir: values['config-dir'],
  }
}

function printDryRunSummary(log: ConsoleLogger, result: ProvisionResult): void {
  log.print('')
  if (result.downgraded.length === 0) {
    log.success('Dry run finished: every step would run.')
    return
  }
  log.warn(`Dry run finished: ${String(result.downgraded.length)} step(s) would have failed:`)
  for (const report of result.downgraded) {
    log.print(`  - ${report.title}: ${report.detail ?? 'failed'}`)
  }
}

export async function setupCommand(args: string[]): Promise<number> {
  let options: SetupCommandOptions
  try {
    options = parseSetupArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(USAGE)
    return 1
  }

  const log = new ConsoleLogger({ verbose: options.verbose })
  const prompter = new ReadlinePrompter()

  try {
    const config = await loadConfig(options.configDir)
    const host = detectHost()
    const runner = new NodeCommandRunner({
      env: host.env,
      onSpawn: (line) => {
        log.debug(`Executing: ${line}`)
      },
    })

    const result = await runProvisioning({
      runner,
      log,
      prompter,
      host,
      config,
      dryRun: options.dryRun,
      skipPinCheck: options.skipPin,
      keyFile: options.gpgKey,
    })

    if (result.dryRun && result.ok) {
      printDryRunSummary(log, result)
    }
    return result.ok ? 0 : 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  } finally {
    prompter.close()
  }
}
