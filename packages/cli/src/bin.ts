#!/usr/bin/env node
/**
 * CLI entry point for yubisetup.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]. Global flags
 * (`--help`, `--version`) are only recognised in the subcommand position.
 *
 * @internal
 */

import * as fs from 'node:fs'

const [subcommand, ...commandArgs] = process.argv.slice(2)

function printHelp(): void {
  process.stdout.write(
    'Usage: yubisetup <command> [options]\n\n' +
      'Commands:\n' +
      '  setup        Provision a YubiKey for GPG, SSH and Git signing\n' +
      '  check        Run read-only checks against the current setup\n' +
      '  config       Manage configuration (init, show)\n\n' +
      'Setup options:\n' +
      '  -k, --gpg-key <path>   Path to your GPG public key\n' +
      '      --skip-pin         Skip the PIN confirmation (not recommended)\n' +
      '      --dry-run          Show what would be done without making changes\n' +
      '  -v, --verbose          Show every command that is run\n' +
      '      --config-dir <dir> Directory containing config.json\n\n' +
      'Global options:\n' +
      '  -h, --help             Show this help\n' +
      '  -V, --version          Show the version\n',
  )
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
  )
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version)
  }
  return 'unknown'
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case '--version':
    case '-V':
      process.stdout.write(`${readVersion()}\n`)
      return 0
    case 'setup': {
      const { setupCommand } = await import('./commands/setup.js')
      return setupCommand(commandArgs)
    }
    case 'check': {
      const { checkCommand } = await import('./commands/check.js')
      return checkCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
