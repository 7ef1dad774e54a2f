import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { CONFIG_FILE_NAME, defaultConfig, getDefaultConfigDir, loadConfig } from 'yubisetup'
import { formatError } from '../output.js'

const USAGE = 'Usage: yubisetup config <init|show> [--config-dir <dir>]\n'

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export async function configCommand(args: string[]): Promise<number> {
  let subcommand: string | undefined
  let configDir: string
  try {
    const { values, positionals } = parseArgs({
      args,
      options: { 'config-dir': { type: 'string' } },
      allowPositionals: true,
      strict: true,
    })
    subcommand = positionals[0]
    configDir = values['config-dir'] ?? getDefaultConfigDir()
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(USAGE)
    return 1
  }

  const configPath = path.join(configDir, CONFIG_FILE_NAME)

  switch (subcommand) {
    case 'init': {
      try {
        await fs.mkdir(configDir, { recursive: true, mode: 0o700 })

        if (await fileExists(configPath)) {
          process.stderr.write(`Config already exists at ${configPath}\n`)
          return 1
        }

        const content = JSON.stringify(defaultConfig(), null, 2)
        await fs.writeFile(configPath, content + '\n', { encoding: 'utf8', mode: 0o600 })
        process.stdout.write(`Config created at ${configPath}\n`)
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    case 'show': {
      try {
        if (!(await fileExists(configPath))) {
          process.stderr.write(`No config at ${configPath}; showing defaults\n`)
        }
        const config = await loadConfig(configDir)
        process.stdout.write(JSON.stringify(config, null, 2) + '\n')
        return 0
      } catch (err) {
        process.stderr.write(`${formatError(err)}\n`)
        return 1
      }
    }

    default:
      process.stderr.write(USAGE)
      return 1
  }
}
