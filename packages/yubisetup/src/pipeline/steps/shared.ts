/**
 * Helpers shared by several steps.
 */

import * as fs from 'node:fs/promises'
import { constants as fsConstants } from 'node:fs'
import { CommandFailedError, FilesystemError } from '../../errors.js'
import { formatCommandLine } from '../../util/exec.js'
import type { CommandRunner, ExecCommandResult } from '../../util/exec.js'
import type { Logger } from '../../types.js'
import type { ProvisioningContext } from '../context.js'

/** True if `which <name>` finds the program. */
export async function commandExists(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.run('which', [name])
  return result.exitCode === 0
}

/**
 * Run a command and throw {@link CommandFailedError} with `message` if it
 * exits non-zero.
 */
export async function requireSuccess(
  runner: CommandRunner,
  command: string,
  args: string[],
  message: string,
): Promise<ExecCommandResult> {
  const result = await runner.run(command, args)
  if (result.exitCode !== 0) {
    throw new CommandFailedError(message, formatCommandLine(command, args), result.exitCode)
  }
  return result
}

/** True if `filePath` is a regular file the current user can read. */
export async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath)
    if (!stat.isFile()) return false
    await fs.access(filePath, fsConstants.R_OK)
    return true
  } catch {
    return false
  }
}

/** True if anything exists at `filePath`. */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Overwrite a config file, or describe the write in dry-run mode.
 *
 * @throws {@link FilesystemError} if the write fails.
 */
export async function writeConfigFile(
  ctx: ProvisioningContext,
  log: Logger,
  filePath: string,
  content: string,
  label: string,
): Promise<void> {
  if (ctx.dryRun) {
    log.info(`DRY RUN: Would write ${label} to: ${filePath}`)
    return
  }
  try {
    await fs.writeFile(filePath, content, { encoding: 'utf8', mode: 0o644 })
  } catch (err) {
    throw new FilesystemError(
      `Failed to write ${label} to ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      'write',
    )
  }
  log.debug(`Wrote ${filePath}`)
}
