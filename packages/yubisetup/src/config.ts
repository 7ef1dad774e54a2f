/**
 * Configuration loading, validation, and defaults for yubisetup.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import type { SetupConfig } from './types.js'

/** File name of the config inside the config directory. */
export const CONFIG_FILE_NAME = 'config.json'

/** Return the default config directory. */
export function getDefaultConfigDir(): string {
  return path.join(os.homedir(), '.config', 'yubisetup')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): SetupConfig {
  return {
    version: 1,
    emailDomain: 'obmondo.com',
    knownKeyId: '0x3996B9E90711DD51',
    agentRestartDelayMs: 2000,
    supportUrl: 'https://gitea.obmondo.com/EnableIT/pass',
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Config ${field} must be a non-empty string`)
  }
  return value
}

/**
 * Validate an unknown value as a SetupConfig, throwing on invalid structure.
 *
 * Fields other than `version` may be omitted and take their default.
 */
export function validateConfig(config: unknown): SetupConfig {
  if (!isObject(config)) {
    throw new Error('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new Error('Config version must be 1')
  }

  const defaults = defaultConfig()
  const result: SetupConfig = { ...defaults }

  if (config.emailDomain !== undefined) {
    const domain = requireNonEmptyString(config.emailDomain, 'emailDomain')
    if (domain.includes('@')) {
      throw new Error('Config emailDomain must not contain "@"')
    }
    result.emailDomain = domain
  }

  if (config.knownKeyId !== undefined) {
    result.knownKeyId = requireNonEmptyString(config.knownKeyId, 'knownKeyId')
  }

  if (config.agentRestartDelayMs !== undefined) {
    if (typeof config.agentRestartDelayMs !== 'number' || config.agentRestartDelayMs <= 0) {
      throw new Error('Config agentRestartDelayMs must be a positive number')
    }
    result.agentRestartDelayMs = config.agentRestartDelayMs
  }

  if (config.keyFile !== undefined) {
    result.keyFile = requireNonEmptyString(config.keyFile, 'keyFile')
  }

  if (config.supportUrl !== undefined) {
    result.supportUrl = requireNonEmptyString(config.supportUrl, 'supportUrl')
  }

  return result
}

/**
 * Load the yubisetup config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to `~/.config/yubisetup`.
 */
export async function loadConfig(configDir?: string): Promise<SetupConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Failed to parse config file at ${configPath}`)
  }

  return validateConfig(parsed)
}
