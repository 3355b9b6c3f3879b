import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { TripwireConfig } from '../types/config'
import { parseLevel } from '../types/level'
import validateConfig from './validate'
import { ConfigLoadError, ConfigurationError } from './errors'

export const CONFIG_FILENAME = 'tripwire.config.json'
export const DEFAULT_ENV_PREFIX = 'TRIPWIRE_'

type Env = Record<string, string | undefined>

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  env?: Env
  cliArgs?: Record<string, unknown>
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (tripwire.config.json, or the explicit path)
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TripwireConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = DEFAULT_ENV_PREFIX, env = process.env, cliArgs = {} } = options

  let config: Record<string, unknown> = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = mergeConfig(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      error,
    )
  }

  config = mergeConfig(config, readEnv(env, envPrefix))

  const definedArgs = Object.fromEntries(Object.entries(cliArgs).filter(([, value]) => value !== undefined))
  if (Object.keys(definedArgs).length > 0) {
    config = mergeConfig(config, definedArgs)
  }

  return validateConfig(config, 'merged configuration')
}

/**
 * Synchronous, environment-only variant used when the process-wide settings
 * are first read at startup.
 */
export function configFromEnv(env: Env = process.env, envPrefix = DEFAULT_ENV_PREFIX): TripwireConfig {
  return validateConfig(readEnv(env, envPrefix), 'environment')
}

/**
 * Reads the JSON config file, returning null when none exists
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  let targetPath: string

  if (configPath) {
    targetPath = resolve(cwd, configPath)
  } else {
    targetPath = join(cwd, CONFIG_FILENAME)
    try {
      await access(targetPath)
    } catch {
      return null
    }
  }

  const content = await readFile(targetPath, 'utf-8')
  const parsed: unknown = JSON.parse(content)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${targetPath} must contain a JSON object`)
  }
  return { ...parsed }
}

function readEnv(env: Env, prefix: string): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  const level = env[`${prefix}LEVEL`]
  if (level !== undefined) {
    // An empty value is the same as an absent one; anything else must be a level name
    config.level = parseLevel(level)
  }

  const quit = env[`${prefix}QUIT_ON_ASSERT`]
  if (quit !== undefined && quit !== '') {
    config.quitOnAssert = parseFlag(`${prefix}QUIT_ON_ASSERT`, quit)
  }

  const outDir = env[`${prefix}OUT_DIR`]
  if (outDir) {
    config.outDir = outDir
  }

  return config
}

function parseFlag(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${value}"`)
  }
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const current = result[key]
    if (isPlainObject(current) && isPlainObject(value)) {
      result[key] = mergeConfig(current, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
