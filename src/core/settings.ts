import { TripwireConfig, TripwireConfigInput } from './types/config'
import { configFromEnv } from './config/load'
import validateConfig from './config/validate'
import { ConfigurationError } from './config/errors'

export type TripwireSettings = Readonly<Pick<TripwireConfig, 'level' | 'quitOnAssert'>>

let current: TripwireSettings | undefined

/**
 * Fixes the process-wide threshold. Library hosts call this once at startup,
 * before the first assertion, so a bad threshold fails there and not at some
 * later call site. The CLI does the same through `getSettings()` in `main()`.
 */
export function initSettings(config: TripwireConfigInput = {}): TripwireSettings {
  if (current) {
    throw new ConfigurationError('Assertion settings are already initialized')
  }
  current = freeze(validateConfig(config))
  return current
}

/**
 * Returns the process-wide settings, initializing them from the environment
 * on first use.
 */
export function getSettings(): TripwireSettings {
  if (!current) {
    current = freeze(configFromEnv())
  }
  return current
}

function freeze(config: TripwireConfig): TripwireSettings {
  return Object.freeze({ level: config.level, quitOnAssert: config.quitOnAssert })
}
