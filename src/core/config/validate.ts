import { TripwireConfig, TripwireConfigSchema } from '../types/config'
import { ConfigValidationError } from './errors'

/**
 * Applies defaults and checks a merged configuration. `source` names where the
 * values came from (a file path, "environment") and ends up in the error.
 */
export default function validateConfig(config: unknown, source?: string): TripwireConfig {
  const result = TripwireConfigSchema.safeParse(config)
  if (result.success) {
    return result.data
  }
  const where = source ? ` (${source})` : ''
  throw new ConfigValidationError(`Invalid tripwire configuration${where}`, result.error.issues)
}
