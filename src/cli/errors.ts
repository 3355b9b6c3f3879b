/* eslint-disable no-console */

import { ConfigLoadError, ConfigValidationError, ConfigurationError } from '../core/config/errors'
import { AssertionSiteError } from '../core/errors'

/**
 * Prints a failure the way every command reports it, then exits with 1
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ConfigLoadError) {
    console.error('❌ Failed to load configuration:')
    console.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    console.error('❌ Configuration validation failed:')
    console.error(error.getErrorSummary())
  } else if (error instanceof ConfigurationError) {
    console.error('❌ Invalid configuration:')
    console.error(error.message)
  } else if (error instanceof AssertionSiteError) {
    console.error('❌ Invalid assertion site:')
    console.error(error.message)
  } else {
    console.error('❌ Unexpected error:', error)
  }
  return process.exit(1)
}
