import { ZodError } from 'zod'

/**
 * Base class for anything wrong with the threshold or its companion settings.
 * Raised at build or startup time and never replaced by a default.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly validationErrors: ZodError['issues'],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  /**
   * Returns a human-readable summary of all validation errors
   */
  getErrorSummary(): string {
    return this.validationErrors
      .map((err) => {
        const path = err.path.map(String).join('.')
        return `${path ? `${path}: ` : ''}${err.message}`
      })
      .join('\n')
  }
}

export class ConfigLoadError extends ConfigurationError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConfigLoadError'
  }
}
