import type { SourceLocation } from './types/site'

/**
 * Raised when `NoAssertions` is used as the level of an assertion call.
 * It is a threshold value only.
 */
export class AssertionSiteError extends Error {
  constructor(
    message: string,
    public readonly location?: SourceLocation,
  ) {
    super(location ? `${location.file}:${location.line}: ${message}` : message)
    this.name = 'AssertionSiteError'
  }
}
