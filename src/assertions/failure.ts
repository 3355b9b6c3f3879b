import type { Diagnostic, SourceLocation } from '../core/types/site'
import { withLocation } from './diagnostic'

/**
 * Thrown by a failed `Error`-level assertion. Its message is the bare
 * diagnostic text; `describe()` adds the `file:line` prefix when known.
 */
export class AssertionFailure extends Error {
  readonly location?: SourceLocation

  constructor(public readonly diagnostic: Diagnostic) {
    super(diagnostic.text)
    this.name = 'AssertionFailure'
    this.location = diagnostic.location
  }

  describe(): string {
    return withLocation(this.message, this.location)
  }
}
