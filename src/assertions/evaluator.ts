import { Level, SiteLevel, isActive, isSiteLevel } from '../core/types/level'
import type { Condition, Message, SiteInfo } from '../core/types/site'
import { AssertionSiteError } from '../core/errors'
import { logger } from '../logger'
import { createDiagnostic } from './diagnostic'
import { AssertionFailure } from './failure'
import { TerminateHook, WarningSink, logWarning, requestProcessStop } from './hooks'

export interface EvaluatorOptions {
  threshold: Level
  /** Ask the host to stop before an `Error`-level failure propagates */
  quitOnAssert?: boolean
  sink?: WarningSink
  terminate?: TerminateHook
}

/**
 * Checks assertion sites against a fixed threshold.
 *
 * A site below the threshold returns before its condition or message is
 * touched. A passing site does no formatting. A failing `Warning` goes to the
 * sink and execution continues; a failing `Error` throws `AssertionFailure`,
 * after the terminate hook when `quitOnAssert` is set.
 */
export class AssertionEvaluator {
  readonly threshold: Level
  readonly quitOnAssert: boolean
  private readonly sink: WarningSink
  private readonly terminate: TerminateHook

  constructor(options: EvaluatorOptions) {
    this.threshold = options.threshold
    this.quitOnAssert = options.quitOnAssert ?? false
    this.sink = options.sink ?? logWarning
    this.terminate = options.terminate ?? requestProcessStop
  }

  isActive(level: SiteLevel): boolean {
    return isActive(level, this.threshold)
  }

  check(level: SiteLevel, condition: Condition, message?: Message, site?: SiteInfo): void {
    if (!isSiteLevel(level)) {
      throw new AssertionSiteError(`"${String(level)}" cannot be used as an assertion level`)
    }
    if (!site?.compiled && !this.isActive(level)) {
      return
    }

    const passed = typeof condition === 'function' ? condition() : condition
    if (passed) {
      return
    }

    const diagnostic = createDiagnostic(condition, message, site)

    if (level === Level.Warning) {
      this.sink(diagnostic.text, diagnostic.location)
      return
    }

    const failure = new AssertionFailure(diagnostic)
    if (this.quitOnAssert) {
      this.requestStop()
    }
    throw failure
  }

  private requestStop(): void {
    try {
      this.terminate()
    } catch (error) {
      // The failure below must still propagate
      logger.warn('Termination request failed:', error)
    }
  }
}

export function createEvaluator(options: EvaluatorOptions): AssertionEvaluator {
  return new AssertionEvaluator(options)
}
