import type { SiteLevel } from '../core/types/level'
import type { Condition, Message, SiteInfo } from '../core/types/site'
import { getSettings } from '../core/settings'
import { AssertionEvaluator, EvaluatorOptions } from './evaluator'

export type AssertFn = (level: SiteLevel, condition: Condition, message?: Message, site?: SiteInfo) => void

/**
 * Returns an `assert` bound to its own evaluator, for hosts that inject the
 * threshold and collaborators explicitly.
 */
export function createAssert(options: EvaluatorOptions): AssertFn {
  const evaluator = new AssertionEvaluator(options)
  return (level, condition, message, site) => evaluator.check(level, condition, message, site)
}

let defaultEvaluator: AssertionEvaluator | undefined

function processEvaluator(): AssertionEvaluator {
  if (!defaultEvaluator) {
    const settings = getSettings()
    defaultEvaluator = new AssertionEvaluator({ threshold: settings.level, quitOnAssert: settings.quitOnAssert })
  }
  return defaultEvaluator
}

/**
 * Declares an invariant checked against the process-wide threshold.
 *
 * ```ts
 * assert(Level.Error, () => len < cap, 'bound check')
 * ```
 *
 * Pass the condition and message as thunks so that nothing is evaluated for a
 * disabled or passing site. Run the sources through the elision step to drop
 * disabled sites from the output entirely.
 */
export function assert(level: SiteLevel, condition: Condition, message?: Message, site?: SiteInfo): void {
  processEvaluator().check(level, condition, message, site)
}
