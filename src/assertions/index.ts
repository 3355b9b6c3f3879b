/**
 * Assertion evaluation and failure reporting
 */

export { assert, createAssert } from './assert'
export type { AssertFn } from './assert'

export { AssertionEvaluator, createEvaluator } from './evaluator'
export type { EvaluatorOptions } from './evaluator'

export { AssertionFailure } from './failure'
export { logWarning, requestProcessStop } from './hooks'
export type { WarningSink, TerminateHook } from './hooks'

export {
  createDiagnostic,
  formatDiagnostic,
  formatLocation,
  renderCondition,
  withLocation,
} from './diagnostic'
