import type { SourceLocation } from '../core/types/site'
import { logger } from '../logger'
import { withLocation } from './diagnostic'

/** Receives the text of a failed `Warning`-level assertion */
export type WarningSink = (text: string, location?: SourceLocation) => void

/** Asks the host to stop. Need not stop synchronously, or at all. */
export type TerminateHook = () => void

export const logWarning: WarningSink = (text, location) => {
  logger.warn(withLocation(text, location))
}

// The signal is delivered after the current tick, so the failure still propagates first
export const requestProcessStop: TerminateHook = () => {
  process.kill(process.pid, 'SIGTERM')
}
