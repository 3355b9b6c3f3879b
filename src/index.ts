/**
 * Basic usage:
 * ```ts
 * import { assert, Level } from 'tripwire'
 *
 * assert(Level.Warning, () => queue.length < 1000, () => `queue backing up: ${queue.length}`)
 * assert(Level.Error, () => len < cap, 'bound check')
 * ```
 *
 * The threshold comes from `TRIPWIRE_LEVEL` (default: NoAssertions, i.e. all
 * assertions off). Hosts call `initSettings()` (or `getSettings()`) at startup
 * so an unknown level is reported before any assertion runs. Build with `tripwireEsbuildPlugin` or `tripwire strip` to
 * remove disabled sites from the output.
 */

export * from './core'
export * from './assertions'
export * from './elision'
export { logger, Logger } from './logger'
export type { LogLevel } from './logger'
