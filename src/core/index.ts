/**
 * Core module - level policy, configuration and the process-wide settings
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './settings'
