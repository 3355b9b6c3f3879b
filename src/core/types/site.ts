import type { SiteLevel } from './level'

export interface SourceLocation {
  file: string
  line: number
}

export type Condition = boolean | (() => boolean)

export type Message = string | (() => string)

/**
 * Metadata attached to a call site. The elision transformer fills this in;
 * hand-written calls may pass any subset of it.
 */
export interface SiteInfo {
  /** Source text of the condition, used verbatim in diagnostics */
  expression?: string
  file?: string
  line?: number
  /** Set when the activeness decision was already taken at build time */
  compiled?: boolean
}

export interface Diagnostic {
  expression: string
  message?: string
  location?: SourceLocation
  /** The formatted failure text, without location prefix */
  text: string
}

export type SiteStatus = 'compiled' | 'elided' | 'dynamic'

export interface SiteReport {
  file: string
  line: number
  level: SiteLevel | 'unknown'
  status: SiteStatus
}
