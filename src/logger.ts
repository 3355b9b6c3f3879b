/* eslint-disable no-console */

import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

/**
 * Leveled stderr logger. stdout is left for command output.
 */
export class Logger {
  private level: LogLevel

  constructor(level: LogLevel = 'info') {
    this.level = level
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.error(pc.gray(`[debug] ${message}`), ...args)
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.error(`${pc.cyan('info')} ${message}`, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.error(`${pc.yellow('warn')} ${message}`, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`${pc.red('error')} ${message}`, ...args)
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level]
  }
}

const envLevel = process.env.TRIPWIRE_LOG_LEVEL

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info')
