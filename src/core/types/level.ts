import { z } from 'zod'
import { ConfigurationError } from '../config/errors'
import { AssertionSiteError } from '../errors'

export const LEVEL_ORDER = ['Warning', 'Error', 'NoAssertions'] as const

export const LevelSchema = z.enum(LEVEL_ORDER)

export type Level = z.infer<typeof LevelSchema>

/** Levels an assertion call may declare. `NoAssertions` is a threshold only. */
export type SiteLevel = Exclude<Level, 'NoAssertions'>

export const Level = Object.freeze({
  Warning: 'Warning',
  Error: 'Error',
  NoAssertions: 'NoAssertions',
} as const satisfies { [K in Level]: K })

export function isLevel(value: unknown): value is Level {
  return LevelSchema.safeParse(value).success
}

export function isSiteLevel(value: unknown): value is SiteLevel {
  return value === Level.Warning || value === Level.Error
}

function ordinal(level: Level): number {
  return LEVEL_ORDER.indexOf(level)
}

export function compareLevels(a: Level, b: Level): -1 | 0 | 1 {
  const diff = ordinal(a) - ordinal(b)
  return diff < 0 ? -1 : diff > 0 ? 1 : 0
}

/**
 * Maps a configured name to a level. An absent or empty value means
 * assertions are disabled; any other unknown name is a configuration error.
 */
export function parseLevel(name?: string | null): Level {
  if (name === undefined || name === null || name === '') {
    return Level.NoAssertions
  }

  const parsed = LevelSchema.safeParse(name)
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown assertion level "${name}" (expected one of: ${LEVEL_ORDER.join(', ')})`)
  }
  return parsed.data
}

/**
 * A site is active when its level is at or above the threshold.
 * @throws AssertionSiteError when `siteLevel` is `NoAssertions`
 */
export function isActive(siteLevel: SiteLevel, threshold: Level): boolean {
  if (!isSiteLevel(siteLevel)) {
    throw new AssertionSiteError(`"${String(siteLevel)}" cannot be used as an assertion level`)
  }
  return compareLevels(siteLevel, threshold) >= 0
}
