import { describe, it, expect } from '@jest/globals'
import { createDiagnostic, formatDiagnostic, renderCondition, withLocation } from './diagnostic'

describe('diagnostics', () => {
  describe('formatDiagnostic', () => {
    it('should omit the message line when there is no message', () => {
      expect(formatDiagnostic('x > 0')).toBe('Failed assertion:\n\tExpression: (x > 0)')
    })

    it('should put the message before the expression', () => {
      expect(formatDiagnostic('len < cap', 'bound check')).toBe(
        'Failed assertion:\n\tMessage: bound check\n\tExpression: (len < cap)',
      )
    })

    it('should treat an empty message as absent', () => {
      expect(formatDiagnostic('ready', '')).toBe('Failed assertion:\n\tExpression: (ready)')
    })
  })

  describe('renderCondition', () => {
    it('should prefer the recorded expression', () => {
      expect(renderCondition(() => false, { expression: 'items.length === 0' })).toBe('items.length === 0')
    })

    it('should render the body of an arrow condition', () => {
      const x = 0
      expect(renderCondition(() => x > 0)).toBe('x > 0')
    })

    it('should drop parentheses wrapping the whole body', () => {
      const a = true
      const b = false
      expect(renderCondition(() => (a && b))).toBe('a && b')
    })

    it('should keep parentheses that do not wrap the whole body', () => {
      const a = 1
      const b = 2
      expect(renderCondition(() => (a + 1) * (b + 1) === 0)).toBe('(a + 1) * (b + 1) === 0')
    })

    it('should stringify a plain boolean', () => {
      expect(renderCondition(false)).toBe('false')
    })
  })

  it('should prefix the location when known', () => {
    expect(withLocation('Failed assertion:', { file: 'src/queue.ts', line: 7 })).toBe('src/queue.ts:7: Failed assertion:')
    expect(withLocation('Failed assertion:')).toBe('Failed assertion:')
  })

  describe('createDiagnostic', () => {
    it('should resolve a lazy message', () => {
      const diagnostic = createDiagnostic(false, () => 'lazy', { expression: 'ok', file: 'a.ts', line: 3 })

      expect(diagnostic).toEqual({
        expression: 'ok',
        message: 'lazy',
        location: { file: 'a.ts', line: 3 },
        text: 'Failed assertion:\n\tMessage: lazy\n\tExpression: (ok)',
      })
    })

    it('should leave the location out when the line is unknown', () => {
      expect(createDiagnostic(false, undefined, { file: 'a.ts' }).location).toBeUndefined()
    })
  })
})
