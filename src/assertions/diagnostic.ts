import type { Condition, Diagnostic, Message, SiteInfo, SourceLocation } from '../core/types/site'

const ARROW_BODY = /^(?:async\s*)?\(\s*\)\s*=>\s*([\s\S]+)$/

/**
 * Builds the failure text:
 *
 * ```
 * Failed assertion:
 * 	Message: <message>        (only when non-empty)
 * 	Expression: (<expression>)
 * ```
 */
export function formatDiagnostic(expression: string, message?: string): string {
  let text = 'Failed assertion:'
  if (message) {
    text += `\n\tMessage: ${message}`
  }
  return `${text}\n\tExpression: (${expression})`
}

export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}`
}

export function withLocation(text: string, location?: SourceLocation): string {
  return location ? `${formatLocation(location)}: ${text}` : text
}

/**
 * Renders the condition for a diagnostic. Prefers the source text recorded at
 * build time, then the body of an expression-bodied arrow.
 */
export function renderCondition(condition: Condition, site?: SiteInfo): string {
  if (site?.expression) {
    return site.expression
  }
  if (typeof condition === 'function') {
    const source = condition.toString().trim()
    const match = ARROW_BODY.exec(source)
    return match?.[1] ? stripOuterParens(match[1].trim()) : source
  }
  return String(condition)
}

// `() => (a && b)` renders as `a && b`, since the layout adds its own parens
function stripOuterParens(body: string): string {
  if (!body.startsWith('(') || !body.endsWith(')')) return body

  let depth = 0
  for (let i = 0; i < body.length; i++) {
    if (body[i] === '(') depth++
    else if (body[i] === ')') depth--
    if (depth === 0 && i < body.length - 1) return body
  }
  return body.slice(1, -1).trim()
}

export function resolveMessage(message?: Message): string | undefined {
  return typeof message === 'function' ? message() : message
}

export function siteLocation(site?: SiteInfo): SourceLocation | undefined {
  if (site?.file === undefined || site.line === undefined) return undefined
  return { file: site.file, line: site.line }
}

/**
 * Only called once the condition is known to be false.
 */
export function createDiagnostic(condition: Condition, message?: Message, site?: SiteInfo): Diagnostic {
  const expression = renderCondition(condition, site)
  const resolvedMessage = resolveMessage(message) || undefined
  const location = siteLocation(site)

  return {
    expression,
    message: resolvedMessage,
    location,
    text: formatDiagnostic(expression, resolvedMessage),
  }
}
