import ts from 'typescript'
import { Level, SiteLevel, isActive, isLevel } from '../core/types/level'
import type { SiteReport, SourceLocation } from '../core/types/site'
import { AssertionSiteError } from '../core/errors'

export const DEFAULT_CALLEE_NAMES = ['assert'] as const
export const DEFAULT_LEVEL_NAMES = ['Level'] as const

export interface ElisionOptions {
  threshold: Level
  /** Identifiers treated as the assertion function */
  calleeNames?: readonly string[]
  /** Identifiers holding the level constants, as in `Level.Error` */
  levelNames?: readonly string[]
  /** File name recorded in site metadata; defaults to the source file's */
  fileName?: string
  onSite?: (report: SiteReport) => void
}

interface MatchedSite {
  call: ts.CallExpression
  level?: SiteLevel
  location: SourceLocation
}

/**
 * Removes assertion calls below the threshold and prepares the rest for
 * lazy evaluation.
 *
 * For a call `assert(Level.X, cond, message?)` with a statically known level:
 * - inactive: the call is deleted, along with its arguments
 * - active: a `message` that does work (a call, a template with
 *   substitutions) becomes a thunk, and a site object carrying the condition
 *   text and location is appended. `cond` is kept as written, whether it is
 *   a boolean expression or a function.
 *
 * Calls whose level is computed at run time are left alone.
 */
export function createElisionTransformer(options: ElisionOptions): ts.TransformerFactory<ts.SourceFile> {
  const calleeNames = new Set<string>(options.calleeNames ?? DEFAULT_CALLEE_NAMES)
  const levelNames = new Set<string>(options.levelNames ?? DEFAULT_LEVEL_NAMES)

  return (context) => (sourceFile) => {
    const { factory } = context
    const file = options.fileName ?? sourceFile.fileName

    const report = (site: MatchedSite, status: SiteReport['status']): void => {
      options.onSite?.({ ...site.location, level: site.level ?? 'unknown', status })
    }

    const match = (node: ts.Node): MatchedSite | undefined => {
      if (!ts.isCallExpression(node) || !ts.isIdentifier(node.expression)) return undefined
      if (!calleeNames.has(node.expression.text)) return undefined

      const [levelArg, conditionArg] = node.arguments
      if (!levelArg || !conditionArg) return undefined

      const { line } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile))
      const location = { file, line: line + 1 }
      const level = staticLevel(levelArg, levelNames)

      if (level === Level.NoAssertions) {
        throw new AssertionSiteError('NoAssertions cannot be used as an assertion level', location)
      }
      return { call: node, level, location }
    }

    const isElided = (site: MatchedSite): boolean =>
      site.level !== undefined && !isActive(site.level, options.threshold)

    const visitArg = (node: ts.Expression): ts.Expression => ts.visitNode(node, visitor(false), ts.isExpression) ?? node

    // A message that costs nothing to pass is left as written: literals,
    // references (which may hold a string or a factory) and function literals.
    // Anything else is deferred until the check has failed.
    const messageArg = (node: ts.Expression): ts.Expression => {
      const inner = unwrapParens(node)
      if (ts.isStringLiteralLike(inner) || isReference(inner) || isFunctionLiteral(inner)) {
        return visitArg(node)
      }
      return factory.createArrowFunction(
        undefined,
        undefined,
        [],
        undefined,
        factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
        visitArg(node),
      )
    }

    const siteLiteral = (expression: string, location: SourceLocation): ts.ObjectLiteralExpression =>
      factory.createObjectLiteralExpression([
        factory.createPropertyAssignment('expression', factory.createStringLiteral(expression)),
        factory.createPropertyAssignment('file', factory.createStringLiteral(location.file)),
        factory.createPropertyAssignment('line', factory.createNumericLiteral(location.line)),
        factory.createPropertyAssignment('compiled', factory.createTrue()),
      ])

    const compile = ({ call, location }: MatchedSite): ts.CallExpression => {
      const [levelArg, conditionArg, message, site, ...rest] = call.arguments
      if (!levelArg || !conditionArg) return call

      const args: ts.Expression[] = [
        visitArg(levelArg),
        visitArg(conditionArg),
        message ? messageArg(message) : factory.createVoidZero(),
        site ? visitArg(site) : siteLiteral(conditionText(conditionArg, sourceFile), location),
        ...rest.map(visitArg),
      ]
      return factory.updateCallExpression(call, call.expression, call.typeArguments, args)
    }

    function visitor(inStatementList: boolean): ts.Visitor {
      return (node) => {
        if (ts.isExpressionStatement(node)) {
          const site = match(node.expression)
          if (site && isElided(site)) {
            report(site, 'elided')
            // An unbraced `if` body still needs a statement
            return inStatementList ? undefined : factory.createEmptyStatement()
          }
        }

        const site = match(node)
        if (site) {
          if (site.level === undefined) {
            report(site, 'dynamic')
          } else if (isElided(site)) {
            report(site, 'elided')
            return factory.createVoidZero()
          } else {
            report(site, 'compiled')
            return compile(site)
          }
        }

        return ts.visitEachChild(node, visitor(holdsStatementList(node)), context)
      }
    }

    return ts.visitEachChild(sourceFile, visitor(true), context)
  }
}

function holdsStatementList(node: ts.Node): boolean {
  return ts.isBlock(node) || ts.isSourceFile(node) || ts.isModuleBlock(node) || ts.isCaseOrDefaultClause(node)
}

function isReference(node: ts.Expression): boolean {
  return (
    ts.isIdentifier(node) ||
    node.kind === ts.SyntaxKind.ThisKeyword ||
    (ts.isPropertyAccessExpression(node) && isReference(node.expression)) ||
    (ts.isElementAccessExpression(node) && ts.isLiteralExpression(node.argumentExpression) && isReference(node.expression))
  )
}

function unwrapParens(node: ts.Expression): ts.Expression {
  return ts.isParenthesizedExpression(node) ? unwrapParens(node.expression) : node
}

function isFunctionLiteral(node: ts.Expression): boolean {
  return ts.isArrowFunction(node) || ts.isFunctionExpression(node)
}

function staticLevel(node: ts.Expression, levelNames: Set<string>): Level | undefined {
  if (ts.isPropertyAccessExpression(node) && ts.isIdentifier(node.expression) && levelNames.has(node.expression.text)) {
    return isLevel(node.name.text) ? node.name.text : undefined
  }
  if (ts.isStringLiteralLike(node)) {
    return isLevel(node.text) ? node.text : undefined
  }
  return undefined
}

/**
 * Source text of the condition as it should read in a diagnostic. For an
 * expression-bodied arrow this is the body.
 */
export function conditionText(node: ts.Expression, sourceFile: ts.SourceFile): string {
  const inner = unwrapParens(node)
  let target: ts.Node = inner
  if (ts.isArrowFunction(inner) && !ts.isBlock(inner.body)) {
    target = unwrapParens(inner.body)
  }
  return target.getText(sourceFile).replace(/\s*\n\s*/g, ' ')
}
