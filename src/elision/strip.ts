import ts from 'typescript'
import type { SiteReport } from '../core/types/site'
import { ElisionOptions, createElisionTransformer } from './transformer'

export type StripOptions = Omit<ElisionOptions, 'onSite'>

export interface StripResult {
  code: string
  sites: SiteReport[]
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  return fileName.endsWith('.tsx') ? ts.ScriptKind.TSX : ts.ScriptKind.TS
}

function needsRewrite(sites: SiteReport[]): boolean {
  return sites.some((site) => site.status !== 'dynamic')
}

/**
 * Applies elision to TypeScript source and prints TypeScript back out.
 * Files with nothing to rewrite are returned as they were.
 */
export function stripSource(text: string, fileName: string, options: StripOptions): StripResult {
  const sites: SiteReport[] = []
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKindFor(fileName))
  const result = ts.transform(sourceFile, [createElisionTransformer({ ...options, onSite: (site) => sites.push(site) })])

  try {
    const [transformed] = result.transformed
    if (!transformed || !needsRewrite(sites)) {
      return { code: text, sites }
    }
    const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed })
    return { code: printer.printFile(transformed), sites }
  } finally {
    result.dispose()
  }
}

/**
 * Applies elision while transpiling to JavaScript.
 */
export function transpileWithElision(
  text: string,
  fileName: string,
  options: StripOptions,
  compilerOptions: ts.CompilerOptions = {},
): StripResult {
  const sites: SiteReport[] = []
  const output = ts.transpileModule(text, {
    fileName,
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      jsx: ts.JsxEmit.Preserve,
      ...compilerOptions,
    },
    transformers: {
      before: [createElisionTransformer({ ...options, onSite: (site) => sites.push(site) })],
    },
  })
  return { code: output.outputText, sites }
}
