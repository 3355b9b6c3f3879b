import { readFile } from 'node:fs/promises'
import { dirname, relative, sep } from 'node:path'
import type { OnLoadResult, Plugin } from 'esbuild'
import { logger } from '../logger'
import { StripOptions, transpileWithElision } from './strip'

export type ElisionPluginOptions = Omit<StripOptions, 'fileName'> & {
  /** Base for the file names written into site metadata */
  cwd?: string
}

const SOURCE_FILTER = /\.[cm]?tsx?$/

/**
 * Loads one file for esbuild with elision applied. Declaration files and
 * anything under node_modules are left to esbuild.
 */
export async function loadWithElision(path: string, options: ElisionPluginOptions): Promise<OnLoadResult | undefined> {
  if (path.endsWith('.d.ts') || path.split(sep).includes('node_modules')) {
    return undefined
  }

  const { cwd = process.cwd(), ...stripOptions } = options
  const text = await readFile(path, 'utf-8')
  const fileName = relative(cwd, path).split(sep).join('/')
  const { code, sites } = transpileWithElision(
    text,
    fileName,
    { ...stripOptions, fileName },
    { inlineSourceMap: true, inlineSources: true },
  )

  if (sites.length > 0) {
    const elided = sites.filter((site) => site.status === 'elided').length
    logger.debug(`${fileName}: ${sites.length} assertion sites, ${elided} elided`)
  }

  return {
    contents: code,
    loader: path.endsWith('x') ? 'jsx' : 'js',
    resolveDir: dirname(path),
  }
}

/**
 * esbuild (and tsup) plugin that removes assertions below the threshold
 * before bundling.
 *
 * ```ts
 * esbuildPlugins: [tripwireEsbuildPlugin({ threshold: parseLevel(process.env.TRIPWIRE_LEVEL) })]
 * ```
 */
export function tripwireEsbuildPlugin(options: ElisionPluginOptions): Plugin {
  return {
    name: 'tripwire-elision',
    setup(build) {
      build.onLoad({ filter: SOURCE_FILTER }, (args) => loadWithElision(args.path, options))
    },
  }
}
