import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises'
import { dirname, join, relative, resolve, sep } from 'node:path'
import type { SiteReport } from '../core/types/site'
import { logger } from '../logger'
import { StripOptions, stripSource } from './strip'

export interface StripFilesOptions extends Omit<StripOptions, 'fileName'> {
  paths: string[]
  outDir: string
  cwd?: string
}

export interface StripFilesSummary {
  files: string[]
  sites: SiteReport[]
  compiled: number
  elided: number
  dynamic: number
}

function isSourceFile(path: string): boolean {
  return /\.[cm]?tsx?$/.test(path) && !/\.d\.[cm]?ts$/.test(path)
}

function isWithin(path: string, dir: string): boolean {
  return path === dir || path.startsWith(dir + sep)
}

/**
 * Expands directories into the TypeScript files below them, skipping
 * node_modules and anything under `exclude`. Results are absolute and sorted.
 */
export async function collectSourceFiles(
  paths: string[],
  cwd: string = process.cwd(),
  exclude: string[] = [],
): Promise<string[]> {
  const found = new Set<string>()
  const excluded = exclude.map((dir) => resolve(cwd, dir))

  const walk = async (path: string): Promise<void> => {
    if (excluded.some((dir) => isWithin(path, dir))) return

    const info = await stat(path)
    if (info.isDirectory()) {
      const entries = await readdir(path)
      for (const entry of entries) {
        if (entry === 'node_modules') continue
        await walk(join(path, entry))
      }
    } else if (isSourceFile(path)) {
      found.add(path)
    }
  }

  for (const path of paths) {
    await walk(resolve(cwd, path))
  }

  return [...found].sort()
}

/**
 * Rewrites each file into `outDir`, keeping its path relative to `cwd`.
 */
export async function stripFiles(options: StripFilesOptions): Promise<StripFilesSummary> {
  const { paths, outDir, cwd = process.cwd(), ...stripOptions } = options
  const outRoot = resolve(cwd, outDir)
  // Earlier output must not be fed back in
  const files = await collectSourceFiles(paths, cwd, [outRoot])
  const sites: SiteReport[] = []

  for (const file of files) {
    const fileName = relative(cwd, file).split(sep).join('/')
    if (fileName.startsWith('../')) {
      throw new Error(`${file} is outside ${cwd}`)
    }
    const text = await readFile(file, 'utf-8')
    const result = stripSource(text, fileName, { ...stripOptions, fileName })

    const target = join(outRoot, relative(cwd, file))
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, result.code)

    logger.debug(`${fileName} -> ${relative(cwd, target)} (${result.sites.length} sites)`)
    sites.push(...result.sites)
  }

  return {
    files: files.map((file) => relative(cwd, file).split(sep).join('/')),
    sites,
    compiled: sites.filter((site) => site.status === 'compiled').length,
    elided: sites.filter((site) => site.status === 'elided').length,
    dynamic: sites.filter((site) => site.status === 'dynamic').length,
  }
}
