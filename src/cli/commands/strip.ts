/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { parseLevel } from '../../core/types/level'
import { formatLocation } from '../../assertions/diagnostic'
import { stripFiles } from '../../elision/files'
import { logger } from '../../logger'
import { exitWithError } from '../errors'
import type { BaseArgs, StripArgs } from '../types'

export const stripCommand: CommandModule<BaseArgs, StripArgs> = {
  command: 'strip <paths..>',
  describe: 'Remove assertions below the threshold from TypeScript sources',
  builder: (yargs) => {
    return yargs
      .positional('paths', {
        type: 'string',
        array: true,
        demandOption: true,
        describe: 'Files or directories to process',
      })
      .option('level', {
        alias: 'l',
        type: 'string',
        describe: 'Threshold to compile against (Warning, Error, NoAssertions)',
      })
      .option('out-dir', {
        alias: 'o',
        type: 'string',
        describe: 'Directory to write the rewritten sources to',
      })
      .option('report', {
        type: 'boolean',
        default: false,
        describe: 'Print one line per assertion site',
      })
      .example('$0 strip src', 'Rewrite src/ into the configured outDir')
      .example('$0 strip src --level Error -o build/src', 'Keep only Error-level assertions')
  },
  handler: async (argv) => {
    try {
      await runStrip(argv)
    } catch (error) {
      exitWithError(error)
    }
  },
}

async function runStrip(args: StripArgs): Promise<void> {
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: {
      level: args.level === undefined ? undefined : parseLevel(args.level),
      outDir: args.outDir,
    },
  })

  logger.debug(`Stripping with threshold ${config.level} into ${config.outDir}`)

  const summary = await stripFiles({
    paths: args.paths,
    outDir: config.outDir,
    threshold: config.level,
    calleeNames: config.calleeNames,
    levelNames: config.levelNames,
  })

  if (args.report) {
    for (const site of summary.sites) {
      console.log(`${formatLocation(site)} ${site.level} ${site.status}`)
    }
  }

  if (!args.quiet) {
    logger.info(
      `Processed ${summary.files.length} files: ${summary.compiled} compiled, ${summary.elided} elided, ${summary.dynamic} dynamic`,
    )
  }
}
