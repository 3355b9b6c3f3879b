import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { getSettings } from '../core/settings'
import { logger } from '../logger'
import { exitWithError } from './errors'
import { printConfigCommand } from './print-config'
import { stripCommand } from './commands/strip'

export function createCli() {
  return yargs(hideBin(process.argv))
    .scriptName('tripwire')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .middleware((argv) => {
      if (argv.verbose) {
        logger.setLevel('debug')
      } else if (argv.quiet) {
        logger.setLevel('warn')
      }
    })
    .command(printConfigCommand)
    .command(stripCommand)
    .demandCommand(1, 'You need to specify a command')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  const cli = createCli()

  if (argv) {
    return cli.parse(argv)
  }

  return cli.argv
}

/**
 * Process entry point. Reads the process-wide assertion settings before any
 * command runs, so a bad `TRIPWIRE_LEVEL` stops the process at startup.
 */
export async function main(argv?: string[]): Promise<void> {
  try {
    const settings = getSettings()
    logger.debug(`Assertion threshold: ${settings.level}${settings.quitOnAssert ? ' (quit on assert)' : ''}`)
    await runCli(argv)
  } catch (error) {
    exitWithError(error)
  }
}
