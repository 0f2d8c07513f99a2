import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { CONFIG_FILENAMES } from '../core/config'
import { logger } from '../logger'
import { printConfigCommand } from './print-config'
import { runCommand } from './run'
import type { BaseArgs } from './types'

const ENV_HELP = [
  'Configuration is read from defaults, then the config file, then SITESCOUT_* environment',
  'variables (SITESCOUT_MODEL_BASE_URL, SITESCOUT_CONCURRENCY, ...), then command-line flags.',
  'A .env file in the working directory is loaded first.',
].join('\n')

/**
 * --verbose and --quiet apply to every command, before its handler runs
 */
export function configureLogging(args: BaseArgs): void {
  if (args.verbose) {
    logger.setLevel('debug')
  } else if (args.quiet) {
    logger.setLevel('warn')
  }
}

export function createCli() {
  return yargs(hideBin(process.argv))
    .scriptName('sitescout')
    .usage('$0 <command> [options]\n\nCheck whether websites are up with Chrome and a language model')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: `Path to configuration file (default: ${CONFIG_FILENAMES.join(', ')} in the working directory)`,
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Log every probe and model call, and show model notes in the summary',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Only print the JSON report',
      global: true,
    })
    .conflicts('verbose', 'quiet')
    .middleware(configureLogging)
    .command(runCommand)
    .command(printConfigCommand)
    .demandCommand(1, 'You need to specify a command')
    .epilogue(ENV_HELP)
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
