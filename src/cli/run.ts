/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig, ConfigLoadError, ConfigValidationError } from '../core/config'
import { CatalogError } from '../core/catalog'
import { RunCancelledError } from '../core/errors'
import type { Report, Result, SiteScoutConfig, SiteSpec } from '../core/types'
import { CLIReporter, JSONReporter } from '../reporting'
import { resolveCatalog, run } from '../sitescout'
import { logger } from '../logger'
import type { BaseArgs, RunCommandArgs } from './types'

export const EXIT_FAILURE = 1
export const EXIT_CANCELLED = 130

export const runCommand: CommandModule<BaseArgs, RunCommandArgs> = {
  command: 'run',
  describe: 'Check every site in the catalog and write the status report',
  builder: (yargs) => {
    return yargs
      .option('category', {
        type: 'string',
        array: true,
        describe: 'Check only the named category (repeatable)',
      })
      .option('catalog', {
        type: 'string',
        describe: 'Path to a catalog JSON file',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        describe: 'Where to write the JSON report',
      })
      .option('concurrency', {
        type: 'number',
        describe: 'Sites checked at once within a category',
      })
      .option('timeout', {
        type: 'number',
        describe: 'Per-attempt page load timeout in milliseconds',
      })
      .example('$0 run', 'Check every site in the configured catalog')
      .example('$0 run --category "Search Engines"', 'Check a single category')
      .example('$0 run --output status.json --concurrency 10', 'Write elsewhere, with more tabs per category')
  },
  handler: async (argv) => {
    try {
      await runChecks(argv)
    } catch (error) {
      process.exit(reportFailure(error))
    }
  },
}

async function runChecks(args: RunCommandArgs): Promise<void> {
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: buildCliOverrides(args),
  })

  if (config.logFile) {
    logger.attachFile(config.logFile)
  }

  try {
    const catalog = await resolveCatalog({ categories: args.category }, config)

    const controller = new AbortController()
    const onSignal = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal}, stopping...`)
      controller.abort()
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)

    try {
      const report = await run({
        config,
        catalog,
        signal: controller.signal,
        quiet: args.quiet,
        ...createProgressHandlers(args.quiet),
      })

      await writeReport(report, config, args)
    } finally {
      process.removeListener('SIGINT', onSignal)
      process.removeListener('SIGTERM', onSignal)
    }
  } finally {
    await logger.close()
  }
}

/**
 * CLI flags become the highest-precedence configuration layer
 */
function buildCliOverrides(args: RunCommandArgs): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}

  if (args.catalog !== undefined) overrides.catalog = args.catalog
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency
  if (args.timeout !== undefined) overrides.timeout = args.timeout
  if (args.output !== undefined) overrides.output = { file: args.output }

  return overrides
}

async function writeReport(report: Report, config: SiteScoutConfig, args: RunCommandArgs): Promise<void> {
  const reporter = new JSONReporter({ includeNotes: config.output.includeNotes })
  await reporter.writeFile(report, config.output.file)
  logger.info(`Results saved to ${config.output.file}`)

  if (args.quiet) {
    // In quiet mode, just output the JSON report
    console.log(reporter.generate(report))
  } else {
    new CLIReporter({ showNotes: args.verbose }).print(report)
  }
}

function createProgressHandlers(quiet?: boolean) {
  if (quiet) return {}

  return {
    onSiteComplete: (category: string, result: Result) => {
      const marker = result.status === 'UP' ? '✅' : '❌'
      const detail = result.error !== null ? ` (${result.error})` : ''
      logger.info(`${marker} [${category}] ${result.site.name}: ${result.status}${detail}`)
    },
    onProbeFailed: (site: SiteSpec, error: Error, attempt: number, willRetry: boolean) => {
      if (willRetry) {
        logger.warn(`🔄 Retrying ${site.name} after attempt ${attempt}: ${error.message}`)
      }
    },
    onClassifyFailed: (site: SiteSpec, error: Error, attempt: number, willRetry: boolean) => {
      if (willRetry) {
        logger.warn(`🔄 Asking the model again about ${site.name} after attempt ${attempt}: ${error.message}`)
      }
    },
  }
}

/**
 * Log why the run ended early and pick the exit code
 */
export function reportFailure(error: unknown): number {
  if (error instanceof RunCancelledError) {
    logger.warn(`${error.message}; no report written`)
    return EXIT_CANCELLED
  }

  if (error instanceof ConfigLoadError) {
    logger.error(`❌ Failed to load configuration: ${error.message}`)
  } else if (error instanceof ConfigValidationError) {
    logger.error(`❌ Configuration validation failed:\n${error.getErrorSummary()}`)
  } else if (error instanceof CatalogError) {
    logger.error(`❌ ${error.message}`)
  } else {
    logger.error('❌ Run failed:', error)
  }

  return EXIT_FAILURE
}
