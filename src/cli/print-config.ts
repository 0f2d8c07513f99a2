/* eslint-disable no-console */

import { ConfigLoadError, ConfigValidationError } from '../core/config/errors'
import { countSites, defaultCatalogPath, loadCatalog, loadConfig } from '../core'
import type { SiteScoutConfig } from '../core'
import type { BaseArgs, PrintConfigArgs } from './types'
import type { CommandModule } from 'yargs'

const REDACTED = '<redacted>'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'] as const,
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadConfig({
        cwd: process.cwd(),
        configPath: argv.config,
      })

      const catalogPath = config.catalog ?? defaultCatalogPath()
      let resolvedCatalog: Record<string, number> | undefined
      try {
        const catalog = await loadCatalog(catalogPath)
        resolvedCatalog = {}
        for (const [category, sites] of catalog) {
          resolvedCatalog[category] = sites.length
        }
        if (!argv.quiet) {
          console.error(`Catalog ${catalogPath}: ${countSites(catalog)} site(s) in ${catalog.size} categories`)
        }
      } catch (error) {
        console.error(`❌ Failed to load catalog "${catalogPath}":`, error instanceof Error ? error.message : error)
      }

      const output = {
        ...redactSecrets(config),
        _resolvedCatalog: resolvedCatalog,
      }

      console.log(JSON.stringify(output, null, 2))

      if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        console.error('❌ Failed to load configuration:')
        console.error(error.message)
        process.exit(1)
      } else if (error instanceof ConfigValidationError) {
        console.error('❌ Configuration validation failed:')
        console.error(error.getErrorSummary())
        process.exit(1)
      } else {
        console.error('❌ Unexpected error:', error)
        process.exit(1)
      }
    }
  },
}

function redactSecrets(config: SiteScoutConfig): SiteScoutConfig {
  return {
    ...config,
    model: { ...config.model, apiKey: REDACTED },
  }
}
