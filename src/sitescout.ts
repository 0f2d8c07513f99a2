import { Runner, RunnerDependencies, createRunner } from './core/runner'
import { createCatalog, filterCatalog, loadCatalog } from './core/catalog'
import { validateConfig } from './core/config'
import type { Catalog, CatalogFile, Report, SiteScoutConfig } from './core/types'
import type { RunOptions } from './api'
import { createBrowserProbe, createBrowserSession } from './browser'
import { createLlmClassifier, createOpenAIClient } from './llm'
import { logger } from './logger'

/**
 * Examples:
 * ```ts
 * // Bundled site list against a local model
 * const report = await run({ config: { model: { baseUrl: 'http://localhost:11434/v1' } } })
 *
 * // Own catalog, progress as it goes
 * const report = await run({
 *   config,
 *   catalog: { Search: { Example: 'https://example.com' } },
 *   onSiteComplete: (category, result) => console.log(category, result.site.name, result.status),
 * })
 * ```
 */
export async function run(options: RunOptions): Promise<Report> {
  const config = validateConfig(options.config)
  const catalog = await resolveCatalog(options, config)
  const dependencies = createDependencies(config, options)

  const runner = createRunner(config, dependencies, { quiet: options.quiet })
  setupCallbacks(runner, options)

  const onAbort = () => {
    runner.stop().catch((error: unknown) => {
      logger.warn(`Failed to stop run cleanly: ${error instanceof Error ? error.message : String(error)}`)
    })
  }
  if (options.signal?.aborted) {
    onAbort()
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true })
  }

  try {
    return await runner.run(catalog)
  } finally {
    options.signal?.removeEventListener('abort', onAbort)
    if (dependencies.teardown) {
      await dependencies.teardown()
    }
  }
}

/**
 * Build the catalog a run would check, without running anything
 */
export async function resolveCatalog(
  options: Pick<RunOptions, 'catalog' | 'categories'>,
  config: Pick<SiteScoutConfig, 'catalog'>,
): Promise<Catalog> {
  let catalog: Catalog
  if (options.catalog && isCatalog(options.catalog)) {
    catalog = options.catalog
  } else if (options.catalog) {
    catalog = createCatalog(options.catalog)
  } else {
    catalog = await loadCatalog(config.catalog)
  }

  return options.categories && options.categories.length > 0 ? filterCatalog(catalog, options.categories) : catalog
}

function isCatalog(value: Catalog | CatalogFile): value is Catalog {
  return value instanceof Map
}

function createDependencies(config: SiteScoutConfig, options: RunOptions): RunnerDependencies {
  const classifier =
    options.classifier ??
    createLlmClassifier(createOpenAIClient(config.model), {
      model: config.model.name,
      temperature: config.model.temperature,
    })

  if (options.probe) {
    return { probe: options.probe, classifier }
  }

  const session = createBrowserSession({ headless: config.headless })
  return {
    probe: createBrowserProbe(session, { maxSignalLength: config.maxSignalLength }),
    classifier,
    teardown: () => session.close(),
  }
}

function setupCallbacks(runner: Runner, options: RunOptions): void {
  if (options.onStart) {
    runner.on('runStart', options.onStart)
  }

  if (options.onSiteStart) {
    runner.on('siteStart', options.onSiteStart)
  }

  if (options.onSiteComplete) {
    runner.on('siteComplete', options.onSiteComplete)
  }

  if (options.onProbeFailed) {
    runner.on('probeFailed', options.onProbeFailed)
  }

  if (options.onClassifyFailed) {
    runner.on('classifyFailed', options.onClassifyFailed)
  }

  if (options.onCategoryComplete) {
    runner.on('categoryComplete', options.onCategoryComplete)
  }

  if (options.onComplete) {
    runner.on('runComplete', options.onComplete)
  }
}
