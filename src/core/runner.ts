import { EventEmitter } from 'events'
import {
  Catalog,
  CategoryResult,
  ObservationProbe,
  Report,
  Result,
  SiteScoutConfig,
  SiteSpec,
  VerdictClassifier,
} from './types'
import { AdmissionCancelledError, AdmissionPool } from './admission-pool'
import { SiteChecker, createSiteChecker } from './checker'
import { CategoryScheduler, createScheduler } from './scheduler'
import { assertRunnableCatalog, countSites } from './catalog'
import { RunCancelledError, ClassifyError, ProbeError } from './errors'
import { formatTimestamp } from './utils/format-timestamp'
import { createReport } from './utils/create-report'
import { logger } from '../logger'

export interface RunnerEvents {
  runStart: (siteCount: number, categoryCount: number) => void
  categoryStart: (category: string, siteCount: number) => void
  siteStart: (category: string, site: SiteSpec) => void
  siteComplete: (category: string, result: Result) => void
  probeFailed: (site: SiteSpec, error: ProbeError, attempt: number, willRetry: boolean) => void
  classifyFailed: (site: SiteSpec, error: ClassifyError, attempt: number, willRetry: boolean) => void
  categoryComplete: (category: string, results: CategoryResult) => void
  runComplete: (report: Report) => void
  runError: (error: Error) => void
}

export type RunnerConfig = Pick<
  SiteScoutConfig,
  'concurrency' | 'categoryConcurrency' | 'timeout' | 'probeAttempts' | 'classifyAttempts'
>

export interface RunnerDependencies {
  probe: ObservationProbe
  classifier: VerdictClassifier
  /** Called by stop() once in-flight work has been told to abort */
  teardown?: () => Promise<void>
  /** Clock used for the report timestamp */
  now?: () => Date
}

export interface RunnerOptions {
  quiet?: boolean
}

/**
 * Orchestrates a run: one category scheduler per category, categories
 * admitted through an outer pool, and a single report at the end.
 *
 * A runner can run again once a run has finished. stop() is final: it tears
 * down the browser the probes depend on, so every later run() rejects with
 * RunCancelledError before checking anything.
 */
export class Runner extends EventEmitter {
  private checker: SiteChecker
  private scheduler: CategoryScheduler
  private controller = new AbortController()
  private config: RunnerConfig
  private teardown?: () => Promise<void>
  private now: () => Date
  private quiet: boolean
  private running = false

  constructor(config: RunnerConfig, dependencies: RunnerDependencies, options: RunnerOptions = {}) {
    super()
    this.config = config
    this.teardown = dependencies.teardown
    this.now = dependencies.now ?? (() => new Date())
    this.quiet = options.quiet ?? false

    this.checker = createSiteChecker(dependencies.probe, dependencies.classifier, {
      timeout: config.timeout,
      probeAttempts: config.probeAttempts,
      classifyAttempts: config.classifyAttempts,
    })

    this.scheduler = createScheduler((site, signal) => this.checker.check(site, signal))

    this.setupEventForwarding()
  }

  /**
   * Check every site in the catalog. Resolves with the full report, or
   * rejects with RunCancelledError if stop() was called first.
   */
  async run(catalog: Catalog): Promise<Report> {
    if (this.running) {
      throw new Error('Runner is already running')
    }

    // configuration problems surface before any check is dispatched
    assertRunnableCatalog(catalog)

    this.running = true
    const signal = this.controller.signal

    try {
      const timestamp = formatTimestamp(this.now())
      const siteCount = countSites(catalog)

      if (!this.quiet) {
        logger.info(`Checking ${siteCount} site(s) across ${catalog.size} categor${catalog.size === 1 ? 'y' : 'ies'}`)
      }
      this.emit('runStart', siteCount, catalog.size)

      const categoryPool = new AdmissionPool(this.config.categoryConcurrency)
      const completed = new Map<string, CategoryResult>()

      await Promise.all(
        Array.from(catalog.entries()).map(async ([category, sites]) => {
          try {
            await categoryPool.acquire(signal)
          } catch (error) {
            if (error instanceof AdmissionCancelledError) return
            throw error
          }

          try {
            if (signal.aborted) return
            const results = await this.runCategory(category, sites, signal)
            if (!signal.aborted) {
              completed.set(category, results)
            }
          } finally {
            categoryPool.release()
          }
        }),
      )

      if (signal.aborted) {
        throw new RunCancelledError(completed.size)
      }

      const report = createReport(timestamp, catalog, completed)

      if (!this.quiet) {
        logger.info(`Run complete: ${siteCount} site(s) checked`)
      }
      this.emit('runComplete', report)

      return report
    } catch (error) {
      const runError = error instanceof Error ? error : new Error(String(error))
      if (runError instanceof RunCancelledError) {
        logger.warn(runError.message)
      } else {
        logger.error('Run failed:', runError)
      }
      this.emit('runError', runError)
      throw runError
    } finally {
      this.running = false
    }
  }

  /**
   * Abort the run: queued checks are never admitted, in-flight probes close
   * their tabs, and the browser is torn down.
   */
  async stop(): Promise<void> {
    this.controller.abort()
    if (this.teardown) {
      await this.teardown()
    }
  }

  isStopped(): boolean {
    return this.controller.signal.aborted
  }

  getStatus() {
    return {
      isRunning: this.running,
      categories: this.scheduler.getStatus(),
    }
  }

  private async runCategory(category: string, sites: readonly SiteSpec[], signal: AbortSignal): Promise<CategoryResult> {
    if (!this.quiet) {
      logger.info(`Starting category: ${category} (${sites.length} site(s))`)
    }
    this.emit('categoryStart', category, sites.length)

    const results = await this.scheduler.runCategory(category, sites, this.config.concurrency, signal)

    if (!signal.aborted) {
      if (!this.quiet) {
        logger.info(`Completed category: ${category}`)
      }
      this.emit('categoryComplete', category, results)
    }

    return results
  }

  private setupEventForwarding(): void {
    this.scheduler.on('siteStart', (category: string, site: SiteSpec) => {
      this.emit('siteStart', category, site)
    })

    this.scheduler.on('siteComplete', (category: string, result: Result) => {
      this.emit('siteComplete', category, result)
    })

    this.checker.on('probeFailed', (site: SiteSpec, error: ProbeError, attempt: number, willRetry: boolean) => {
      this.emit('probeFailed', site, error, attempt, willRetry)
    })

    this.checker.on('classifyFailed', (site: SiteSpec, error: ClassifyError, attempt: number, willRetry: boolean) => {
      this.emit('classifyFailed', site, error, attempt, willRetry)
    })
  }
}

export function createRunner(config: RunnerConfig, dependencies: RunnerDependencies, options?: RunnerOptions): Runner {
  return new Runner(config, dependencies, options)
}
