import { EventEmitter } from 'events'
import { CategoryResult, Result, SiteSpec } from './types'
import { AdmissionCancelledError, AdmissionPool } from './admission-pool'
import { logger } from '../logger'

export interface SchedulerEvents {
  siteStart: (category: string, site: SiteSpec) => void
  siteComplete: (category: string, result: Result) => void
}

/**
 * The unit of work the scheduler admits; SiteChecker.check fits this shape.
 */
export type SiteCheck = (site: SiteSpec, signal?: AbortSignal) => Promise<Result>

export interface SchedulerStatus {
  inFlight: number
  queued: number
  completed: number
}

/**
 * Runs every site check of one category, admitting at most `concurrencyLimit`
 * at a time. Each check hands back its Result; results are gathered here and
 * turned into the category's mapping once all of them have settled.
 */
export class CategoryScheduler extends EventEmitter {
  private statuses = new Map<string, SchedulerStatus>()

  constructor(private readonly check: SiteCheck) {
    super()
  }

  /**
   * Live counters for the categories currently running
   */
  getStatus(): Record<string, SchedulerStatus> {
    const snapshot: Record<string, SchedulerStatus> = {}
    this.statuses.forEach((status, category) => {
      snapshot[category] = { ...status }
    })
    return snapshot
  }

  /**
   * Resolves once every admitted check has finished. After `signal` aborts no
   * further site is admitted and the returned mapping holds only the sites
   * that were checked.
   */
  async runCategory(
    category: string,
    sites: readonly SiteSpec[],
    concurrencyLimit: number,
    signal?: AbortSignal,
  ): Promise<CategoryResult> {
    const pool = new AdmissionPool(concurrencyLimit)
    const status: SchedulerStatus = { inFlight: 0, queued: sites.length, completed: 0 }
    this.statuses.set(category, status)

    logger.debug(`Scheduling ${sites.length} site(s) in "${category}" with ${concurrencyLimit} slot(s)`)

    let settled: Array<Result | undefined>
    try {
      settled = await Promise.all(sites.map((site) => this.admit(pool, status, category, site, signal)))
    } finally {
      this.statuses.delete(category)
    }

    const results = new Map<string, Result>()
    for (const result of settled) {
      if (result) {
        results.set(result.site.name, result)
      }
    }

    return results
  }

  private async admit(
    pool: AdmissionPool,
    status: SchedulerStatus,
    category: string,
    site: SiteSpec,
    signal?: AbortSignal,
  ): Promise<Result | undefined> {
    try {
      await pool.acquire(signal)
    } catch (error) {
      if (error instanceof AdmissionCancelledError) {
        status.queued--
        return undefined
      }
      throw error
    }

    status.queued--
    status.inFlight++

    try {
      this.emit('siteStart', category, site)
      const result = await this.runCheck(site, signal)
      status.completed++
      this.emit('siteComplete', category, result)
      return result
    } finally {
      status.inFlight--
      pool.release()
    }
  }

  private async runCheck(site: SiteSpec, signal?: AbortSignal): Promise<Result> {
    try {
      return await this.check(site, signal)
    } catch (error) {
      // checks are meant to contain their own failures
      const message = error instanceof Error ? error.message : String(error)
      logger.error(`Unexpected error checking ${site.name}: ${message}`)
      const result: Result = { site, status: 'ERROR', error: message }
      return Object.freeze(result)
    }
  }
}

export function createScheduler(check: SiteCheck): CategoryScheduler {
  return new CategoryScheduler(check)
}
