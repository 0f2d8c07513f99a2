import { Catalog, CategoryResult, Report, Result, RunStats } from '../types'

/**
 * Assemble the immutable run report. Categories and sites follow catalog
 * order; a site without a recorded result is reported as ERROR rather than
 * dropped.
 */
export function createReport(
  timestamp: string,
  catalog: Catalog,
  results: ReadonlyMap<string, CategoryResult>,
): Report {
  const categories = new Map<string, CategoryResult>()

  catalog.forEach((sites, category) => {
    const recorded = results.get(category)
    const ordered = new Map<string, Result>()

    for (const site of sites) {
      const result = recorded?.get(site.name)
      if (result) {
        ordered.set(site.name, result)
      } else {
        const missing: Result = { site, status: 'ERROR', error: 'no result recorded' }
        ordered.set(site.name, Object.freeze(missing))
      }
    }

    categories.set(category, ordered)
  })

  return Object.freeze({ timestamp, categories })
}

export function summarizeReport(report: Report): RunStats {
  const stats: RunStats = { total: 0, up: 0, down: 0, unknown: 0, error: 0 }

  report.categories.forEach((results) => {
    results.forEach((result) => {
      stats.total++
      switch (result.status) {
        case 'UP':
          stats.up++
          break
        case 'DOWN':
          stats.down++
          break
        case 'UNKNOWN':
          stats.unknown++
          break
        case 'ERROR':
          stats.error++
          break
      }
    })
  })

  return stats
}
