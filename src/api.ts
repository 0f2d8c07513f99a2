/**
 * Basic usage:
 * ```ts
 * import { run } from 'sitescout'
 *
 * const report = await run({
 *   config: { model: { baseUrl: 'http://localhost:11434/v1' } },
 *   categories: ['Search Engines'],
 * })
 * ```
 */

import type {
  Catalog,
  CatalogFile,
  CategoryResult,
  ObservationProbe,
  Report,
  Result,
  SiteScoutConfig,
  SiteScoutConfigInput,
  SiteSpec,
  VerdictClassifier,
} from './core/types'
import type { ClassifyError, ProbeError } from './core/errors'

export interface RunOptions {
  /** Configuration, validated and completed with defaults before the run */
  config: SiteScoutConfigInput | SiteScoutConfig

  /**
   * Sites to check. Either a built catalog or the raw file shape; when left
   * out, the file named by `config.catalog` (or the bundled list) is loaded.
   */
  catalog?: Catalog | CatalogFile

  /** Only check these categories */
  categories?: string[]

  /** Replace the browser-backed probe, e.g. with a stub */
  probe?: ObservationProbe

  /** Replace the model-backed classifier */
  classifier?: VerdictClassifier

  /** Aborting this signal cancels the run */
  signal?: AbortSignal

  /** Progress callbacks */
  onStart?: (siteCount: number, categoryCount: number) => void
  onSiteStart?: (category: string, site: SiteSpec) => void
  onSiteComplete?: (category: string, result: Result) => void
  onProbeFailed?: (site: SiteSpec, error: ProbeError, attempt: number, willRetry: boolean) => void
  onClassifyFailed?: (site: SiteSpec, error: ClassifyError, attempt: number, willRetry: boolean) => void
  onCategoryComplete?: (category: string, results: CategoryResult) => void
  onComplete?: (report: Report) => void

  /** Suppress non-essential output */
  quiet?: boolean
}
