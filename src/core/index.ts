/**
 * Core module - types, configuration, catalog handling and the check pipeline
 * Has no knowledge of browsers or models; those come in through the probe and
 * classifier interfaces
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './catalog'
export { AdmissionPool, AdmissionCancelledError } from './admission-pool'
export { SiteChecker, createSiteChecker, type SiteCheckerConfig, type SiteCheckerEvents } from './checker'
export { CategoryScheduler, createScheduler, type SiteCheck, type SchedulerStatus, type SchedulerEvents } from './scheduler'
export {
  Runner,
  createRunner,
  type RunnerConfig,
  type RunnerDependencies,
  type RunnerEvents,
  type RunnerOptions,
} from './runner'
export { createReport, summarizeReport } from './utils/create-report'
export { formatTimestamp } from './utils/format-timestamp'
