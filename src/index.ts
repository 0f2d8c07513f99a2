export { run, resolveCatalog } from './sitescout'
export type { RunOptions } from './api'
export * from './core'
export * from './browser'
export * from './llm'
export * from './reporting'
export { logger, Logger, type LogLevel } from './logger'
