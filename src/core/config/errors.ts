import type { ZodIssue } from 'zod'
import { formatIssues, issuePaths } from '../utils/format-issues'

/**
 * The merged configuration does not satisfy the SiteScout schema; nothing
 * has been launched yet
 */
export class ConfigValidationError extends Error {
  constructor(public readonly validationErrors: readonly ZodIssue[]) {
    super(`Configuration validation failed: ${issuePaths(validationErrors).join(', ')}`)
    this.name = 'ConfigValidationError'
  }

  /** Config keys that failed, e.g. `model.baseUrl` */
  get invalidKeys(): string[] {
    return issuePaths(this.validationErrors)
  }

  getErrorSummary(): string {
    return formatIssues(this.validationErrors)
  }
}

export type ConfigSource = 'file' | 'environment'

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly source: ConfigSource,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}
