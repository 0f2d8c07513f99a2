import type { ZodIssue } from 'zod'

/**
 * One `path: message` line per zod issue, for config and catalog errors alike
 */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.map(String).join('.')
      return `${path ? `${path}: ` : ''}${issue.message}`
    })
    .join('\n')
}

/**
 * Dot paths of the keys that failed, each listed once
 */
export function issuePaths(issues: readonly ZodIssue[]): string[] {
  return Array.from(new Set(issues.map((issue) => issue.path.map(String).join('.'))))
}
