import { writeFile } from 'fs/promises'
import { Report, Result, SiteStatus } from '../../core/types'

export interface JSONReporterOptions {
  prettyPrint?: boolean
  includeNotes?: boolean
}

export interface JSONSiteEntry {
  status: SiteStatus
  url: string
  error: string | null
  note?: string | null
}

/**
 * Machine-readable report, the shape of the persisted status file
 */
export interface JSONReport {
  timestamp: string // YYYY-MM-DD HH:mm:ss, local time
  categories: Record<string, Record<string, JSONSiteEntry>>
}

/**
 * JSON Reporter that writes the status file.
 *
 * Keys come out in catalog order. Plain objects would move integer-like keys
 * (a site called "2048", say) to the front, so the document is assembled from
 * ordered entries rather than handed to JSON.stringify in one piece.
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? true,
      includeNotes: options.includeNotes ?? false,
    }
  }

  generate(report: Report): string {
    const categories = Array.from(report.categories.entries()).map(
      ([category, results]): [string, string] => [
        category,
        this.serializeObject(
          Array.from(results.entries()).map(([name, result]): [string, string] => [
            name,
            this.serializeValue(this.createEntry(result), 3),
          ]),
          2,
        ),
      ],
    )

    return this.serializeObject(
      [
        ['timestamp', JSON.stringify(report.timestamp)],
        ['categories', this.serializeObject(categories, 1)],
      ],
      0,
    )
  }

  /**
   * Plain-object view of the report, for callers that post-process it
   */
  toJSON(report: Report): JSONReport {
    const categories: JSONReport['categories'] = {}
    report.categories.forEach((results, category) => {
      const entries: Record<string, JSONSiteEntry> = {}
      results.forEach((result, name) => {
        entries[name] = this.createEntry(result)
      })
      categories[category] = entries
    })
    return { timestamp: report.timestamp, categories }
  }

  async writeFile(report: Report, filePath: string): Promise<void> {
    const content = this.generate(report)
    await writeFile(filePath, content, 'utf-8')
  }

  private createEntry(result: Result): JSONSiteEntry {
    const entry: JSONSiteEntry = {
      status: result.status,
      url: result.site.url,
      error: result.error,
    }
    if (this.options.includeNotes) {
      entry.note = result.note ?? null
    }
    return entry
  }

  private serializeObject(entries: Array<[string, string]>, depth: number): string {
    if (entries.length === 0) {
      return '{}'
    }

    if (!this.options.prettyPrint) {
      return `{${entries.map(([key, value]) => `${JSON.stringify(key)}:${value}`).join(',')}}`
    }

    const inner = '  '.repeat(depth + 1)
    const lines = entries.map(([key, value]) => `${inner}${JSON.stringify(key)}: ${value}`)
    return `{\n${lines.join(',\n')}\n${'  '.repeat(depth)}}`
  }

  private serializeValue(value: JSONSiteEntry, depth: number): string {
    if (!this.options.prettyPrint) {
      return JSON.stringify(value)
    }
    return JSON.stringify(value, null, 2).replace(/\n/g, `\n${'  '.repeat(depth)}`)
  }
}
