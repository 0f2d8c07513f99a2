import pc from 'picocolors'
import { Report, Result } from '../../core/types'
import { summarizeReport } from '../../core/utils/create-report'

export interface CLIReporterOptions {
  showColors?: boolean
  showNotes?: boolean
  maxErrorLength?: number
}

/**
 * CLI Reporter that prints the per-category status summary
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showNotes: options.showNotes ?? false,
      maxErrorLength: options.maxErrorLength ?? 120,
    }
  }

  generate(report: Report): string {
    const lines: string[] = []

    lines.push(`=== Summary (${report.timestamp}) ===`)

    report.categories.forEach((results, category) => {
      lines.push('')
      lines.push(this.colorize(`${category}:`, 'bold'))

      if (results.size === 0) {
        lines.push('   (no sites)')
        return
      }

      results.forEach((result, name) => {
        lines.push(...this.formatResult(name, result))
      })
    })

    lines.push('')
    lines.push(this.formatStats(report))

    return lines.join('\n')
  }

  print(report: Report): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(report))
  }

  private formatResult(name: string, result: Result): string[] {
    const marker = result.status === 'UP' ? '✅' : '❌'
    const lines = [`${marker} ${name}: ${this.formatStatus(result)}`]

    if (result.error !== null) {
      lines.push(`   Error: ${this.truncate(result.error)}`)
    }
    if (this.options.showNotes && result.note) {
      lines.push(`   Note: ${this.truncate(result.note)}`)
    }

    return lines
  }

  private formatStatus(result: Result): string {
    switch (result.status) {
      case 'UP':
        return this.colorize('UP', 'green')
      case 'DOWN':
        return this.colorize('DOWN', 'red')
      case 'UNKNOWN':
        return this.colorize('UNKNOWN', 'yellow')
      case 'ERROR':
        return this.colorize('ERROR', 'red')
    }
  }

  private formatStats(report: Report): string {
    const stats = summarizeReport(report)
    return `Sites: ${stats.total} total, ${stats.up} up, ${stats.down} down, ${stats.unknown} unknown, ${stats.error} error`
  }

  private truncate(text: string): string {
    if (text.length <= this.options.maxErrorLength) {
      return text
    }
    return text.slice(0, this.options.maxErrorLength - 3) + '...'
  }

  private colorize(text: string, color: 'green' | 'red' | 'yellow' | 'bold'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
      case 'bold':
        return pc.bold(text)
    }
  }
}
