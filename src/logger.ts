import { createWriteStream, type WriteStream } from 'fs'
import { format } from 'util'
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: pc.gray('DEBUG'),
  info: pc.cyan('INFO'),
  warn: pc.yellow('WARN'),
  error: pc.red('ERROR'),
}

/**
 * Console logger used across the project. Lines go to stderr so that stdout
 * stays free for report output; an optional file sink receives the same
 * lines with a timestamp and without colors.
 */
export class Logger {
  private level: LogLevel
  private fileStream?: WriteStream

  constructor(level: LogLevel = 'info') {
    this.level = level
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  /**
   * Append log lines to a file. Replaces any previously attached file.
   */
  attachFile(filePath: string): void {
    this.detachFileSync()
    this.fileStream = createWriteStream(filePath, { flags: 'a' })
    this.fileStream.on('error', (error) => {
      this.fileStream = undefined
      this.error(`Log file ${filePath} is not writable: ${error.message}`)
    })
  }

  async close(): Promise<void> {
    const stream = this.fileStream
    if (!stream) return
    this.fileStream = undefined
    await new Promise<void>((resolve) => stream.end(resolve))
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args)
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return
    }

    const text = args.length > 0 ? format(message, ...args) : message

    if (this.fileStream) {
      this.fileStream.write(`${new Date().toISOString()} - ${level.toUpperCase()} - ${text}\n`)
    }

    // eslint-disable-next-line no-console
    console.error(`${LEVEL_LABELS[level]} ${text}`)
  }

  private detachFileSync(): void {
    if (this.fileStream) {
      this.fileStream.end()
      this.fileStream = undefined
    }
  }
}

export const logger = new Logger()
