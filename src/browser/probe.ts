import { Observation, ObservationProbe } from '../core/types'
import { ProbeError } from '../core/errors'
import { BrowserTab, TabProvider } from './browser-session'
import { extractSignal } from './signal-extractor'
import { logger } from '../logger'

export interface BrowserProbeOptions {
  maxSignalLength: number
  /** Upper bound on reading the page text once navigation has committed */
  textTimeout?: number
  clock?: () => number
}

const NET_ERROR = /net::ERR_[A-Z_]+/
const CONNECTION_ERRORS =
  /net::ERR_(CONNECTION_[A-Z_]+|ADDRESS_UNREACHABLE|INTERNET_DISCONNECTED|NAME_RESOLUTION_FAILED|SSL_[A-Z_]+|CERT_[A-Z_]+|BAD_SSL_[A-Z_]+|TIMED_OUT|EMPTY_RESPONSE)/
const CRASH_ERRORS = /Target (page, context or browser )?(has been )?closed|Target crashed|Browser has been closed|browser has disconnected/i

/**
 * Map whatever a navigation threw onto a ProbeError with a reason
 */
export function toProbeError(error: unknown, signal?: AbortSignal): ProbeError {
  if (error instanceof ProbeError) return error
  if (signal?.aborted) {
    return new ProbeError('probe cancelled', 'cancelled', error instanceof Error ? error : undefined)
  }

  const cause = error instanceof Error ? error : undefined
  const message = error instanceof Error ? error.message : String(error)
  const firstLine = message.split('\n')[0]?.trim() ?? message

  if (cause?.name === 'TimeoutError') {
    return new ProbeError('probe timeout', 'timeout', cause)
  }

  if (message.includes('net::ERR_NAME_NOT_RESOLVED')) {
    return new ProbeError('dns: net::ERR_NAME_NOT_RESOLVED', 'dns', cause)
  }

  const connection = CONNECTION_ERRORS.exec(message)
  if (connection) {
    return new ProbeError(`connection: ${connection[0]}`, 'connection', cause)
  }

  if (CRASH_ERRORS.test(message)) {
    return new ProbeError(`crash: ${firstLine}`, 'crash', cause)
  }

  const netError = NET_ERROR.exec(message)
  return new ProbeError(`navigation: ${netError ? netError[0] : firstLine}`, 'navigation', cause)
}

/**
 * Observation probe backed by a real browser: one tab per call, navigated
 * under a deadline, closed on every exit path.
 */
export class BrowserProbe implements ObservationProbe {
  private options: Required<BrowserProbeOptions>

  constructor(
    private readonly tabs: TabProvider,
    options: BrowserProbeOptions,
  ) {
    this.options = {
      textTimeout: 5000,
      clock: Date.now,
      ...options,
    }
  }

  async probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<Observation> {
    if (signal?.aborted) {
      throw new ProbeError('probe cancelled', 'cancelled')
    }

    const started = this.options.clock()

    // settles only when the deadline passes or the run is cancelled; the deadline covers opening the tab
    let interrupt: (error: ProbeError) => void = () => undefined
    const interrupted = new Promise<never>((_resolve, reject) => {
      interrupt = reject
    })
    const timer = setTimeout(() => interrupt(new ProbeError('probe timeout', 'timeout')), timeoutMs)
    const onAbort = () => interrupt(new ProbeError('probe cancelled', 'cancelled'))
    signal?.addEventListener('abort', onAbort, { once: true })

    let tab: BrowserTab | undefined
    try {
      const opening = this.tabs.openTab()
      try {
        tab = await Promise.race([opening, interrupted])
      } catch (error) {
        if (error instanceof ProbeError) {
          this.discardLateTab(opening, url)
        }
        throw error
      }

      if (signal?.aborted) {
        throw new ProbeError('probe cancelled', 'cancelled')
      }

      // an interrupted navigation rejects once its tab is closed below; the race has already settled by then
      return await Promise.race([this.observe(tab, url, timeoutMs, started), interrupted])
    } catch (error) {
      throw toProbeError(error, signal)
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      if (tab) {
        await this.closeTab(tab, url)
      }
    }
  }

  /**
   * A tab that arrives after the probe gave up is closed as soon as it opens
   */
  private discardLateTab(opening: Promise<BrowserTab>, url: string): void {
    void opening.then(
      (late) => this.closeTab(late, url),
      (error: unknown) =>
        logger.debug(`Tab for ${url} failed to open after the probe ended: ${error instanceof Error ? error.message : String(error)}`),
    )
  }

  private async observe(tab: BrowserTab, url: string, timeoutMs: number, started: number): Promise<Observation> {
    const response = await tab.goto(url, timeoutMs)
    const latencyMs = this.options.clock() - started

    const [title, text] = await Promise.all([tab.title(), tab.bodyText(this.options.textTimeout)])
    const httpStatus = response?.status

    const observation: Observation = {
      url,
      reachable: httpStatus === undefined || httpStatus < 500,
      rawSignal: extractSignal({ httpStatus, finalUrl: tab.currentUrl(), title, text }, this.options.maxSignalLength),
      latencyMs,
    }
    if (httpStatus !== undefined) {
      observation.httpStatus = httpStatus
    }

    return observation
  }

  private async closeTab(tab: BrowserTab, url: string): Promise<void> {
    try {
      await tab.close()
    } catch (error) {
      // the browser may already be gone
      logger.debug(`Failed to close tab for ${url}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }
}

export function createBrowserProbe(tabs: TabProvider, options: BrowserProbeOptions): BrowserProbe {
  return new BrowserProbe(tabs, options)
}
