import { launch, LaunchedChrome } from 'chrome-launcher'
import { chromium, Browser, BrowserContext, Page } from 'playwright-core'
import { logger } from '../logger'

export interface BrowserSessionOptions {
  headless?: boolean
  chromeFlags?: string[]
  logLevel?: 'silent' | 'error' | 'info' | 'verbose'
}

export interface NavigationResponse {
  status: number
}

/**
 * One open page. The probe only talks to this interface, so tests can hand
 * it fakes instead of a real browser.
 */
export interface BrowserTab {
  goto(url: string, timeoutMs: number): Promise<NavigationResponse | null>
  title(): Promise<string>
  bodyText(timeoutMs: number): Promise<string>
  currentUrl(): string
  close(): Promise<void>
}

export interface TabProvider {
  openTab(): Promise<BrowserTab>
}

class PlaywrightTab implements BrowserTab {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<NavigationResponse | null> {
    const response = await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' })
    return response ? { status: response.status() } : null
  }

  title(): Promise<string> {
    return this.page.title()
  }

  bodyText(timeoutMs: number): Promise<string> {
    return this.page.locator('body').innerText({ timeout: timeoutMs })
  }

  currentUrl(): string {
    return this.page.url()
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close()
    }
  }
}

/**
 * A single Chrome process, launched on first use and shared by every probe
 * of the run. Tabs are opened in its default context through Playwright's
 * CDP connection.
 */
export class BrowserSession implements TabProvider {
  private options: Required<BrowserSessionOptions>
  private chrome?: LaunchedChrome
  private browser?: Browser
  private starting?: Promise<BrowserContext>
  private closed = false

  constructor(options: BrowserSessionOptions = {}) {
    this.options = {
      headless: true,
      chromeFlags: ['--no-sandbox', '--disable-dev-shm-usage'],
      logLevel: 'error',
      ...options,
    }
  }

  async openTab(): Promise<BrowserTab> {
    const context = await this.start()
    const page = await context.newPage()
    return new PlaywrightTab(page)
  }

  isClosed(): boolean {
    return this.closed
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    logger.debug('Closing browser session')

    // let a launch that is still under way finish so its process can be killed
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        logger.debug(`Browser launch failed during shutdown: ${error instanceof Error ? error.message : String(error)}`)
      })
    }

    if (this.browser) {
      try {
        await this.browser.close()
      } catch (error) {
        logger.warn(`Failed to disconnect from Chrome: ${error}`)
      }
      this.browser = undefined
    }

    if (this.chrome) {
      try {
        await this.chrome.kill()
      } catch (error) {
        logger.warn(`Failed to kill Chrome instance: ${error}`)
      }
      this.chrome = undefined
    }
  }

  private start(): Promise<BrowserContext> {
    if (this.closed) {
      return Promise.reject(new Error('Browser has been closed'))
    }
    if (!this.starting) {
      this.starting = this.launch()
    }
    return this.starting
  }

  private async launch(): Promise<BrowserContext> {
    const chromeFlags = this.options.headless ? [...this.options.chromeFlags, '--headless'] : this.options.chromeFlags

    logger.debug(`Launching Chrome (${this.options.headless ? 'headless' : 'headed'})`)

    this.chrome = await launch({
      chromeFlags,
      logLevel: this.options.logLevel,
    })
    this.browser = await chromium.connectOverCDP(`http://127.0.0.1:${this.chrome.port}`)

    logger.debug(`Connected to Chrome on port ${this.chrome.port}`)

    const [context] = this.browser.contexts()
    return context ?? this.browser.newContext()
  }
}

export function createBrowserSession(options?: BrowserSessionOptions): BrowserSession {
  return new BrowserSession(options)
}
