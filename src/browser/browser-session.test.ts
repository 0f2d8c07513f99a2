import { describe, it, expect, jest, beforeEach } from '@jest/globals'
import { ChildProcess } from 'child_process'
import { launch } from 'chrome-launcher'
import { chromium, Browser } from 'playwright-core'
import { BrowserSession } from './browser-session'

jest.mock('chrome-launcher', () => ({
  launch: jest.fn(),
}))

jest.mock('playwright-core', () => ({
  chromium: {
    connectOverCDP: jest.fn(),
  },
}))

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const mockLaunch = jest.mocked(launch)
const mockConnect = jest.mocked(chromium.connectOverCDP)

const createFakeBrowser = (withDefaultContext = true) => {
  const innerText = jest.fn(async (_options?: { timeout?: number }) => 'Hello from the page')
  let closed = false
  const page = {
    goto: jest.fn(async (_url: string, _options?: { timeout?: number; waitUntil?: string }) => ({ status: () => 204 })),
    title: jest.fn(async () => 'Fake page'),
    url: jest.fn(() => 'https://a.example/landing'),
    locator: jest.fn((_selector: string) => ({ innerText })),
    isClosed: jest.fn(() => closed),
    close: jest.fn(async () => {
      closed = true
    }),
  }
  const context = { newPage: jest.fn(async () => page) }
  const browser = {
    contexts: jest.fn(() => (withDefaultContext ? [context] : [])),
    newContext: jest.fn(async () => context),
    close: jest.fn(async () => undefined),
  }
  return { browser, context, page, innerText }
}

describe('BrowserSession', () => {
  let kill: jest.Mock<() => Promise<undefined>>

  beforeEach(() => {
    jest.clearAllMocks()
    kill = jest.fn(async () => undefined)
    mockLaunch.mockResolvedValue({
      pid: 4242,
      port: 9222,
      process: new ChildProcess(),
      remoteDebuggingPipes: null,
      kill,
    })
  })

  const connectTo = (fake: ReturnType<typeof createFakeBrowser>) => {
    // only the handful of members the session touches are faked
    mockConnect.mockResolvedValue(fake.browser as unknown as Browser)
  }

  it('should launch Chrome once and attach over CDP', async () => {
    const fake = createFakeBrowser()
    connectTo(fake)
    const session = new BrowserSession()

    await Promise.all([session.openTab(), session.openTab()])

    expect(mockLaunch).toHaveBeenCalledTimes(1)
    expect(mockLaunch).toHaveBeenCalledWith({
      chromeFlags: ['--no-sandbox', '--disable-dev-shm-usage', '--headless'],
      logLevel: 'error',
    })
    expect(mockConnect).toHaveBeenCalledWith('http://127.0.0.1:9222')
    expect(fake.context.newPage).toHaveBeenCalledTimes(2)
  })

  it('should leave out the headless flag when headed', async () => {
    connectTo(createFakeBrowser())
    const session = new BrowserSession({ headless: false, chromeFlags: ['--custom-flag'] })

    await session.openTab()

    expect(mockLaunch).toHaveBeenCalledWith({ chromeFlags: ['--custom-flag'], logLevel: 'error' })
  })

  it('should create a context when the browser has none', async () => {
    const fake = createFakeBrowser(false)
    connectTo(fake)

    await new BrowserSession().openTab()

    expect(fake.browser.newContext).toHaveBeenCalledTimes(1)
  })

  it('should drive the page through the tab interface', async () => {
    const fake = createFakeBrowser()
    connectTo(fake)
    const tab = await new BrowserSession().openTab()

    const response = await tab.goto('https://a.example', 1500)

    expect(response).toEqual({ status: 204 })
    expect(fake.page.goto).toHaveBeenCalledWith('https://a.example', { timeout: 1500, waitUntil: 'domcontentloaded' })
    expect(await tab.title()).toBe('Fake page')
    expect(await tab.bodyText(500)).toBe('Hello from the page')
    expect(fake.page.locator).toHaveBeenCalledWith('body')
    expect(fake.innerText).toHaveBeenCalledWith({ timeout: 500 })
    expect(tab.currentUrl()).toBe('https://a.example/landing')

    await tab.close()
    await tab.close()
    expect(fake.page.close).toHaveBeenCalledTimes(1)
  })

  it('should disconnect and kill Chrome on close', async () => {
    const fake = createFakeBrowser()
    connectTo(fake)
    const session = new BrowserSession()
    await session.openTab()

    await session.close()

    expect(fake.browser.close).toHaveBeenCalledTimes(1)
    expect(kill).toHaveBeenCalledTimes(1)
    expect(session.isClosed()).toBe(true)
    await expect(session.openTab()).rejects.toThrow('Browser has been closed')
  })

  it('should not launch anything when closed before first use', async () => {
    const session = new BrowserSession()

    await session.close()
    await session.close()

    expect(mockLaunch).not.toHaveBeenCalled()
    expect(kill).not.toHaveBeenCalled()
  })

  it('should keep closing when disconnecting fails', async () => {
    const fake = createFakeBrowser()
    fake.browser.close.mockRejectedValue(new Error('already disconnected'))
    connectTo(fake)
    const session = new BrowserSession()
    await session.openTab()

    await session.close()

    expect(kill).toHaveBeenCalledTimes(1)
  })
})
