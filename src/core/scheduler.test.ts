import { describe, it, expect, jest } from '@jest/globals'
import { CategoryScheduler, SiteCheck } from './scheduler'
import { Result, SiteSpec } from './types'

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const createSites = (count: number): SiteSpec[] =>
  Array.from({ length: count }, (_, i) => ({ name: `site-${i}`, url: `https://site-${i}.example` }))

const up = (site: SiteSpec): Result => ({ site, status: 'UP', error: null })

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('CategoryScheduler', () => {
  it('should return one result per site keyed by site name', async () => {
    const sites = createSites(5)
    const scheduler = new CategoryScheduler(async (site) => up(site))

    const results = await scheduler.runCategory('Tools', sites, 2)

    expect(Array.from(results.keys()).sort()).toEqual(sites.map((s) => s.name).sort())
    expect(results.get('site-3')).toEqual(up({ name: 'site-3', url: 'https://site-3.example' }))
  })

  it('should return an empty mapping for a category without sites', async () => {
    const check = jest.fn<SiteCheck>()
    const scheduler = new CategoryScheduler(check)

    const results = await scheduler.runCategory('Empty', [], 3)

    expect(results.size).toBe(0)
    expect(check).not.toHaveBeenCalled()
  })

  it('should never admit more than the concurrency limit', async () => {
    const sites = createSites(40)
    let inFlight = 0
    let peak = 0

    const scheduler = new CategoryScheduler(async (site) => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await delay(Number(site.name.split('-')[1]) % 5)
      inFlight--
      return up(site)
    })

    const results = await scheduler.runCategory('Stress', sites, 4)

    expect(results.size).toBe(40)
    expect(peak).toBe(4)
  })

  it('should admit the next site as soon as a slot frees up', async () => {
    const sites = createSites(3)
    const started: string[] = []
    let releaseSlow: () => void = () => undefined

    const scheduler = new CategoryScheduler(async (site) => {
      started.push(site.name)
      if (site.name === 'site-0') {
        await new Promise<void>((resolve) => {
          releaseSlow = resolve
        })
      }
      return up(site)
    })

    const running = scheduler.runCategory('Slow', sites, 2)
    await delay(5)

    // site-1 finished quickly, so site-2 got its slot while site-0 is still running
    expect(started).toEqual(['site-0', 'site-1', 'site-2'])

    releaseSlow()
    const results = await running
    expect(results.size).toBe(3)
  })

  it('should keep the same mapping regardless of completion order', async () => {
    const sites = createSites(6)
    const forward = new CategoryScheduler(async (site) => {
      await delay(Number(site.name.split('-')[1]))
      return up(site)
    })
    const backward = new CategoryScheduler(async (site) => {
      await delay(6 - Number(site.name.split('-')[1]))
      return up(site)
    })

    const a = await forward.runCategory('Order', sites, 6)
    const b = await backward.runCategory('Order', sites, 6)

    expect(new Map(Array.from(a.entries()).sort())).toEqual(new Map(Array.from(b.entries()).sort()))
  })

  it('should turn a throwing check into an ERROR result', async () => {
    const sites = createSites(2)
    const scheduler = new CategoryScheduler(async (site) => {
      if (site.name === 'site-1') {
        throw new Error('checker blew up')
      }
      return up(site)
    })

    const results = await scheduler.runCategory('Mixed', sites, 2)

    expect(results.get('site-0')?.status).toBe('UP')
    expect(results.get('site-1')).toEqual({ site: sites[1], status: 'ERROR', error: 'checker blew up' })
  })

  it('should emit siteStart and siteComplete for every site', async () => {
    const sites = createSites(3)
    const scheduler = new CategoryScheduler(async (site) => up(site))
    const startSpy = jest.fn()
    const completeSpy = jest.fn()
    scheduler.on('siteStart', startSpy)
    scheduler.on('siteComplete', completeSpy)

    await scheduler.runCategory('Events', sites, 1)

    expect(startSpy).toHaveBeenCalledTimes(3)
    expect(startSpy).toHaveBeenCalledWith('Events', sites[0])
    expect(completeSpy).toHaveBeenCalledTimes(3)
    expect(completeSpy).toHaveBeenCalledWith('Events', up(sites[2] as SiteSpec))
  })

  it('should stop admitting sites once the signal aborts', async () => {
    const sites = createSites(6)
    const controller = new AbortController()
    const checked: string[] = []

    const scheduler = new CategoryScheduler(async (site, signal) => {
      checked.push(site.name)
      if (checked.length === 2) {
        controller.abort()
      }
      await delay(1)
      return signal?.aborted ? { site, status: 'ERROR', error: 'probe cancelled' } : up(site)
    })

    const results = await scheduler.runCategory('Abort', sites, 2, controller.signal)

    expect(checked).toEqual(['site-0', 'site-1'])
    expect(results.size).toBe(2)
    expect(scheduler.getStatus()).toEqual({})
  })

  it('should report live counters while a category runs', async () => {
    const sites = createSites(3)
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const scheduler = new CategoryScheduler(async (site) => {
      await gate
      return up(site)
    })

    const running = scheduler.runCategory('Live', sites, 2)
    await delay(1)

    expect(scheduler.getStatus()).toEqual({ Live: { inFlight: 2, queued: 1, completed: 0 } })

    release()
    await running
    expect(scheduler.getStatus()).toEqual({})
  })
})
