import { describe, it, expect } from '@jest/globals'
import { AdmissionCancelledError, AdmissionPool } from './admission-pool'

const tick = () => new Promise((resolve) => setImmediate(resolve))

describe('AdmissionPool', () => {
  it('should reject non-positive limits', () => {
    expect(() => new AdmissionPool(0)).toThrow('Admission limit must be a positive integer, got 0')
    expect(() => new AdmissionPool(1.5)).toThrow('Admission limit must be a positive integer, got 1.5')
  })

  it('should admit up to the limit immediately and queue the rest', async () => {
    const pool = new AdmissionPool(2)

    await pool.acquire()
    await pool.acquire()

    let thirdAdmitted = false
    const third = pool.acquire().then(() => {
      thirdAdmitted = true
    })

    await tick()
    expect(pool.inFlight).toBe(2)
    expect(pool.waiting).toBe(1)
    expect(thirdAdmitted).toBe(false)

    pool.release()
    await third

    expect(thirdAdmitted).toBe(true)
    expect(pool.inFlight).toBe(2)
    expect(pool.waiting).toBe(0)
  })

  it('should admit waiters in arrival order', async () => {
    const pool = new AdmissionPool(1)
    const order: string[] = []

    await pool.acquire()
    const first = pool.acquire().then(() => order.push('first'))
    const second = pool.acquire().then(() => order.push('second'))

    pool.release()
    await first
    pool.release()
    await second

    expect(order).toEqual(['first', 'second'])
  })

  it('should throw when releasing more than acquired', () => {
    const pool = new AdmissionPool(1)
    expect(() => pool.release()).toThrow('release() called without a matching acquire()')
  })

  it('should reject immediately when the signal is already aborted', async () => {
    const pool = new AdmissionPool(1)
    const controller = new AbortController()
    controller.abort()

    await expect(pool.acquire(controller.signal)).rejects.toBeInstanceOf(AdmissionCancelledError)
    expect(pool.inFlight).toBe(0)
  })

  it('should drop a waiter whose signal aborts', async () => {
    const pool = new AdmissionPool(1)
    const controller = new AbortController()

    await pool.acquire()
    const waiting = pool.acquire(controller.signal)
    expect(pool.waiting).toBe(1)

    controller.abort()

    await expect(waiting).rejects.toBeInstanceOf(AdmissionCancelledError)
    expect(pool.waiting).toBe(0)

    pool.release()
    expect(pool.inFlight).toBe(0)
  })

  it('should release the slot when work fails', async () => {
    const pool = new AdmissionPool(1)

    await expect(pool.use(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')

    expect(pool.inFlight).toBe(0)
  })

  it('should never exceed the limit under load', async () => {
    const pool = new AdmissionPool(3)
    let current = 0
    let peak = 0

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        pool.use(async () => {
          current++
          peak = Math.max(peak, current)
          await new Promise((resolve) => setTimeout(resolve, i % 4))
          current--
        }),
      ),
    )

    expect(peak).toBe(3)
    expect(pool.inFlight).toBe(0)
  })
})
