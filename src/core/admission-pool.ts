export class AdmissionCancelledError extends Error {
  constructor() {
    super('Admission cancelled')
    this.name = 'AdmissionCancelledError'
  }
}

interface Waiter {
  admit: () => void
  cancel: () => void
}

/**
 * Counting semaphore with a fixed number of slots. Each slot stands for one
 * unit of expensive work in flight, such as an open browser tab.
 */
export class AdmissionPool {
  private active = 0
  private waiters: Waiter[] = []

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Admission limit must be a positive integer, got ${limit}`)
    }
  }

  get inFlight(): number {
    return this.active
  }

  get waiting(): number {
    return this.waiters.length
  }

  /**
   * Wait for a free slot. Rejects with AdmissionCancelledError if the signal
   * aborts first; a slot is never held in that case.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new AdmissionCancelledError())
    }

    if (this.active < this.limit) {
      this.active++
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => waiter.cancel()

      const waiter: Waiter = {
        admit: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
        cancel: () => {
          this.waiters = this.waiters.filter((w) => w !== waiter)
          signal?.removeEventListener('abort', onAbort)
          reject(new AdmissionCancelledError())
        },
      }

      this.waiters.push(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('release() called without a matching acquire()')
    }

    const next = this.waiters.shift()
    if (next) {
      // slot passes straight to the next waiter
      next.admit()
      return
    }

    this.active--
  }

  /**
   * Run `work` while holding a slot; the slot is released on every exit path
   */
  async use<T>(work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal)
    try {
      return await work()
    } finally {
      this.release()
    }
  }
}
