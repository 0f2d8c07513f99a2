export type ProbeFailureReason = 'timeout' | 'dns' | 'connection' | 'crash' | 'cancelled' | 'navigation'

/**
 * A page could not be loaded: navigation timed out, the host could not be
 * reached, or the browser went away.
 */
export class ProbeError extends Error {
  constructor(
    message: string,
    public readonly reason: ProbeFailureReason,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'ProbeError'
  }
}

/**
 * The model backend could not be talked to, or answered without a usable
 * response envelope. Not raised for answers that merely fail to name a status.
 */
export class ClassifyError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'ClassifyError'
  }
}

export class RunCancelledError extends Error {
  constructor(public readonly completedCategories: number) {
    super(`Run cancelled after ${completedCategories} completed categor${completedCategories === 1 ? 'y' : 'ies'}`)
    this.name = 'RunCancelledError'
  }
}
