import { SiteSpec } from './site'

export type VerdictStatus = 'UP' | 'DOWN' | 'UNKNOWN'

export type SiteStatus = VerdictStatus | 'ERROR'

// What a single probe attempt saw
export interface Observation {
  url: string
  reachable: boolean
  rawSignal: string
  latencyMs: number
  httpStatus?: number
}

export interface Verdict {
  status: VerdictStatus
  note?: string
}

interface ResultBase {
  site: SiteSpec
  note?: string
}

export interface CheckedResult extends ResultBase {
  status: VerdictStatus
  error: null
}

export interface FailedResult extends ResultBase {
  status: 'ERROR'
  error: string
}

// Final outcome for one site in one run. `error` is set iff status is ERROR.
export type Result = CheckedResult | FailedResult

/**
 * Visits a URL in a browser tab. Rejects with ProbeError.
 */
export interface ObservationProbe {
  probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<Observation>
}

/**
 * Turns an observation into a verdict. Rejects with ClassifyError only when
 * the model could not be reached.
 */
export interface VerdictClassifier {
  classify(observation: Observation, signal?: AbortSignal): Promise<Verdict>
}
