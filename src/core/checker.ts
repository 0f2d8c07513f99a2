import { EventEmitter } from 'events'
import { Observation, ObservationProbe, Result, SiteSpec, Verdict, VerdictClassifier } from './types'
import { ClassifyError, ProbeError } from './errors'
import { logger } from '../logger'

export interface SiteCheckerConfig {
  timeout: number // per probe attempt, ms
  probeAttempts: number
  classifyAttempts: number
}

export interface SiteCheckerEvents {
  probeFailed: (site: SiteSpec, error: ProbeError, attempt: number, willRetry: boolean) => void
  classifyFailed: (site: SiteSpec, error: ClassifyError, attempt: number, willRetry: boolean) => void
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: string }

/**
 * Checks a single site: probe with retries, then classify with retries.
 * Every failure ends up in the returned Result; check() never rejects.
 * Holds no per-site state, so one instance serves concurrent checks.
 */
export class SiteChecker extends EventEmitter {
  constructor(
    private readonly probe: ObservationProbe,
    private readonly classifier: VerdictClassifier,
    private readonly config: SiteCheckerConfig,
  ) {
    super()
  }

  async check(site: SiteSpec, signal?: AbortSignal): Promise<Result> {
    const observed = await this.observe(site, signal)
    if (!observed.ok) {
      return failed(site, observed.error)
    }

    const classified = await this.classify(site, observed.value, signal)
    if (!classified.ok) {
      return failed(site, classified.error)
    }

    const { status, note } = classified.value
    logger.debug(`${site.name}: ${status}${note ? ` (${note})` : ''}`)

    const result: Result = note ? { site, status, error: null, note } : { site, status, error: null }
    return Object.freeze(result)
  }

  private async observe(site: SiteSpec, signal?: AbortSignal): Promise<Outcome<Observation>> {
    let lastError = 'probe failed'

    for (let attempt = 1; attempt <= this.config.probeAttempts; attempt++) {
      try {
        const observation = await this.probe.probe(site.url, this.config.timeout, signal)
        return { ok: true, value: observation }
      } catch (error) {
        const probeError = toProbeError(error)
        lastError = probeError.message

        const willRetry =
          attempt < this.config.probeAttempts && probeError.reason !== 'cancelled' && !signal?.aborted
        this.emit('probeFailed', site, probeError, attempt, willRetry)
        logger.debug(`Probe attempt ${attempt} for ${site.name} failed: ${probeError.message}`)

        if (!willRetry) break
      }
    }

    return { ok: false, error: lastError }
  }

  private async classify(site: SiteSpec, observation: Observation, signal?: AbortSignal): Promise<Outcome<Verdict>> {
    let lastError = 'classification failed'

    for (let attempt = 1; attempt <= this.config.classifyAttempts; attempt++) {
      try {
        const verdict = await this.classifier.classify(observation, signal)
        return { ok: true, value: verdict }
      } catch (error) {
        const classifyError = toClassifyError(error)
        lastError = classifyError.message

        const willRetry = attempt < this.config.classifyAttempts && !signal?.aborted
        this.emit('classifyFailed', site, classifyError, attempt, willRetry)
        logger.debug(`Classification attempt ${attempt} for ${site.name} failed: ${classifyError.message}`)

        if (!willRetry) break
      }
    }

    return { ok: false, error: lastError }
  }
}

function failed(site: SiteSpec, error: string): Result {
  const result: Result = { site, status: 'ERROR', error }
  return Object.freeze(result)
}

// Adapters are expected to throw ProbeError/ClassifyError; anything else is wrapped
function toProbeError(error: unknown): ProbeError {
  if (error instanceof ProbeError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new ProbeError(message, 'navigation', error instanceof Error ? error : undefined)
}

function toClassifyError(error: unknown): ClassifyError {
  if (error instanceof ClassifyError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new ClassifyError(message, error instanceof Error ? error : undefined)
}

export function createSiteChecker(
  probe: ObservationProbe,
  classifier: VerdictClassifier,
  config: SiteCheckerConfig,
): SiteChecker {
  return new SiteChecker(probe, classifier, config)
}
