import { z } from 'zod'
import { Verdict, VerdictStatus } from '../core/types'
import { logger } from '../logger'

const MAX_NOTE_LENGTH = 300

const VerdictPayloadSchema = z.object({
  status: z.string(),
  reason: z.string().optional().catch(undefined),
})

const STATUS_SYNONYMS: Record<string, VerdictStatus> = {
  UP: 'UP',
  ONLINE: 'UP',
  OPERATIONAL: 'UP',
  WORKING: 'UP',
  OK: 'UP',
  DOWN: 'DOWN',
  OFFLINE: 'DOWN',
  UNAVAILABLE: 'DOWN',
  ERROR: 'DOWN',
  FAILED: 'DOWN',
  UNREACHABLE: 'DOWN',
  UNKNOWN: 'UNKNOWN',
}

/**
 * Find the JSON object in a model answer: the whole answer, a fenced
 * block, or the span from the first "{" to the last "}".
 */
export function extractJsonBlock(raw: string): string | null {
  const trimmed = raw.trim()

  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return trimmed
  }

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed)?.[1]
  if (fenced !== undefined) {
    return fenced.trim()
  }

  const first = trimmed.indexOf('{')
  const last = trimmed.lastIndexOf('}')
  if (first !== -1 && last > first) {
    return trimmed.slice(first, last + 1)
  }

  return null
}

export function normalizeStatus(status: string): VerdictStatus | undefined {
  return STATUS_SYNONYMS[status.trim().toUpperCase()]
}

function toNote(text: string | undefined): string | undefined {
  if (!text) return undefined
  const collapsed = text.replace(/\s+/g, ' ').trim()
  if (!collapsed) return undefined
  return collapsed.length > MAX_NOTE_LENGTH ? collapsed.slice(0, MAX_NOTE_LENGTH - 3) + '...' : collapsed
}

function verdict(status: VerdictStatus, note: string | undefined): Verdict {
  return note ? { status, note } : { status }
}

function parseJsonVerdict(raw: string): Verdict | undefined {
  const candidate = extractJsonBlock(raw)
  if (candidate === null) return undefined

  let parsed: unknown
  try {
    parsed = JSON.parse(candidate)
  } catch (error) {
    logger.debug(`Model answer is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }

  const payload = VerdictPayloadSchema.safeParse(parsed)
  if (!payload.success) {
    return undefined
  }

  const { status, reason } = payload.data
  return verdict(normalizeStatus(status) ?? 'UNKNOWN', toNote(reason))
}

// A keyword counts at the start of a line, after "status" or after "is";
// "SIGN UP" or "SET UP" in running text does not
const standalone = (word: string) =>
  new RegExp(`(?:^\\s*|\\b[Ss]tatus\\b["']?\\s*(?:[:=]|is)?\\s*["']?|\\b[Ii]s\\s+)${word}\\b`, 'm')
const STANDALONE_UP = standalone('UP')
const STANDALONE_DOWN = standalone('DOWN')

/**
 * Map a free-form model answer to a verdict. Anything that does not name a
 * status clearly is UNKNOWN; this never throws.
 */
export function parseVerdict(raw: string): Verdict {
  const fromJson = parseJsonVerdict(raw)
  if (fromJson) {
    return fromJson
  }

  // bare keywords, only when the answer commits to one of them
  const saysUp = STANDALONE_UP.test(raw)
  const saysDown = STANDALONE_DOWN.test(raw)
  if (saysUp !== saysDown) {
    return verdict(saysUp ? 'UP' : 'DOWN', toNote(raw))
  }

  return verdict('UNKNOWN', toNote(raw))
}
