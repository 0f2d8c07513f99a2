import { describe, it, expect, jest } from '@jest/globals'
import { extractJsonBlock, normalizeStatus, parseVerdict } from './parse-verdict'

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

describe('parseVerdict', () => {
  it('should read a plain JSON answer', () => {
    expect(parseVerdict('{"status": "UP", "reason": "Homepage loaded with navigation"}')).toEqual({
      status: 'UP',
      note: 'Homepage loaded with navigation',
    })
  })

  it('should read a fenced JSON block', () => {
    const raw = 'Here is my answer:\n```json\n{"status": "down", "reason": "502 Bad Gateway"}\n```'

    expect(parseVerdict(raw)).toEqual({ status: 'DOWN', note: '502 Bad Gateway' })
  })

  it('should read JSON embedded in prose', () => {
    expect(parseVerdict('Verdict follows {"status": "Operational"} as requested')).toEqual({ status: 'UP' })
  })

  it.each([
    ['ONLINE', 'UP'],
    ['working', 'UP'],
    ['ok', 'UP'],
    ['Offline', 'DOWN'],
    ['UNAVAILABLE', 'DOWN'],
    ['error', 'DOWN'],
    ['Failed', 'DOWN'],
    ['unreachable', 'DOWN'],
    ['unknown', 'UNKNOWN'],
  ])('should map the status "%s" to %s', (status, expected) => {
    expect(parseVerdict(JSON.stringify({ status })).status).toBe(expected)
  })

  it('should fall back to UNKNOWN for a status it does not recognize', () => {
    expect(parseVerdict('{"status": "MAYBE", "reason": "Partial content"}')).toEqual({
      status: 'UNKNOWN',
      note: 'Partial content',
    })
  })

  it('should ignore a reason that is not text', () => {
    expect(parseVerdict('{"status": "UP", "reason": 42}')).toEqual({ status: 'UP' })
  })

  it('should accept a single bare keyword', () => {
    expect(parseVerdict('The site is UP and\n  serving pages')).toEqual({
      status: 'UP',
      note: 'The site is UP and serving pages',
    })
    expect(parseVerdict('Status: DOWN')).toEqual({ status: 'DOWN', note: 'Status: DOWN' })
  })

  it('should use keywords when the JSON is malformed', () => {
    expect(parseVerdict('{status: DOWN, reason: timeout}').status).toBe('DOWN')
  })

  it('should stay UNKNOWN when both keywords appear', () => {
    expect(parseVerdict('Could be UP or DOWN, hard to say').status).toBe('UNKNOWN')
  })

  it('should accept a keyword on a line of its own', () => {
    expect(parseVerdict('Checked the page.\nDOWN').status).toBe('DOWN')
    expect(parseVerdict('UP - the storefront rendered').status).toBe('UP')
  })

  it('should ignore keywords inside running text', () => {
    expect(parseVerdict('The page asks visitors to SIGN UP for a newsletter').status).toBe('UNKNOWN')
    expect(parseVerdict('A banner says SET UP your account; it looks DOWN to me').status).toBe('UNKNOWN')
    expect(parseVerdict('Status: DOWN, the login page says SIGN UP').status).toBe('DOWN')
  })

  it('should only match upper-case keywords', () => {
    expect(parseVerdict('the page seems to be up').status).toBe('UNKNOWN')
  })

  it('should stay UNKNOWN for JSON without a status', () => {
    expect(parseVerdict('{"reason": "no idea"}').status).toBe('UNKNOWN')
  })

  it('should return a bare UNKNOWN for an empty answer', () => {
    expect(parseVerdict('')).toEqual({ status: 'UNKNOWN' })
  })

  it('should bound the note length', () => {
    const verdict = parseVerdict(JSON.stringify({ status: 'UP', reason: 'a'.repeat(500) }))

    expect(verdict.note).toHaveLength(300)
    expect(verdict.note?.endsWith('...')).toBe(true)
  })
})

describe('extractJsonBlock', () => {
  it('should prefer the whole answer when it is an object', () => {
    expect(extractJsonBlock('  {"status": "UP"}  ')).toBe('{"status": "UP"}')
  })

  it('should take the contents of an unlabelled fence', () => {
    expect(extractJsonBlock('```\n{"status": "UP"}\n```')).toBe('{"status": "UP"}')
  })

  it('should return null when there is no object', () => {
    expect(extractJsonBlock('no braces here')).toBeNull()
  })
})

describe('normalizeStatus', () => {
  it('should trim and ignore case', () => {
    expect(normalizeStatus('  operational ')).toBe('UP')
    expect(normalizeStatus('sideways')).toBeUndefined()
  })
})
