/**
 * Segment 07: Textual Codec Tests
 *
 * RFC 3339 parsing (with and without leap seconds) and local-field formatting.
 */

import { describe, it, expect } from 'vitest'
import { fromString, fromNoLeapSecondsString, formatTimestamp } from '../src/rfc3339'
import { EPOCH, fullyEqual, inLeapSecond } from '../src/timestamp'
import { localDate, localOffset } from '../src/local-time'
import { unwrap, type Result } from '../src/result'
import type { Timestamp } from '../src/timestamp'
import type { TimestampError } from '../src/errors'

function codeOf(result: Result<Timestamp, TimestampError>): string {
  return result.ok ? 'ok' : result.error.code
}

// ============================================================================
// 1. ROUND TRIPS
// ============================================================================

describe('Round trips', () => {
  const canonical = [
    '2000-01-01T00:00:00Z',
    '2024-03-15T10:00:00.500-07:00',
    '2023-12-31T23:59:60.5Z',
    '2024-01-01T08:59:60.25+09:00',
    '1999-12-31T23:59:59.999999999+05:30',
    '0000-01-01T00:00:00Z',
    '9999-12-31T23:59:59.9Z',
    '2024-02-29T12:00:00-00:00',
    '1969-07-20T20:17:40-23:59',
  ]

  for (const text of canonical) {
    it(`reproduces ${text}`, () => {
      expect(formatTimestamp(unwrap(fromString(text)))).toBe(text)
    })
  }

  it('normalizes +00:00 and lowercase designators', () => {
    expect(formatTimestamp(unwrap(fromString('2024-03-15T10:00:00+00:00')))).toBe('2024-03-15T10:00:00Z')
    expect(formatTimestamp(unwrap(fromString('2024-03-15t10:00:00z')))).toBe('2024-03-15T10:00:00Z')
  })

  it('pads short years and drops redundant leading zeros', () => {
    expect(formatTimestamp(unwrap(fromString('0-01-01T00:00:00Z')))).toBe('0000-01-01T00:00:00Z')
    expect(formatTimestamp(unwrap(fromString('476-09-04T12:00:00Z')))).toBe('0476-09-04T12:00:00Z')
    expect(formatTimestamp(unwrap(fromString('02024-03-15T10:00:00Z')))).toBe('2024-03-15T10:00:00Z')
    expect(formatTimestamp(unwrap(fromString('+2024-03-15T10:00:00Z')))).toBe('2024-03-15T10:00:00Z')
  })
})

// ============================================================================
// 2. SEMANTICS
// ============================================================================

describe('Parsed values', () => {
  it('the epoch string is the epoch', () => {
    expect(fullyEqual(unwrap(fromString('2000-01-01T00:00:00Z')), EPOCH)).toBe(true)
  })

  it('-00:00 means an unknown offset', () => {
    const ts = unwrap(fromString('2000-01-01T00:00:00-00:00'))
    expect(ts.localOffsetMinutes).toBeNull()
    expect(localOffset(ts)).toBeNull()
    expect(fullyEqual(ts, EPOCH)).toBe(false)
  })

  it('keeps the local date of an offset timestamp', () => {
    const ts = unwrap(fromString('2024-03-01T22:15:30.5-05:00'))
    expect(ts.epochDays).toBe(8827)
    expect(ts.utcTimeOfDaySeconds.toString()).toBe('11730.5')
    expect(localDate(ts)).toEqual({ year: 2024, month: 3, day: 1 })
  })

  it('parses a leap second', () => {
    expect(inLeapSecond(unwrap(fromString('2016-12-31T23:59:60Z')))).toBe(true)
  })
})

// ============================================================================
// 3. ERRORS
// ============================================================================

describe('Malformed input', () => {
  const malformed = [
    '',
    'garbage',
    '2024-03-15',
    '2024-03-15T10:00Z',
    '2024-3-15T10:00:00Z',
    '2024-03-15 10:00:00Z',
    '2024-03-15T10:00:00',
    '2024-03-15T10:00:00.Z',
    '2024-03-15T10:00:00+0900',
    '2024-03-15T10:00:00+9:00',
    ' 2024-03-15T10:00:00Z',
    '2024-03-15T10:00:00Z ',
    '-+2024-03-15T10:00:00Z',
  ]

  for (const text of malformed) {
    it(`rejects '${text}'`, () => {
      expect(codeOf(fromString(text))).toBe('MALFORMED_TIMESTAMP')
    })
  }

  it('rejects more than 20 fractional digits', () => {
    expect(codeOf(fromString('2024-03-15T10:00:00.' + '1'.repeat(20) + 'Z'))).toBe('ok')
    expect(codeOf(fromString('2024-03-15T10:00:00.' + '1'.repeat(21) + 'Z'))).toBe('MALFORMED_TIMESTAMP')
  })
})

describe('Well-formed but invalid input', () => {
  it('rejects years outside 0-9999', () => {
    expect(codeOf(fromString('10000-01-01T00:00:00Z'))).toBe('OUT_OF_RANGE')
    expect(codeOf(fromString('-0001-12-31T00:00:00Z'))).toBe('OUT_OF_RANGE')
  })

  it('rejects a local time whose UTC instant falls before year 0', () => {
    expect(codeOf(fromString('0000-01-01T00:30:00+01:00'))).toBe('OUT_OF_RANGE')
  })

  it('rejects impossible dates', () => {
    expect(codeOf(fromString('2023-02-29T00:00:00Z'))).toBe('INVALID_DATE')
    expect(codeOf(fromString('1900-02-29T00:00:00Z'))).toBe('INVALID_DATE')
    expect(codeOf(fromString('2024-13-01T00:00:00Z'))).toBe('INVALID_DATE')
  })

  it('rejects impossible times of day', () => {
    expect(codeOf(fromString('2024-01-01T24:00:00Z'))).toBe('INVALID_TIME_OF_DAY')
    expect(codeOf(fromString('2024-01-01T00:60:00Z'))).toBe('INVALID_TIME_OF_DAY')
    expect(codeOf(fromString('2024-01-01T00:00:61Z'))).toBe('INVALID_TIME_OF_DAY')
  })

  it('rejects impossible offsets', () => {
    expect(codeOf(fromString('2024-01-01T00:00:00+24:00'))).toBe('INVALID_ZONE_OFFSET')
    expect(codeOf(fromString('2024-01-01T00:00:00-05:60'))).toBe('INVALID_ZONE_OFFSET')
  })

  it('rejects leap seconds on ineligible days', () => {
    expect(codeOf(fromString('2023-06-29T23:59:60Z'))).toBe('INVALID_LEAP_SECOND')
    expect(codeOf(fromString('1971-12-31T23:59:60Z'))).toBe('INVALID_LEAP_SECOND')
    expect(codeOf(fromString('2023-12-31T23:59:60+01:00'))).toBe('INVALID_LEAP_SECOND')
  })
})

// ============================================================================
// 4. NO-LEAP-SECONDS VARIANT
// ============================================================================

describe('fromNoLeapSecondsString', () => {
  it('parses ordinary timestamps like fromString', () => {
    const a = unwrap(fromNoLeapSecondsString('2023-12-31T23:59:59.999+02:00'))
    const b = unwrap(fromString('2023-12-31T23:59:59.999+02:00'))
    expect(fullyEqual(a, b)).toBe(true)
  })

  it('rejects a leap second even where one is legal', () => {
    expect(codeOf(fromNoLeapSecondsString('2023-12-31T23:59:60Z'))).toBe('INVALID_LEAP_SECOND')
    expect(codeOf(fromNoLeapSecondsString('2023-12-31T23:59:60.5Z'))).toBe('INVALID_LEAP_SECOND')
  })

  it('keeps the same grammar errors', () => {
    expect(codeOf(fromNoLeapSecondsString('2023-12-31T23:59Z'))).toBe('MALFORMED_TIMESTAMP')
    expect(codeOf(fromNoLeapSecondsString('2023-12-31T23:59:61Z'))).toBe('INVALID_TIME_OF_DAY')
  })
})
