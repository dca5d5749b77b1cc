/**
 * Textual Codec
 *
 * RFC 3339 profile: `YYYY-MM-DDThh:mm:ss[.fraction](Z|±hh:mm)`.
 *
 * - the year may have any number of digits and an optional sign; only 0-9999
 *   is in range
 * - `-00:00` means "UTC, local offset unknown"; `Z` and `+00:00` mean offset zero
 * - seconds may read 60.x only where a leap second is legal
 *
 * Formatting works on the local fields, so parsing then formatting reproduces
 * the written date, time, fraction digits and offset.
 */

import { Result, Err } from './result'
import {
  TimestampError,
  MalformedTimestampError,
} from './errors'
import { makeDate, pad2, pad4 } from './calendar'
import { MAX_FRACTION_DIGITS, Seconds } from './seconds'
import { ZoneOffset, ZONE_OFFSET_ZERO, makeZoneOffset, formatZoneOffset } from './zone-offset'
import { Timestamp } from './timestamp'
import {
  fromLocalDateTimeOffset,
  localDate,
  localOffset,
  localTimeOfDay,
  makeTimeOfDay,
} from './local-time'

const TIMESTAMP_PATTERN =
  /^([+-]?\d+)-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/

// ============================================================================
// Parsing
// ============================================================================

function parse(text: string, allowLeapSecond: boolean): Result<Timestamp, TimestampError> {
  const match = TIMESTAMP_PATTERN.exec(text)
  if (!match) return Err(new MalformedTimestampError(`Invalid timestamp format: '${text}'`))

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zulu, sign, offsetHour, offsetMinute] = match
  if (fraction !== undefined && fraction.length > MAX_FRACTION_DIGITS)
    return Err(new MalformedTimestampError(`Too many fractional second digits (max ${MAX_FRACTION_DIGITS}): '${text}'`))

  const date = makeDate(parseInt(yearText!, 10), parseInt(monthText!, 10), parseInt(dayText!, 10))
  if (!date.ok) return date

  const second = Seconds.parse(fraction === undefined ? secondText! : `${secondText!}.${fraction}`)
  const time = makeTimeOfDay(parseInt(hourText!, 10), parseInt(minuteText!, 10), second, { allowLeapSecond })
  if (!time.ok) return time

  let offset: ZoneOffset | null = ZONE_OFFSET_ZERO
  if (zulu === undefined) {
    const hour = parseInt(offsetHour!, 10)
    const minute = parseInt(offsetMinute!, 10)
    if (sign === '-' && hour === 0 && minute === 0) {
      offset = null
    } else {
      const parsed = makeZoneOffset(sign === '-' ? -1 : 1, hour, minute)
      if (!parsed.ok) return parsed
      offset = parsed.value
    }
  }

  return fromLocalDateTimeOffset(date.value, time.value, offset)
}

export function fromString(text: string): Result<Timestamp, TimestampError> {
  return parse(text, true)
}

/** Same grammar; a seconds field of 60 or more is always an InvalidLeapSecondError. */
export function fromNoLeapSecondsString(text: string): Result<Timestamp, TimestampError> {
  return parse(text, false)
}

// ============================================================================
// Formatting
// ============================================================================

export function formatTimestamp(ts: Timestamp): string {
  const date = localDate(ts)
  const time = localTimeOfDay(ts)
  const offset = localOffset(ts)

  const fraction = time.second.fractionDigits()
  const secondText = pad2(time.second.integerPart()) + (fraction === '' ? '' : '.' + fraction)
  const offsetText = offset === null ? '-00:00' : formatZoneOffset(offset)

  return `${pad4(date.year)}-${pad2(date.month)}-${pad2(date.day)}T${pad2(time.hour)}:${pad2(time.minute)}:${secondText}${offsetText}`
}
