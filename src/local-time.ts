/**
 * Local/UTC Offset Conversion
 *
 * Maps timestamps to and from (date, time of day, offset) triples. The local
 * fields are the UTC fields shifted by the attached offset, with day rollover.
 * A leap second is only expressible where the UTC wall clock reads 23:59:60.x;
 * at a non-zero offset it shows up at the local minute matching 23:59 UTC.
 */

import { Result, Ok, Err, unwrap } from './result'
import {
  TimestampError,
  InvalidLeapSecondError,
  InvalidTimeOfDayError,
} from './errors'
import { CalendarDate, dateFromDays, daysFromDate } from './calendar'
import { Seconds, seconds } from './seconds'
import { SECONDS_PER_DAY, isLeapSecondDay, isPastMidnight } from './leap-seconds'
import { ZoneOffset, makeZoneOffset, zoneOffsetFromMinutes, zoneOffsetToMinutes } from './zone-offset'
import { Timestamp } from './timestamp'

export interface TimeOfDay {
  readonly hour: number
  readonly minute: number
  /** [0, 60), or [60, 61) during a positive leap second */
  readonly second: Seconds
}

const SIXTY = seconds(60)
const SIXTY_ONE = seconds(61)
/** Start of 23:59, the only minute that can hold a leap second. */
const LAST_MINUTE_START = SECONDS_PER_DAY - 60

// ============================================================================
// Time of Day
// ============================================================================

export interface TimeOfDayOptions {
  /** Accept seconds in [60, 61). Whether the day allows it is checked later. Default true. */
  allowLeapSecond?: boolean
}

export function makeTimeOfDay(
  hour: number,
  minute: number,
  second: Seconds,
  options?: TimeOfDayOptions
): Result<TimeOfDay, InvalidTimeOfDayError | InvalidLeapSecondError> {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23)
    return Err(new InvalidTimeOfDayError(`Invalid hour: ${hour}`))
  if (!Number.isInteger(minute) || minute < 0 || minute > 59)
    return Err(new InvalidTimeOfDayError(`Invalid minute: ${minute}`))
  if (second.isNegative() || second.gte(SIXTY_ONE))
    return Err(new InvalidTimeOfDayError(`Invalid second: ${second.toString()}`))
  if (second.gte(SIXTY) && !(options?.allowLeapSecond ?? true))
    return Err(new InvalidLeapSecondError(`Leap seconds are not permitted: ${second.toString()}`))
  return Ok({ hour, minute, second })
}

// ============================================================================
// Local -> Timestamp
// ============================================================================

/**
 * Interpret `date`/`time` as wall-clock time at `offset` (null: UTC with the
 * offset unknown) and attach the offset to the resulting timestamp.
 */
export function fromLocalDateTimeOffset(
  date: CalendarDate,
  time: TimeOfDay,
  offset: ZoneOffset | null
): Result<Timestamp, TimestampError> {
  const days = daysFromDate(date)
  if (!days.ok) return days

  const checkedTime = makeTimeOfDay(time.hour, time.minute, time.second)
  if (!checkedTime.ok) return checkedTime

  let offsetMinutes: number | null = null
  if (offset !== null) {
    const checkedOffset = makeZoneOffset(offset.sign, offset.hour, offset.minute)
    if (!checkedOffset.ok) return checkedOffset
    offsetMinutes = zoneOffsetToMinutes(checkedOffset.value)
  }

  // Start of the local minute, expressed in UTC seconds relative to the local day
  const minuteStart = seconds(time.hour * 3600 + time.minute * 60 - (offsetMinutes ?? 0) * 60)

  if (!time.second.gte(SIXTY)) {
    const utc = minuteStart.plus(time.second)
    return Timestamp.from({
      epochDays: days.value + utc.floorDiv(SECONDS_PER_DAY),
      utcTimeOfDaySeconds: utc.mod(SECONDS_PER_DAY),
      localOffsetMinutes: offsetMinutes,
    })
  }

  const utcMinuteStart = minuteStart.mod(SECONDS_PER_DAY)
  const utcDays = days.value + minuteStart.floorDiv(SECONDS_PER_DAY)
  if (utcMinuteStart.integerPart() !== LAST_MINUTE_START)
    return Err(new InvalidLeapSecondError(
      `Leap second outside 23:59 UTC: ${time.hour}:${time.minute}:${time.second.toString()} at offset ${offsetMinutes ?? 'unknown'}`
    ))
  if (!isLeapSecondDay(utcDays))
    return Err(new InvalidLeapSecondError(`Epoch day ${utcDays} cannot end in a leap second`))

  return Timestamp.from({
    epochDays: utcDays,
    utcTimeOfDaySeconds: utcMinuteStart.plus(time.second),
    localOffsetMinutes: offsetMinutes,
  })
}

// ============================================================================
// Timestamp -> Local
// ============================================================================

interface WallClock {
  epochDays: number
  minuteOfDay: number
  second: Seconds
}

function wallClockAt(ts: Timestamp, offsetMinutes: number): WallClock {
  const tod = ts.utcTimeOfDaySeconds

  if (isPastMidnight(tod)) {
    const minuteStart = seconds(LAST_MINUTE_START + offsetMinutes * 60)
    return {
      epochDays: ts.epochDays + minuteStart.floorDiv(SECONDS_PER_DAY),
      minuteOfDay: minuteStart.mod(SECONDS_PER_DAY).integerPart() / 60,
      second: tod.minus(seconds(LAST_MINUTE_START)),
    }
  }

  const shifted = tod.plus(seconds(offsetMinutes * 60))
  const local = shifted.mod(SECONDS_PER_DAY)
  const minuteOfDay = local.floorDiv(60)
  return {
    epochDays: ts.epochDays + shifted.floorDiv(SECONDS_PER_DAY),
    minuteOfDay,
    second: local.minus(seconds(minuteOfDay * 60)),
  }
}

function dateOf(clock: WallClock): CalendarDate {
  // every Timestamp's local day is in range by construction
  return unwrap(dateFromDays(clock.epochDays))
}

function timeOf(clock: WallClock): TimeOfDay {
  return {
    hour: Math.floor(clock.minuteOfDay / 60),
    minute: clock.minuteOfDay % 60,
    second: clock.second,
  }
}

export function utcDate(ts: Timestamp): CalendarDate {
  return dateOf(wallClockAt(ts, 0))
}

export function utcTimeOfDay(ts: Timestamp): TimeOfDay {
  return timeOf(wallClockAt(ts, 0))
}

/** The date at the attached offset; the UTC date when the offset is unknown. */
export function localDate(ts: Timestamp): CalendarDate {
  return dateOf(wallClockAt(ts, ts.localOffsetMinutes ?? 0))
}

export function localTimeOfDay(ts: Timestamp): TimeOfDay {
  return timeOf(wallClockAt(ts, ts.localOffsetMinutes ?? 0))
}

/** null when the offset is unknown. */
export function localOffset(ts: Timestamp): ZoneOffset | null {
  if (ts.localOffsetMinutes === null) return null
  return unwrap(zoneOffsetFromMinutes(ts.localOffsetMinutes))
}

/**
 * Same instant, different attached offset. Fails only when the new local date
 * would fall outside years 0-9999.
 */
export function withLocalOffset(ts: Timestamp, offset: ZoneOffset | null): Result<Timestamp, TimestampError> {
  if (offset === null) return Timestamp.from({ ...ts.toInstant(), localOffsetMinutes: null })
  const checked = makeZoneOffset(offset.sign, offset.hour, offset.minute)
  if (!checked.ok) return checked
  return Timestamp.from({ ...ts.toInstant(), localOffsetMinutes: zoneOffsetToMinutes(checked.value) })
}
