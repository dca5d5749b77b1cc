/**
 * Instant Model
 *
 * A Timestamp is an opaque, immutable point in time plus the local offset it
 * was observed in. Its canonical decomposition is the Instant:
 *
 *   epochDays            days since 2000-01-01 (UTC)
 *   utcTimeOfDaySeconds  0 <= s < 86401, >= 86400 only during a leap second
 *   localOffsetMinutes   minutes ahead of UTC, or null when unknown
 *
 * Every Timestamp's local date (UTC shifted by the offset) also lies within
 * years 0-9999, so the local fields of any Timestamp can always be formatted.
 */

import { Result, Ok, Err } from './result'
import {
  TimestampError,
  InvariantViolation,
  InvalidLeapSecondError,
  InvalidTimeOfDayError,
  InvalidZoneOffsetError,
  OutOfRangeError,
} from './errors'
import { isInDayRange, MIN_EPOCH_DAYS, MAX_EPOCH_DAYS } from './calendar'
import { Seconds, seconds } from './seconds'
import {
  SECONDS_PER_DAY,
  clampUtcTimeOfDaySeconds,
  isLeapSecondDay,
  isPastMidnight,
} from './leap-seconds'
import { isValidOffsetMinutes } from './zone-offset'

export interface Instant {
  readonly epochDays: number
  readonly utcTimeOfDaySeconds: Seconds
  readonly localOffsetMinutes: number | null
}

const LEAP_DAY_LENGTH = seconds(SECONDS_PER_DAY + 1)

// ============================================================================
// Validation
// ============================================================================

/**
 * Epoch day of the local calendar date. A leap second is attributed to the
 * local minute that corresponds to 23:59 UTC.
 */
function localEpochDays(instant: Instant): number {
  if (instant.localOffsetMinutes === null) return instant.epochDays
  const shifted = clampUtcTimeOfDaySeconds(instant.utcTimeOfDaySeconds)
    .plus(seconds(instant.localOffsetMinutes * 60))
  return instant.epochDays + shifted.floorDiv(SECONDS_PER_DAY)
}

function validateInstant(instant: Instant): TimestampError | null {
  const { epochDays, utcTimeOfDaySeconds: tod, localOffsetMinutes } = instant

  if (!isInDayRange(epochDays))
    return new OutOfRangeError(`Epoch day ${epochDays} is outside ${MIN_EPOCH_DAYS}..${MAX_EPOCH_DAYS}`)
  if (tod.isNegative() || tod.gte(LEAP_DAY_LENGTH))
    return new InvalidTimeOfDayError(`UTC time of day ${tod.toString()} is outside [0, 86401)`)
  if (isPastMidnight(tod) && !isLeapSecondDay(epochDays))
    return new InvalidLeapSecondError(`Epoch day ${epochDays} cannot end in a leap second (${tod.toString()})`)
  if (localOffsetMinutes !== null && !isValidOffsetMinutes(localOffsetMinutes))
    return new InvalidZoneOffsetError(`Invalid local offset: ${localOffsetMinutes} minutes`)
  if (!isInDayRange(localEpochDays(instant)))
    return new OutOfRangeError(`Local date of epoch day ${epochDays} at offset ${localOffsetMinutes} is outside years 0..9999`)
  return null
}

// ============================================================================
// Timestamp
// ============================================================================

export class Timestamp {
  private readonly instant: Instant

  private constructor(instant: Instant) {
    this.instant = Object.freeze({ ...instant })
  }

  /** Recoverable construction: the Result carries why the Instant is not a timestamp. */
  static from(instant: Instant): Result<Timestamp, TimestampError> {
    const error = validateInstant(instant)
    if (error) return Err(error)
    return Ok(new Timestamp(instant))
  }

  get epochDays(): number {
    return this.instant.epochDays
  }

  get utcTimeOfDaySeconds(): Seconds {
    return this.instant.utcTimeOfDaySeconds
  }

  get localOffsetMinutes(): number | null {
    return this.instant.localOffsetMinutes
  }

  toInstant(): Instant {
    return this.instant
  }
}

// ============================================================================
// Conversions
// ============================================================================

export function toInstant(ts: Timestamp): Instant {
  return ts.toInstant()
}

export function tryFromInstant(instant: Instant): Result<Timestamp, TimestampError> {
  return Timestamp.from(instant)
}

/** Throws InvariantViolation when the Instant describes no timestamp. */
export function fromInstant(instant: Instant): Timestamp {
  const result = Timestamp.from(instant)
  if (!result.ok) throw new InvariantViolation(result.error.code, `Invalid instant: ${result.error.message}`)
  return result.value
}

export const EPOCH: Timestamp = fromInstant({
  epochDays: 0,
  utcTimeOfDaySeconds: Seconds.ZERO,
  localOffsetMinutes: 0,
})

// ============================================================================
// Projections
// ============================================================================

export function epochDays(ts: Timestamp): number {
  return ts.epochDays
}

export function utcTimeOfDaySeconds(ts: Timestamp): Seconds {
  return ts.utcTimeOfDaySeconds
}

export function localOffsetMinutes(ts: Timestamp): number | null {
  return ts.localOffsetMinutes
}

// ============================================================================
// Equivalence & Ordering
// ============================================================================

/** Same point in time; offsets and seconds precision are ignored. */
export function temporallyEqual(a: Timestamp, b: Timestamp): boolean {
  return a.epochDays === b.epochDays && a.utcTimeOfDaySeconds.sameValue(b.utcTimeOfDaySeconds)
}

/** Same point in time, same seconds precision, same offset (unknown only equals unknown). */
export function fullyEqual(a: Timestamp, b: Timestamp): boolean {
  return (
    a.epochDays === b.epochDays &&
    a.utcTimeOfDaySeconds.equals(b.utcTimeOfDaySeconds) &&
    a.localOffsetMinutes === b.localOffsetMinutes
  )
}

/** Orders by UTC instant; leap seconds sort after 23:59:59.x of their day. */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  if (a.epochDays !== b.epochDays) return a.epochDays < b.epochDays ? -1 : 1
  return a.utcTimeOfDaySeconds.compare(b.utcTimeOfDaySeconds)
}

// ============================================================================
// Leap Seconds
// ============================================================================

export function inLeapSecond(ts: Timestamp): boolean {
  return isPastMidnight(ts.utcTimeOfDaySeconds)
}

/** Clamps a leap second to 23:59:59.9…9 at the same precision, keeping the offset. */
export function withoutLeapSeconds(ts: Timestamp): Timestamp {
  if (!inLeapSecond(ts)) return ts
  return fromInstant({
    ...ts.toInstant(),
    utcTimeOfDaySeconds: clampUtcTimeOfDaySeconds(ts.utcTimeOfDaySeconds),
  })
}
