/**
 * Duration Conversion
 *
 * Timestamps as a count of seconds since 2000-01-01T00:00:00Z. Every day is
 * 86400 seconds long here: leap seconds are clamped away before counting, so
 * the count stands still for the length of a leap second.
 */

import { Seconds, seconds } from './seconds'
import { SECONDS_PER_DAY, clampUtcTimeOfDaySeconds } from './leap-seconds'
import { Timestamp, fromInstant } from './timestamp'

export function toEpochSeconds(ts: Timestamp): Seconds {
  return seconds(ts.epochDays)
    .timesInteger(SECONDS_PER_DAY)
    .plus(clampUtcTimeOfDaySeconds(ts.utcTimeOfDaySeconds))
}

/**
 * Inverse of toEpochSeconds, at offset +00:00. Throws InvariantViolation
 * (OUT_OF_RANGE) outside years 0-9999.
 */
export function fromEpochSeconds(epochSeconds: Seconds): Timestamp {
  return fromInstant({
    epochDays: epochSeconds.floorDiv(SECONDS_PER_DAY),
    utcTimeOfDaySeconds: epochSeconds.mod(SECONDS_PER_DAY),
    localOffsetMinutes: 0,
  })
}

/** Exact `toEpochSeconds(a) - toEpochSeconds(b)`. */
export function subtract(a: Timestamp, b: Timestamp): Seconds {
  return toEpochSeconds(a).minus(toEpochSeconds(b))
}
