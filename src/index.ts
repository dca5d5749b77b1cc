/**
 * leapstamp
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  TimestampError, TimestampErrorCode,
  InvalidDateError, OutOfRangeError,
  InvalidTimeOfDayError, InvalidLeapSecondError, InvalidZoneOffsetError,
  MalformedTimestampError, InvariantViolation,
} from './errors'
export type { TimestampErrorCode as TimestampErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Decimal seconds
export { Seconds, seconds, MAX_FRACTION_DIGITS } from './seconds'

// Calendar engine
export type { CalendarDate, Weekday } from './calendar'
export {
  MIN_YEAR, MAX_YEAR, MIN_EPOCH_DAYS, MAX_EPOCH_DAYS,
  isLeapYear, daysInMonth, daysInYear, isLastDayOfMonth,
  makeDate, daysFromDate, dateFromDays,
  addDays, daysBetween, compareDates, dayOfWeek, formatDate,
} from './calendar'

// Zone offsets
export type { ZoneOffset } from './zone-offset'
export {
  ZONE_OFFSET_ZERO, MAX_OFFSET_MINUTES,
  makeZoneOffset, zoneOffsetToMinutes, zoneOffsetFromMinutes,
  zoneOffsetEquals, formatZoneOffset,
} from './zone-offset'

// Leap-second policy
export {
  SECONDS_PER_DAY, FIRST_LEAP_SECOND_YEAR,
  isLeapSecondDay, clampUtcTimeOfDaySeconds,
} from './leap-seconds'

// Instant model
export type { Instant } from './timestamp'
export {
  Timestamp, EPOCH,
  toInstant, fromInstant, tryFromInstant,
  epochDays, utcTimeOfDaySeconds, localOffsetMinutes,
  temporallyEqual, fullyEqual, compareTimestamps,
  inLeapSecond, withoutLeapSeconds,
} from './timestamp'

// Local/UTC offset conversion
export type { TimeOfDay, TimeOfDayOptions } from './local-time'
export {
  makeTimeOfDay, fromLocalDateTimeOffset,
  utcDate, utcTimeOfDay, localDate, localTimeOfDay,
  localOffset, withLocalOffset,
} from './local-time'

// Duration conversion
export { toEpochSeconds, fromEpochSeconds, subtract } from './epoch-seconds'

// Textual codec
export { fromString, fromNoLeapSecondsString, formatTimestamp } from './rfc3339'
