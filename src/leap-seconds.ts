/**
 * Leap-Second Policy
 *
 * A positive leap second (UTC time of day in [86400, 86401)) may only occur on
 * the last day of a month, from 1972 onward. Negative leap seconds are not
 * modeled.
 */

import { dateFromDays, isLastDayOfMonth } from './calendar'
import { Seconds, seconds } from './seconds'

export const SECONDS_PER_DAY = 86400
export const FIRST_LEAP_SECOND_YEAR = 1972

const DAY = seconds(SECONDS_PER_DAY)

export function isLeapSecondDay(epochDays: number): boolean {
  const date = dateFromDays(epochDays)
  if (!date.ok) return false
  return date.value.year >= FIRST_LEAP_SECOND_YEAR && isLastDayOfMonth(date.value)
}

/** True when a UTC time of day has run past midnight into a leap second. */
export function isPastMidnight(utcTimeOfDaySeconds: Seconds): boolean {
  return utcTimeOfDaySeconds.gte(DAY)
}

/**
 * Greatest value below 86400 at the same scale when `s` reaches 86400,
 * `s` itself otherwise. `86400.25` clamps to `86399.99`, `86400` to `86399`.
 */
export function clampUtcTimeOfDaySeconds(s: Seconds): Seconds {
  if (!isPastMidnight(s)) return s
  return DAY.minus(Seconds.ulp(s.scale))
}
