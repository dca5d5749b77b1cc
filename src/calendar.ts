/**
 * Calendar Engine
 *
 * Exact conversion between proleptic Gregorian dates and a day count relative
 * to 2000-01-01. Uses Julian Day Number arithmetic throughout to avoid
 * month-length edge cases; no iteration, no floating-point intermediates.
 * Supported years: 0 (1 BC) through 9999.
 */

import { Result, Ok, Err } from './result'
import { InvalidDateError, OutOfRangeError } from './errors'

// ============================================================================
// Types & Constants
// ============================================================================

export interface CalendarDate {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const MIN_YEAR = 0
export const MAX_YEAR = 9999

/** Julian Day Number of 2000-01-01, day 0 of the epoch. */
const EPOCH_JDN = 2451545

/** 0000-01-01 */
export const MIN_EPOCH_DAYS = -730485
/** 9999-12-31 */
export const MAX_EPOCH_DAYS = 2921939

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function isLastDayOfMonth(date: CalendarDate): boolean {
  return date.day === daysInMonth(date.year, date.month)
}

export function isInDayRange(days: number): boolean {
  return Number.isSafeInteger(days) && days >= MIN_EPOCH_DAYS && days <= MAX_EPOCH_DAYS
}

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): CalendarDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Validation & Conversion
// ============================================================================

export function makeDate(
  year: number,
  month: number,
  day: number
): Result<CalendarDate, InvalidDateError | OutOfRangeError> {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day))
    return Err(new InvalidDateError(`Date fields must be integers: ${year}-${month}-${day}`))
  if (year < MIN_YEAR || year > MAX_YEAR)
    return Err(new OutOfRangeError(`Year ${year} is outside ${MIN_YEAR}..${MAX_YEAR}`))
  if (month < 1 || month > 12)
    return Err(new InvalidDateError(`Invalid month ${month} in ${formatFields(year, month, day)}`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new InvalidDateError(`Invalid day ${day} in ${formatFields(year, month, day)}`))
  return Ok({ year, month, day })
}

/** Days since 2000-01-01 (negative before it). */
export function daysFromDate(date: CalendarDate): Result<number, InvalidDateError | OutOfRangeError> {
  const checked = makeDate(date.year, date.month, date.day)
  if (!checked.ok) return checked
  return Ok(dateToJDN(date.year, date.month, date.day) - EPOCH_JDN)
}

export function dateFromDays(days: number): Result<CalendarDate, OutOfRangeError> {
  if (!isInDayRange(days))
    return Err(new OutOfRangeError(`Epoch day ${days} is outside ${MIN_EPOCH_DAYS}..${MAX_EPOCH_DAYS}`))
  return Ok(jdnToDate(days + EPOCH_JDN))
}

// ============================================================================
// Date Arithmetic
// ============================================================================

export function addDays(date: CalendarDate, n: number): Result<CalendarDate, InvalidDateError | OutOfRangeError> {
  const days = daysFromDate(date)
  if (!days.ok) return days
  return dateFromDays(days.value + n)
}

/** Signed day count from a to b; both dates must be valid. */
export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day
}

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: CalendarDate): Weekday {
  // JDN 0 is a Monday
  const jdn = dateToJDN(date.year, date.month, date.day)
  return WEEKDAYS[((jdn % 7) + 7) % 7]!
}

// ============================================================================
// Formatting
// ============================================================================

function formatFields(year: number, month: number, day: number): string {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}`
}

export function formatDate(date: CalendarDate): string {
  return formatFields(date.year, date.month, date.day)
}
