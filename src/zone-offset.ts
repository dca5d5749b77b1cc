/**
 * Zone Offsets
 *
 * A fixed, signed hour/minute displacement of local time from UTC.
 * There is no signed zero: -00:00 is normalized to +00:00 on construction.
 * The unknown-offset state is modeled by callers as `null`, never as a ZoneOffset.
 */

import { Result, Ok, Err } from './result'
import { InvalidZoneOffsetError } from './errors'
import { pad2 } from './calendar'

export interface ZoneOffset {
  readonly sign: 1 | -1
  readonly hour: number
  readonly minute: number
}

export const ZONE_OFFSET_ZERO: ZoneOffset = Object.freeze<ZoneOffset>({ sign: 1, hour: 0, minute: 0 })

/** Offsets are strictly less than one day in either direction. */
export const MAX_OFFSET_MINUTES = 23 * 60 + 59

export function makeZoneOffset(sign: 1 | -1, hour: number, minute: number): Result<ZoneOffset, InvalidZoneOffsetError> {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23)
    return Err(new InvalidZoneOffsetError(`Invalid offset hour: ${hour}`))
  if (!Number.isInteger(minute) || minute < 0 || minute > 59)
    return Err(new InvalidZoneOffsetError(`Invalid offset minute: ${minute}`))
  if (hour === 0 && minute === 0) return Ok(ZONE_OFFSET_ZERO)
  return Ok({ sign, hour, minute })
}

export function zoneOffsetToMinutes(offset: ZoneOffset): number {
  return offset.sign * (offset.hour * 60 + offset.minute)
}

export function zoneOffsetFromMinutes(minutes: number): Result<ZoneOffset, InvalidZoneOffsetError> {
  if (!Number.isInteger(minutes) || Math.abs(minutes) > MAX_OFFSET_MINUTES)
    return Err(new InvalidZoneOffsetError(`Offset of ${minutes} minutes is outside ±${MAX_OFFSET_MINUTES}`))
  const magnitude = Math.abs(minutes)
  return makeZoneOffset(minutes < 0 ? -1 : 1, Math.floor(magnitude / 60), magnitude % 60)
}

export function isValidOffsetMinutes(minutes: number): boolean {
  return Number.isInteger(minutes) && Math.abs(minutes) <= MAX_OFFSET_MINUTES
}

export function zoneOffsetEquals(a: ZoneOffset, b: ZoneOffset): boolean {
  return zoneOffsetToMinutes(a) === zoneOffsetToMinutes(b)
}

/** `Z` for the zero offset, `±hh:mm` otherwise. */
export function formatZoneOffset(offset: ZoneOffset): string {
  if (zoneOffsetToMinutes(offset) === 0) return 'Z'
  return `${offset.sign < 0 ? '-' : '+'}${pad2(offset.hour)}:${pad2(offset.minute)}`
}
