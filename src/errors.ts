/**
 * Consolidated error system for leapstamp.
 *
 * Recoverable errors extend TimestampError, which carries a typed error code,
 * and travel inside a Result. InvariantViolation is thrown instead, by the
 * conversions that treat an impossible value as a programming error.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TimestampErrorCode = {
  // Calendar
  INVALID_DATE: 'INVALID_DATE',
  OUT_OF_RANGE: 'OUT_OF_RANGE',

  // Time of day & offsets
  INVALID_TIME_OF_DAY: 'INVALID_TIME_OF_DAY',
  INVALID_LEAP_SECOND: 'INVALID_LEAP_SECOND',
  INVALID_ZONE_OFFSET: 'INVALID_ZONE_OFFSET',

  // Textual codec
  MALFORMED_TIMESTAMP: 'MALFORMED_TIMESTAMP',
} as const

export type TimestampErrorCode = (typeof TimestampErrorCode)[keyof typeof TimestampErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimestampError extends Error {
  readonly code: TimestampErrorCode

  constructor(code: TimestampErrorCode, message: string) {
    super(message)
    this.name = 'TimestampError'
    this.code = code
  }
}

// ============================================================================
// Calendar Errors
// ============================================================================

export class InvalidDateError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

export class OutOfRangeError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.OUT_OF_RANGE, message)
    this.name = 'OutOfRangeError'
  }
}

// ============================================================================
// Time of Day Errors
// ============================================================================

export class InvalidTimeOfDayError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_TIME_OF_DAY, message)
    this.name = 'InvalidTimeOfDayError'
  }
}

export class InvalidLeapSecondError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_LEAP_SECOND, message)
    this.name = 'InvalidLeapSecondError'
  }
}

export class InvalidZoneOffsetError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.INVALID_ZONE_OFFSET, message)
    this.name = 'InvalidZoneOffsetError'
  }
}

// ============================================================================
// Codec Errors
// ============================================================================

export class MalformedTimestampError extends TimestampError {
  constructor(message: string) {
    super(TimestampErrorCode.MALFORMED_TIMESTAMP, message)
    this.name = 'MalformedTimestampError'
  }
}

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * Thrown when a value that must describe a timestamp does not.
 * Deliberately not a TimestampError: callers are not expected to recover.
 */
export class InvariantViolation extends Error {
  readonly code: TimestampErrorCode

  constructor(code: TimestampErrorCode, message: string) {
    super(message)
    this.name = 'InvariantViolation'
    this.code = code
  }
}
