/**
 * Decimal Seconds
 *
 * Exact decimal quantity of seconds backed by decimal.js. Every value also
 * carries its scale: the number of fractional digits it was written with,
 * trailing zeros included. `60.500` and `60.5` are the same number of seconds
 * but not the same Seconds value.
 *
 * Arithmetic never rounds. Results take the larger scale of their operands.
 */

import Decimal from 'decimal.js'

/** Largest scale accepted from a literal. */
export const MAX_FRACTION_DIGITS = 20

// 40 significant digits covers the epoch-second span of years 0-9999 at full scale
const DecimalSeconds = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_DOWN })

const LITERAL = /^(-?)(\d+)(?:\.(\d+))?$/

export class Seconds {
  static readonly ZERO: Seconds = new Seconds(new DecimalSeconds(0), 0)

  private readonly value: Decimal
  readonly scale: number

  private constructor(value: Decimal, scale: number) {
    // no negative zero
    this.value = value.isZero() ? new DecimalSeconds(0) : value
    this.scale = scale
  }

  /** Parse a plain decimal literal, keeping its scale. Throws RangeError. */
  static parse(text: string): Seconds {
    const match = LITERAL.exec(text)
    if (!match) throw new RangeError(`Invalid decimal seconds literal: '${text}'`)
    const scale = match[3]?.length ?? 0
    if (scale > MAX_FRACTION_DIGITS) {
      throw new RangeError(`Too many fractional digits (max ${MAX_FRACTION_DIGITS}): '${text}'`)
    }
    return new Seconds(new DecimalSeconds(text), scale)
  }

  /** One unit in the last place at the given scale: 10^-scale. */
  static ulp(scale: number): Seconds {
    return new Seconds(new DecimalSeconds(`1e-${scale}`), scale)
  }

  plus(other: Seconds): Seconds {
    return new Seconds(this.value.plus(other.value), Math.max(this.scale, other.scale))
  }

  minus(other: Seconds): Seconds {
    return new Seconds(this.value.minus(other.value), Math.max(this.scale, other.scale))
  }

  timesInteger(n: number): Seconds {
    return new Seconds(this.value.times(n), this.scale)
  }

  /** Numeric ordering; scale is ignored. */
  compare(other: Seconds): number {
    return this.value.comparedTo(other.value)
  }

  lt(other: Seconds): boolean {
    return this.value.lt(other.value)
  }

  gte(other: Seconds): boolean {
    return this.value.gte(other.value)
  }

  isNegative(): boolean {
    return this.value.isNegative() && !this.value.isZero()
  }

  /** Same number and same scale. */
  equals(other: Seconds): boolean {
    return this.scale === other.scale && this.value.eq(other.value)
  }

  /** Same number, whatever the scale. */
  sameValue(other: Seconds): boolean {
    return this.value.eq(other.value)
  }

  /** floor(this / n) for a positive integer n. */
  floorDiv(n: number): number {
    return this.value.div(n).toDecimalPlaces(0, Decimal.ROUND_FLOOR).toNumber()
  }

  /** this - n * floorDiv(n): always in [0, n), scale kept. */
  mod(n: number): Seconds {
    return new Seconds(this.value.minus(new DecimalSeconds(n).times(this.floorDiv(n))), this.scale)
  }

  /** Integer part, rounded towards negative infinity. */
  integerPart(): number {
    return this.value.toDecimalPlaces(0, Decimal.ROUND_FLOOR).toNumber()
  }

  /** The fractional digits exactly as carried, '' when the scale is 0. */
  fractionDigits(): string {
    const text = this.toString()
    const dot = text.indexOf('.')
    return dot === -1 ? '' : text.substring(dot + 1)
  }

  toString(): string {
    return this.value.toFixed(this.scale)
  }
}

/**
 * Build a Seconds value from a decimal literal (`-12`, `59.250`), a safe
 * integer, or a bigint. Throws RangeError on anything else.
 */
export function seconds(input: string | number | bigint): Seconds {
  if (typeof input === 'number' && !Number.isSafeInteger(input)) {
    throw new RangeError(`Seconds must be built from a safe integer or a decimal string, got ${input}`)
  }
  return Seconds.parse(typeof input === 'string' ? input : input.toString())
}
