/**
 * Instant
 *
 * The plain UTC-based time value: whole seconds since the epoch plus a
 * nanosecond remainder. ZonedTime falls back to it for every comparison and
 * for fixed-length arithmetic.
 */

import { type Result, Ok, Err, unwrap } from './result'
import { ParseError, InvalidCivilTimeError } from './errors'
import {
  type CivilTime,
  type AdvanceOptions,
  civilToEpochSeconds,
  epochSecondsToCivil,
  splitSeconds,
  advanceCivil,
  validateCivilTime,
  parseFraction,
  NANOS_PER_SECOND,
} from './civil-time'
import { strftime } from './strftime'
import { getConfig } from './config'
import type { TimeLike, TimeComparable } from './types'

const INSTANT_PATTERN =
  /^(-?\d{4,6})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|UTC|[+-]\d{2}(?::?\d{2})?)$/i

export class Instant implements TimeLike {
  readonly epochSeconds: number
  readonly nanosecond: number

  private constructor(epochSeconds: number, nanosecond: number) {
    this.epochSeconds = epochSeconds
    this.nanosecond = nanosecond
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static of(epochSeconds: number, nanosecond = 0): Instant {
    if (!Number.isInteger(epochSeconds) || !Number.isInteger(nanosecond)) {
      throw new InvalidCivilTimeError(`Instant fields must be integers: ${epochSeconds}, ${nanosecond}`)
    }
    const carry = Math.floor(nanosecond / NANOS_PER_SECOND)
    return new Instant(epochSeconds + carry, nanosecond - carry * NANOS_PER_SECOND)
  }

  /** Accepts fractional seconds */
  static fromEpochSeconds(seconds: number): Instant {
    if (!Number.isFinite(seconds)) {
      throw new InvalidCivilTimeError(`Invalid epoch seconds: ${seconds}`)
    }
    const { whole, nanos } = splitSeconds(seconds)
    return new Instant(whole, nanos)
  }

  static fromEpochMilliseconds(ms: number): Instant {
    if (!Number.isFinite(ms)) {
      throw new InvalidCivilTimeError(`Invalid epoch milliseconds: ${ms}`)
    }
    const whole = Math.floor(ms / 1000)
    return Instant.of(whole, Math.round((ms - whole * 1000) * 1_000_000))
  }

  static fromDate(date: Date): Instant {
    return Instant.fromEpochMilliseconds(date.getTime())
  }

  /** Read wall-clock fields as UTC */
  static fromCivil(fields: CivilTime): Instant {
    const valid = validateCivilTime(fields)
    return new Instant(civilToEpochSeconds(valid), valid.nanosecond)
  }

  static now(): Instant {
    return Instant.fromEpochMilliseconds(Date.now())
  }

  static parse(str: string): Instant {
    return unwrap(parseInstant(str))
  }

  // ==========================================================================
  // TimeLike
  // ==========================================================================

  toInstant(): Instant {
    return this
  }

  utcOffsetSeconds(): number {
    return 0
  }

  compareTo(other: TimeComparable): number {
    const that = coerceInstant(other)
    if (this.epochSeconds !== that.epochSeconds) return this.epochSeconds < that.epochSeconds ? -1 : 1
    if (this.nanosecond !== that.nanosecond) return this.nanosecond < that.nanosecond ? -1 : 1
    return 0
  }

  equals(other: TimeComparable): boolean {
    return this.compareTo(other) === 0
  }

  /** Identical representation; Dates and other values are never eql */
  eql(other: unknown): boolean {
    return (
      other instanceof Instant &&
      other.epochSeconds === this.epochSeconds &&
      other.nanosecond === this.nanosecond
    )
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  plusSeconds(seconds: number): Instant {
    const { whole, nanos } = splitSeconds(seconds)
    return Instant.of(this.epochSeconds + whole, this.nanosecond + nanos)
  }

  advance(options: AdvanceOptions): Instant {
    return Instant.fromCivil(advanceCivil(this.toCivil(), options))
  }

  /** Elapsed seconds from `other` to this instant */
  secondsSince(other: TimeComparable): number {
    const that = coerceInstant(other)
    return (this.epochSeconds - that.epochSeconds) + (this.nanosecond - that.nanosecond) / NANOS_PER_SECOND
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  toCivil(): CivilTime {
    return epochSecondsToCivil(this.epochSeconds, this.nanosecond)
  }

  toEpochMilliseconds(): number {
    return this.epochSeconds * 1000 + Math.floor(this.nanosecond / 1_000_000)
  }

  toDate(): Date {
    return new Date(this.toEpochMilliseconds())
  }

  toFloat(): number {
    return this.epochSeconds + this.nanosecond / NANOS_PER_SECOND
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  strftime(pattern: string): string {
    return strftime(
      { civil: this.toCivil(), utcOffsetSeconds: 0, abbreviation: 'UTC', epochSeconds: this.epochSeconds },
      pattern,
    )
  }

  toISOString(fractionDigits = 3): string {
    const fraction = fractionDigits > 0 ? `.%${fractionDigits}N` : ''
    return this.strftime(`%Y-%m-%dT%H:%M:%S${fraction}`) + 'Z'
  }

  toString(): string {
    return this.strftime('%Y-%m-%d %H:%M:%S UTC')
  }

  toJSON(): string {
    return this.toISOString(getConfig().jsonPrecision)
  }
}

// ============================================================================
// Parsing
// ============================================================================

function parseOffset(text: string): number {
  const upper = text.toUpperCase()
  if (upper === 'Z' || upper === 'UTC') return 0
  const sign = text.startsWith('-') ? -1 : 1
  const digits = text.slice(1).replace(':', '')
  const hours = parseInt(digits.slice(0, 2), 10)
  const minutes = digits.length > 2 ? parseInt(digits.slice(2, 4), 10) : 0
  return sign * (hours * 3600 + minutes * 60)
}

/** Parse an ISO 8601 date-time that carries `Z` or a numeric offset */
export function parseInstant(str: string): Result<Instant, ParseError> {
  const match = INSTANT_PATTERN.exec(str.trim())
  if (!match) return Err(new ParseError(`Invalid instant format: '${str}'`))

  const [, y, mo, d, h, mi, s, frac, offset] = match
  const fields: CivilTime = {
    year: parseInt(y ?? '0', 10),
    month: parseInt(mo ?? '0', 10),
    day: parseInt(d ?? '0', 10),
    hour: parseInt(h ?? '0', 10),
    minute: parseInt(mi ?? '0', 10),
    second: s ? parseInt(s, 10) : 0,
    nanosecond: parseFraction(frac),
  }

  try {
    validateCivilTime(fields)
  } catch (err) {
    if (err instanceof InvalidCivilTimeError) {
      return Err(new ParseError(`Invalid instant: '${str}' (${err.message})`))
    }
    throw err
  }

  return Ok(Instant.of(civilToEpochSeconds(fields) - parseOffset(offset ?? 'Z'), fields.nanosecond))
}

// ============================================================================
// Coercion
// ============================================================================

export function coerceInstant(value: TimeComparable): Instant {
  return value instanceof Date ? Instant.fromDate(value) : value.toInstant()
}
