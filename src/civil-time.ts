/**
 * Civil Time
 *
 * Wall-clock field sets (year through nanosecond) with no offset of their own.
 * Pure functions for validation, parsing, arithmetic, and calendar advance.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 */

import { type Result, Ok, Err } from './result'
import { ParseError, InvalidCivilTimeError, InvalidDurationError } from './errors'

export { ParseError, InvalidCivilTimeError, InvalidDurationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CivilTime = {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly nanosecond: number
}

/** Inclusive range of wall-clock times */
export type CivilRange = {
  readonly begin: CivilTime
  readonly end: CivilTime
}

export type AdvanceOptions = {
  years?: number
  months?: number
  weeks?: number
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
}

export type CivilChange = {
  year?: number
  month?: number
  day?: number
  hour?: number
  minute?: number
  second?: number
  nanosecond?: number
}

export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 3600
export const SECONDS_PER_DAY = 86400
export const NANOS_PER_SECOND = 1_000_000_000

// 1970-01-01
const EPOCH_JDN = 2440588

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function pad4(n: number): string {
  if (n < 0) return '-' + pad4(-n)
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
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

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
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
// Construction & Validation
// ============================================================================

function checkField(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidCivilTimeError(`Invalid ${name}: ${value} (expected an integer in ${min}..${max})`)
  }
}

/** Throw InvalidCivilTimeError unless every field is in range */
export function validateCivilTime(t: CivilTime): CivilTime {
  checkField('year', t.year, -271820, 275759)
  checkField('month', t.month, 1, 12)
  checkField('day', t.day, 1, daysInMonth(t.year, t.month))
  checkField('hour', t.hour, 0, 23)
  checkField('minute', t.minute, 0, 59)
  checkField('second', t.second, 0, 59)
  checkField('nanosecond', t.nanosecond, 0, NANOS_PER_SECOND - 1)
  return t
}

export function makeCivilTime(
  year: number,
  month = 1,
  day = 1,
  hour = 0,
  minute = 0,
  second = 0,
  nanosecond = 0,
): CivilTime {
  return validateCivilTime({ year, month, day, hour, minute, second, nanosecond })
}

/** Copy the wall-clock fields out of any object that carries them */
export function civilFields(t: CivilTime): CivilTime {
  return {
    year: t.year,
    month: t.month,
    day: t.day,
    hour: t.hour,
    minute: t.minute,
    second: t.second,
    nanosecond: t.nanosecond,
  }
}

export function isCivilTime(value: unknown): value is CivilTime {
  if (typeof value !== 'object' || value === null) return false
  const fields = ['year', 'month', 'day', 'hour', 'minute', 'second', 'nanosecond']
  return fields.every((f) => typeof Reflect.get(value, f) === 'number')
}

export function isCivilRange(value: unknown): value is CivilRange {
  if (typeof value !== 'object' || value === null) return false
  if (!('begin' in value) || !('end' in value)) return false
  return isCivilTime(value.begin) && isCivilTime(value.end)
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_TIME_PATTERN =
  /^(-?\d{4,6})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?$/

/** Parse fraction digits ("5" -> 500000000, "123456789" -> 123456789) */
export function parseFraction(digits: string | undefined): number {
  if (!digits) return 0
  return parseInt(digits.padEnd(9, '0'), 10)
}

/**
 * Parse `YYYY-MM-DD`, `YYYY-MM-DD HH:MM`, `YYYY-MM-DDTHH:MM:SS(.fraction)`.
 * No offset suffix is accepted: the result is a bare wall clock.
 */
export function parseCivilTime(str: string): Result<CivilTime, ParseError> {
  const match = DATE_TIME_PATTERN.exec(str.trim())
  if (!match) return Err(new ParseError(`Invalid date-time format: '${str}'`))

  const [, y, mo, d, h, mi, s, frac] = match
  const candidate: CivilTime = {
    year: parseInt(y ?? '0', 10),
    month: parseInt(mo ?? '0', 10),
    day: parseInt(d ?? '0', 10),
    hour: h ? parseInt(h, 10) : 0,
    minute: mi ? parseInt(mi, 10) : 0,
    second: s ? parseInt(s, 10) : 0,
    nanosecond: parseFraction(frac),
  }

  try {
    return Ok(validateCivilTime(candidate))
  } catch (err) {
    if (err instanceof InvalidCivilTimeError) {
      return Err(new ParseError(`Invalid date-time: '${str}' (${err.message})`))
    }
    throw err
  }
}

// ============================================================================
// Epoch Conversion
// ============================================================================

/** Whole seconds since 1970-01-01T00:00:00, reading the fields as UTC */
export function civilToEpochSeconds(t: CivilTime): number {
  const days = dateToJDN(t.year, t.month, t.day) - EPOCH_JDN
  return days * SECONDS_PER_DAY + t.hour * SECONDS_PER_HOUR + t.minute * SECONDS_PER_MINUTE + t.second
}

export function epochSecondsToCivil(epochSeconds: number, nanosecond = 0): CivilTime {
  const days = Math.floor(epochSeconds / SECONDS_PER_DAY)
  let rem = epochSeconds - days * SECONDS_PER_DAY
  const { year, month, day } = jdnToDate(days + EPOCH_JDN)
  const hour = Math.floor(rem / SECONDS_PER_HOUR)
  rem -= hour * SECONDS_PER_HOUR
  const minute = Math.floor(rem / SECONDS_PER_MINUTE)
  const second = rem - minute * SECONDS_PER_MINUTE
  return { year, month, day, hour, minute, second, nanosecond }
}

/**
 * Split a (possibly fractional) number of seconds into whole seconds and a
 * nanosecond remainder in 0..999_999_999.
 */
export function splitSeconds(seconds: number): { whole: number; nanos: number } {
  let whole = Math.floor(seconds)
  let nanos = Math.round((seconds - whole) * NANOS_PER_SECOND)
  if (nanos >= NANOS_PER_SECOND) {
    whole += 1
    nanos -= NANOS_PER_SECOND
  }
  return { whole, nanos }
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addSeconds(t: CivilTime, seconds: number): CivilTime {
  const { whole, nanos } = splitSeconds(seconds)
  let epoch = civilToEpochSeconds(t) + whole
  let nanosecond = t.nanosecond + nanos
  if (nanosecond >= NANOS_PER_SECOND) {
    epoch += 1
    nanosecond -= NANOS_PER_SECOND
  }
  return epochSecondsToCivil(epoch, nanosecond)
}

export function addDays(t: CivilTime, n: number): CivilTime {
  const { year, month, day } = jdnToDate(dateToJDN(t.year, t.month, t.day) + n)
  return { ...t, year, month, day }
}

/** Move by whole months, clamping the day to the end of the target month */
export function addMonths(t: CivilTime, n: number): CivilTime {
  const index = t.year * 12 + (t.month - 1) + n
  const year = Math.floor(index / 12)
  const month = index - year * 12 + 1
  const day = Math.min(t.day, daysInMonth(year, month))
  return { ...t, year, month, day }
}

export function daysBetween(a: CivilTime, b: CivilTime): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

function requireWhole(unit: string, n: number): number {
  if (!Number.isInteger(n)) {
    throw new InvalidDurationError(`Cannot advance by fractional ${unit}: ${n}`)
  }
  return n
}

/**
 * Gregorian advance. Fractional weeks spill into days and fractional days
 * into hours; years then months move with end-of-month clamping; weeks and
 * days move the date; hours, minutes and seconds are added as elapsed time.
 */
export function advanceCivil(t: CivilTime, options: AdvanceOptions): CivilTime {
  let days = options.days
  let hours = options.hours ?? 0

  let weeks = 0
  if (options.weeks !== undefined) {
    weeks = Math.floor(options.weeks)
    days = (days ?? 0) + 7 * (options.weeks - weeks)
  }
  if (days !== undefined) {
    const whole = Math.floor(days)
    hours += 24 * (days - whole)
    days = whole
  }

  let result = t
  if (options.years !== undefined) result = addMonths(result, requireWhole('years', options.years) * 12)
  if (options.months !== undefined) result = addMonths(result, requireWhole('months', options.months))
  if (weeks !== 0) result = addDays(result, weeks * 7)
  if (days !== undefined && days !== 0) result = addDays(result, days)

  const seconds =
    (options.seconds ?? 0) + (options.minutes ?? 0) * SECONDS_PER_MINUTE + hours * SECONDS_PER_HOUR
  return seconds === 0 ? result : addSeconds(result, seconds)
}

/**
 * Override fields. Unset time-of-day fields below the highest one given
 * reset to zero: hour -> minute -> second -> nanosecond.
 */
export function changeCivil(t: CivilTime, options: CivilChange): CivilTime {
  const { hour, minute, second, nanosecond } = options
  return validateCivilTime({
    year: options.year ?? t.year,
    month: options.month ?? t.month,
    day: options.day ?? t.day,
    hour: hour ?? t.hour,
    minute: minute ?? (hour !== undefined ? 0 : t.minute),
    second: second ?? (hour !== undefined || minute !== undefined ? 0 : t.second),
    nanosecond:
      nanosecond ?? (hour !== undefined || minute !== undefined || second !== undefined ? 0 : t.nanosecond),
  })
}

// ============================================================================
// Calendar Queries
// ============================================================================

/** 0 = Sunday ... 6 = Saturday */
export function weekdayOf(t: CivilTime): number {
  const jdn = dateToJDN(t.year, t.month, t.day)
  return (((jdn + 1) % 7) + 7) % 7
}

/** 1-based day of the year */
export function yearDayOf(t: CivilTime): number {
  return dateToJDN(t.year, t.month, t.day) - dateToJDN(t.year, 1, 1) + 1
}

// ============================================================================
// Comparison
// ============================================================================

export function compareCivil(a: CivilTime, b: CivilTime): number {
  const diff = civilToEpochSeconds(a) - civilToEpochSeconds(b)
  if (diff !== 0) return diff < 0 ? -1 : 1
  if (a.nanosecond !== b.nanosecond) return a.nanosecond < b.nanosecond ? -1 : 1
  return 0
}

export function civilEquals(a: CivilTime, b: CivilTime): boolean {
  return compareCivil(a, b) === 0
}

// ============================================================================
// Formatting
// ============================================================================

/** `YYYY-MM-DDTHH:MM:SS` with a nanosecond fraction when non-zero */
export function formatCivil(t: CivilTime): string {
  const base =
    `${pad4(t.year)}-${pad2(t.month)}-${pad2(t.day)}` +
    `T${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)}`
  if (t.nanosecond === 0) return base
  return `${base}.${String(t.nanosecond).padStart(9, '0')}`
}
