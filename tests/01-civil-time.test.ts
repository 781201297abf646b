/**
 * Segment 01: Civil Time Tests
 *
 * Wall-clock fields and the Gregorian arithmetic underneath every zone
 * conversion. Pure functions, no zone database involved.
 */

import { describe, it, expect } from 'vitest'
import {
  isLeapYear,
  daysInMonth,
  daysInYear,
  makeCivilTime,
  parseCivilTime,
  isCivilTime,
  civilToEpochSeconds,
  epochSecondsToCivil,
  addSeconds,
  addDays,
  addMonths,
  daysBetween,
  advanceCivil,
  changeCivil,
  weekdayOf,
  yearDayOf,
  compareCivil,
  civilEquals,
  formatCivil,
  InvalidCivilTimeError,
  InvalidDurationError,
  ParseError,
} from '../src/civil-time'

// ============================================================================
// 1. CALENDAR RULES
// ============================================================================

describe('Calendar Rules', () => {
  it('applies the Gregorian leap year rule', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(2023)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
  })

  it('knows month lengths', () => {
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2024, 4)).toBe(30)
    expect(daysInMonth(2024, 12)).toBe(31)
  })

  it('knows year lengths', () => {
    expect(daysInYear(2024)).toBe(366)
    expect(daysInYear(2025)).toBe(365)
  })
})

// ============================================================================
// 2. CONSTRUCTION & VALIDATION
// ============================================================================

describe('makeCivilTime', () => {
  it('defaults missing fields to the start of the period', () => {
    expect(makeCivilTime(2024, 3)).toEqual({
      year: 2024, month: 3, day: 1, hour: 0, minute: 0, second: 0, nanosecond: 0,
    })
  })

  it('rejects a day past the end of the month', () => {
    expect(() => makeCivilTime(2024, 2, 30)).toThrow(InvalidCivilTimeError)
    expect(() => makeCivilTime(2023, 2, 29)).toThrow(InvalidCivilTimeError)
  })

  it('rejects out-of-range time fields', () => {
    expect(() => makeCivilTime(2024, 1, 1, 24)).toThrow(InvalidCivilTimeError)
    expect(() => makeCivilTime(2024, 1, 1, 0, 60)).toThrow(InvalidCivilTimeError)
    expect(() => makeCivilTime(2024, 1, 1, 0, 0, 0, 1_000_000_000)).toThrow(InvalidCivilTimeError)
  })

  it('rejects fractional fields', () => {
    expect(() => makeCivilTime(2024, 1, 1.5)).toThrow('Invalid day: 1.5')
  })
})

describe('isCivilTime', () => {
  it('accepts objects carrying all seven numeric fields', () => {
    expect(isCivilTime(makeCivilTime(2024))).toBe(true)
  })

  it('rejects partial or non-object values', () => {
    expect(isCivilTime({ year: 2024, month: 1, day: 1 })).toBe(false)
    expect(isCivilTime('2024-01-01')).toBe(false)
    expect(isCivilTime(null)).toBe(false)
  })
})

// ============================================================================
// 3. PARSING
// ============================================================================

describe('parseCivilTime', () => {
  it('parses a date with hours and minutes', () => {
    const result = parseCivilTime('2024-03-15 14:30')
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value).toEqual({
        year: 2024, month: 3, day: 15, hour: 14, minute: 30, second: 0, nanosecond: 0,
      })
    }
  })

  it('parses a fraction into nanoseconds', () => {
    const result = parseCivilTime('2024-03-15T14:30:45.5')
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.second).toBe(45)
      expect(result.value.nanosecond).toBe(500_000_000)
    }
  })

  it('parses a bare date as midnight', () => {
    const result = parseCivilTime('2024-03-15')
    expect(result.ok && result.value.hour === 0 && result.value.day === 15).toBe(true)
  })

  it('returns a ParseError for an impossible date', () => {
    const result = parseCivilTime('2024-02-30')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError)
  })

  it('returns a ParseError for other layouts', () => {
    expect(parseCivilTime('15/03/2024').ok).toBe(false)
    expect(parseCivilTime('2024-03-15T14:30:00Z').ok).toBe(false)
  })
})

// ============================================================================
// 4. EPOCH CONVERSION
// ============================================================================

describe('Epoch Conversion', () => {
  it('reads fields as UTC', () => {
    expect(civilToEpochSeconds(makeCivilTime(1970))).toBe(0)
    expect(civilToEpochSeconds(makeCivilTime(2000))).toBe(946_684_800)
  })

  it('converts epoch seconds back to fields', () => {
    expect(epochSecondsToCivil(946_684_800)).toEqual(makeCivilTime(2000))
    expect(epochSecondsToCivil(-1)).toEqual(makeCivilTime(1969, 12, 31, 23, 59, 59))
  })

  it('carries the nanosecond through', () => {
    expect(epochSecondsToCivil(0, 42).nanosecond).toBe(42)
  })
})

// ============================================================================
// 5. ARITHMETIC
// ============================================================================

describe('Arithmetic', () => {
  it('adds fractional seconds with a carry across the year end', () => {
    const t = makeCivilTime(2024, 12, 31, 23, 59, 59, 500_000_000)
    expect(addSeconds(t, 0.75)).toEqual(makeCivilTime(2025, 1, 1, 0, 0, 0, 250_000_000))
  })

  it('adds days across month ends', () => {
    expect(addDays(makeCivilTime(2024, 2, 28, 9), 2)).toEqual(makeCivilTime(2024, 3, 1, 9))
    expect(addDays(makeCivilTime(2024, 3, 1), -1)).toEqual(makeCivilTime(2024, 2, 29))
  })

  it('clamps the day when adding months', () => {
    expect(addMonths(makeCivilTime(2024, 1, 31), 1)).toEqual(makeCivilTime(2024, 2, 29))
    expect(addMonths(makeCivilTime(2024, 3, 31), -1)).toEqual(makeCivilTime(2024, 2, 29))
  })

  it('moves back across year boundaries', () => {
    expect(addMonths(makeCivilTime(2024, 1, 15), -13)).toEqual(makeCivilTime(2022, 12, 15))
  })

  it('counts days between dates', () => {
    expect(daysBetween(makeCivilTime(2024, 1, 1), makeCivilTime(2025, 1, 1))).toBe(366)
  })
})

describe('advanceCivil', () => {
  it('clamps a leap day when advancing a year', () => {
    expect(advanceCivil(makeCivilTime(2024, 2, 29, 10), { years: 1 })).toEqual(makeCivilTime(2025, 2, 28, 10))
  })

  it('applies months before days', () => {
    expect(advanceCivil(makeCivilTime(2024, 1, 31), { months: 1, days: 1 })).toEqual(makeCivilTime(2024, 3, 1))
  })

  it('spills fractional weeks into days and hours', () => {
    expect(advanceCivil(makeCivilTime(2024, 1, 1), { weeks: 1.5 })).toEqual(makeCivilTime(2024, 1, 11, 12))
  })

  it('adds hours as elapsed wall-clock time', () => {
    expect(advanceCivil(makeCivilTime(2024, 1, 1, 22), { hours: 3, minutes: 30 })).toEqual(
      makeCivilTime(2024, 1, 2, 1, 30),
    )
  })

  it('rejects fractional months and years', () => {
    expect(() => advanceCivil(makeCivilTime(2024), { months: 1.5 })).toThrow(InvalidDurationError)
    expect(() => advanceCivil(makeCivilTime(2024), { years: 0.5 })).toThrow(InvalidDurationError)
  })
})

describe('changeCivil', () => {
  const t = makeCivilTime(2024, 6, 15, 9, 45, 30, 500_000_000)

  it('resets minute, second and nanosecond when the hour is given', () => {
    expect(changeCivil(t, { hour: 12 })).toEqual(makeCivilTime(2024, 6, 15, 12))
  })

  it('treats hour 0 as given', () => {
    expect(changeCivil(t, { hour: 0 })).toEqual(makeCivilTime(2024, 6, 15))
  })

  it('resets second and nanosecond when the minute is given', () => {
    expect(changeCivil(t, { minute: 10 })).toEqual(makeCivilTime(2024, 6, 15, 9, 10))
  })

  it('resets the nanosecond when the second is given', () => {
    expect(changeCivil(t, { second: 5 })).toEqual(makeCivilTime(2024, 6, 15, 9, 45, 5))
  })

  it('leaves the time of day alone for date fields', () => {
    expect(changeCivil(t, { year: 2023 })).toEqual(makeCivilTime(2023, 6, 15, 9, 45, 30, 500_000_000))
  })

  it('throws rather than rolling an impossible day over', () => {
    expect(() => changeCivil(makeCivilTime(2024, 1, 31), { month: 2 })).toThrow(InvalidCivilTimeError)
  })
})

// ============================================================================
// 6. QUERIES, COMPARISON, FORMATTING
// ============================================================================

describe('Queries', () => {
  it('computes the weekday with Sunday as 0', () => {
    expect(weekdayOf(makeCivilTime(2024, 3, 10))).toBe(0)
    expect(weekdayOf(makeCivilTime(2000, 1, 1))).toBe(6)
  })

  it('computes the day of the year', () => {
    expect(yearDayOf(makeCivilTime(2024, 12, 31))).toBe(366)
    expect(yearDayOf(makeCivilTime(2023, 3, 1))).toBe(60)
  })

  it('compares fields down to the nanosecond', () => {
    const a = makeCivilTime(2024, 1, 1, 0, 0, 0, 1)
    const b = makeCivilTime(2024, 1, 1, 0, 0, 0, 2)
    expect(compareCivil(a, b)).toBe(-1)
    expect(compareCivil(b, a)).toBe(1)
    expect(civilEquals(a, { ...a })).toBe(true)
  })

  it('formats fields as ISO 8601 without an offset', () => {
    expect(formatCivil(makeCivilTime(2024, 3, 10, 2, 30))).toBe('2024-03-10T02:30:00')
    expect(formatCivil(makeCivilTime(2024, 3, 10, 2, 30, 0, 5))).toBe('2024-03-10T02:30:00.000000005')
  })
})
