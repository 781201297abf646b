/**
 * Generators for time values, zones and durations.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { type CivilTime, daysInMonth } from '../../../src/civil-time'
import { Instant } from '../../../src/instant'
import { Duration, type DurationInput } from '../../../src/duration'

// ============================================================================
// Zones
// ============================================================================

/** Zones with and without DST, on both hemispheres, with a half-hour offset */
export const ZONE_NAMES = [
  'UTC',
  'America/New_York',
  'America/Los_Angeles',
  'Europe/London',
  'Europe/Berlin',
  'Australia/Sydney',
  'Asia/Kolkata',
  'Asia/Tokyo',
] as const

export function zoneNameGen(): Arbitrary<string> {
  return fc.constantFrom(...ZONE_NAMES)
}

// ============================================================================
// Times
// ============================================================================

const MIN_EPOCH = 0 // 1970-01-01
const MAX_EPOCH = 2_145_916_800 // 2038-01-01

export function instantGen(): Arbitrary<Instant> {
  return fc
    .tuple(fc.integer({ min: MIN_EPOCH, max: MAX_EPOCH }), fc.integer({ min: 0, max: 999_999_999 }))
    .map(([seconds, nanos]) => Instant.of(seconds, nanos))
}

export function civilTimeGen(minYear = 1971, maxYear = 2037): Arbitrary<CivilTime> {
  return fc
    .record({
      year: fc.integer({ min: minYear, max: maxYear }),
      month: fc.integer({ min: 1, max: 12 }),
      day: fc.integer({ min: 1, max: 31 }),
      hour: fc.integer({ min: 0, max: 23 }),
      minute: fc.integer({ min: 0, max: 59 }),
      second: fc.integer({ min: 0, max: 59 }),
      nanosecond: fc.integer({ min: 0, max: 999_999_999 }),
    })
    .map((t) => ({ ...t, day: Math.min(t.day, daysInMonth(t.year, t.month)) }))
}

/** Year 0, negative years, and local mean time offsets that are not whole minutes */
export function historicalCivilTimeGen(): Arbitrary<CivilTime> {
  return civilTimeGen(-3000, 1800)
}

export function historicalInstantGen(): Arbitrary<Instant> {
  return historicalCivilTimeGen().map((t) => Instant.fromCivil(t))
}

// ============================================================================
// Durations
// ============================================================================

export function fixedDurationGen(): Arbitrary<DurationInput> {
  return fc.oneof(
    fc.integer({ min: -10_000_000, max: 10_000_000 }),
    fc.integer({ min: -500, max: 500 }).map((n) => Duration.hours(n)),
    fc.integer({ min: -10_000, max: 10_000 }).map((n) => Duration.minutes(n)),
  )
}

export function variableDurationGen(): Arbitrary<Duration> {
  return fc.oneof(
    fc.integer({ min: -400, max: 400 }).map((n) => Duration.days(n)),
    fc.integer({ min: -52, max: 52 }).map((n) => Duration.weeks(n)),
    fc.integer({ min: -36, max: 36 }).map((n) => Duration.months(n)),
    fc
      .tuple(fc.integer({ min: -3, max: 3 }), fc.integer({ min: -30, max: 30 }), fc.integer({ min: -48, max: 48 }))
      .map(([years, days, hours]) => Duration.of({ years, days, hours })),
  )
}

export function durationGen(): Arbitrary<DurationInput> {
  return fc.oneof(fixedDurationGen(), variableDurationGen())
}
