/**
 * Shared Types
 *
 * Re-exports the wall-clock types from civil-time and defines the contracts
 * shared by Instant, ZonedTime and the timezone resolvers.
 */

import type { Instant } from './instant'

export type { CivilTime, CivilRange, AdvanceOptions, CivilChange } from './civil-time'

// ============================================================================
// Period
// ============================================================================

/** Offset rule in force for a zone over a contiguous range of instants */
export type Period = {
  readonly utcOffsetSeconds: number
  readonly abbreviation: string
  readonly isDst: boolean
  /** First UTC second of the range; absent when unbounded or unknown */
  readonly validFrom?: number
  /** First UTC second after the range; absent when unbounded or unknown */
  readonly validUntil?: number
}

/**
 * Same rule over the same range. Two periods with equal fields but disjoint
 * ranges (last year's EST and this year's) are different periods.
 */
export function periodEquals(a: Period, b: Period): boolean {
  return (
    a.utcOffsetSeconds === b.utcOffsetSeconds &&
    a.abbreviation === b.abbreviation &&
    a.isDst === b.isDst &&
    (a.validFrom ?? -Infinity) < (b.validUntil ?? Infinity) &&
    (b.validFrom ?? -Infinity) < (a.validUntil ?? Infinity)
  )
}

export function includesPeriod(periods: readonly Period[], period: Period): boolean {
  return periods.some((p) => periodEquals(p, period))
}

// ============================================================================
// Time-like Capability
// ============================================================================

/**
 * Anything that stands for an absolute point in time. Instant and ZonedTime
 * both implement it, so generic code can take either.
 */
export interface TimeLike {
  toInstant(): Instant
  utcOffsetSeconds(): number
  compareTo(other: TimeComparable): number
}

export type TimeComparable = TimeLike | Date

export function isTimeLike(value: unknown): value is TimeLike {
  if (typeof value !== 'object' || value === null) return false
  return (
    typeof Reflect.get(value, 'toInstant') === 'function' &&
    typeof Reflect.get(value, 'utcOffsetSeconds') === 'function' &&
    typeof Reflect.get(value, 'compareTo') === 'function'
  )
}
