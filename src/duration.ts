/**
 * Duration
 *
 * An ordered set of calendar and clock parts. Parts in days, weeks, months
 * or years are calendar-variable (their real length depends on where they
 * are applied); seconds, minutes and hours are fixed-length.
 */

import { InvalidDurationError } from './errors'
import { type AdvanceOptions, SECONDS_PER_MINUTE, SECONDS_PER_HOUR, SECONDS_PER_DAY } from './civil-time'

export { InvalidDurationError } from './errors'

export type DurationUnit = 'years' | 'months' | 'weeks' | 'days' | 'hours' | 'minutes' | 'seconds'

export type DurationParts = Partial<Record<DurationUnit, number>>

export type DurationPart = readonly [DurationUnit, number]

/** A Duration, or a plain number of seconds */
export type DurationInput = Duration | number

const UNITS: readonly DurationUnit[] = ['years', 'months', 'weeks', 'days', 'hours', 'minutes', 'seconds']

const VARIABLE_UNITS: ReadonlySet<DurationUnit> = new Set(['years', 'months', 'weeks', 'days'])

// Average Gregorian lengths, used only by inSeconds()
const SECONDS_PER_UNIT: Record<DurationUnit, number> = {
  years: 31556952,
  months: 2629746,
  weeks: 7 * SECONDS_PER_DAY,
  days: SECONDS_PER_DAY,
  hours: SECONDS_PER_HOUR,
  minutes: SECONDS_PER_MINUTE,
  seconds: 1,
}

function isDurationUnit(key: string): key is DurationUnit {
  return UNITS.some((unit) => unit === key)
}

export class Duration {
  readonly parts: readonly DurationPart[]

  private constructor(parts: readonly DurationPart[]) {
    this.parts = parts
  }

  /** Parts keep the order in which their keys appear */
  static of(parts: DurationParts): Duration {
    const list: DurationPart[] = []
    for (const [key, amount] of Object.entries(parts)) {
      if (!isDurationUnit(key)) throw new InvalidDurationError(`Unknown duration unit: '${key}'`)
      if (amount === undefined) continue
      if (!Number.isFinite(amount)) throw new InvalidDurationError(`Invalid ${key} amount: ${amount}`)
      list.push([key, amount])
    }
    return new Duration(list)
  }

  static seconds(n: number): Duration { return Duration.of({ seconds: n }) }
  static minutes(n: number): Duration { return Duration.of({ minutes: n }) }
  static hours(n: number): Duration { return Duration.of({ hours: n }) }
  static days(n: number): Duration { return Duration.of({ days: n }) }
  static weeks(n: number): Duration { return Duration.of({ weeks: n }) }
  static months(n: number): Duration { return Duration.of({ months: n }) }
  static years(n: number): Duration { return Duration.of({ years: n }) }

  /** Sum part-wise; units already present keep their position */
  plus(other: DurationInput): Duration {
    const that = toDuration(other)
    const merged = this.parts.map(([unit, n]): [DurationUnit, number] => [unit, n])
    for (const [unit, n] of that.parts) {
      const existing = merged.find(([u]) => u === unit)
      if (existing) existing[1] += n
      else merged.push([unit, n])
    }
    return new Duration(merged)
  }

  negate(): Duration {
    return new Duration(this.parts.map(([unit, n]): DurationPart => [unit, -n]))
  }

  isVariableLength(): boolean {
    return this.parts.some(([unit]) => VARIABLE_UNITS.has(unit))
  }

  /** Total seconds, using average month and year lengths */
  inSeconds(): number {
    return this.parts.reduce((sum, [unit, n]) => sum + n * SECONDS_PER_UNIT[unit], 0)
  }

  /** Each part as its own single-unit advance, in order */
  toAdvanceSteps(): AdvanceOptions[] {
    return this.parts.map(([unit, n]) => {
      const step: AdvanceOptions = {}
      step[unit] = n
      return step
    })
  }

  equals(other: DurationInput): boolean {
    return this.inSeconds() === toDuration(other).inSeconds()
  }

  /** `1 month and 2 days`, `1 year, 2 months, and 3 days` */
  toString(): string {
    const sorted = UNITS.flatMap((unit) =>
      this.parts.filter(([u]) => u === unit).map(([u, n]) => `${n} ${Math.abs(n) === 1 ? u.slice(0, -1) : u}`),
    )
    if (sorted.length === 0) return '0 seconds'
    if (sorted.length === 1) return sorted[0] ?? ''
    if (sorted.length === 2) return `${sorted[0]} and ${sorted[1]}`
    return `${sorted.slice(0, -1).join(', ')}, and ${sorted[sorted.length - 1]}`
  }
}

// ============================================================================
// Classification
// ============================================================================

export function toDuration(input: DurationInput): Duration {
  return typeof input === 'number' ? Duration.seconds(input) : input
}

/** True when the input must be applied to the wall clock rather than the instant */
export function isVariableLength(input: DurationInput): boolean {
  return typeof input !== 'number' && input.isVariableLength()
}

/** Seconds of a fixed-length input */
export function fixedSeconds(input: DurationInput): number {
  return typeof input === 'number' ? input : input.inSeconds()
}

export function negateDuration(input: DurationInput): DurationInput {
  return typeof input === 'number' ? -input : input.negate()
}
