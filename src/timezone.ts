/**
 * Timezones
 *
 * The resolver contract ZonedTime relies on, and its two implementations:
 * IntlTimezone reads offset rules from the runtime's own tz data through
 * Intl.DateTimeFormat; FixedOffsetTimezone has a single constant period.
 */

import { NoSuchLocalTimeError, InvalidZoneError } from './errors'
import {
  type CivilTime,
  civilToEpochSeconds,
  formatCivil,
  SECONDS_PER_DAY,
} from './civil-time'
import type { Instant } from './instant'
import type { Period } from './types'
import { formatOffset } from './strftime'

export { NoSuchLocalTimeError } from './errors'

// ============================================================================
// Contract
// ============================================================================

export interface Timezone {
  readonly name: string
  /** Never ambiguous */
  periodForUTC(instant: Instant): Period
  /** First candidate of periodsForLocal; throws NoSuchLocalTimeError in a gap */
  periodForLocal(local: CivilTime): Period
  /** Zero (gap), one, or two (fold) periods, earliest instant first */
  periodsForLocal(local: CivilTime): Period[]
}

export function sameZone(a: Timezone, b: Timezone): boolean {
  return a.name === b.name
}

function gapError(zone: Timezone, local: CivilTime): NoSuchLocalTimeError {
  return new NoSuchLocalTimeError(`${formatCivil(local)} does not exist in ${zone.name}`)
}

// ============================================================================
// Intl-backed Zone
// ============================================================================

const SCAN_STEP_SECONDS = 7 * SECONDS_PER_DAY
const SCAN_STEPS = 53
const MAX_CACHED_SPANS = 256
/** Date's own range, in seconds */
const MAX_EPOCH_SECONDS = 8_640_000_000_000

export function isValidZoneName(name: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: name })
    return true
  } catch {
    return false
  }
}

export class IntlTimezone implements Timezone {
  readonly name: string
  private readonly numeric: Intl.DateTimeFormat
  private readonly short: Intl.DateTimeFormat
  /** Ranges already resolved, scanned extent standing in for an unknown bound */
  private readonly spans: { lo: number; hi: number; period: Period }[] = []

  constructor(name: string) {
    if (!isValidZoneName(name)) throw new InvalidZoneError(`Unknown time zone: '${name}'`)
    this.name = name
    this.numeric = new Intl.DateTimeFormat('en-US', {
      timeZone: name,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      era: 'short',
      hour12: false,
    })
    this.short = new Intl.DateTimeFormat('en-US', { timeZone: name, timeZoneName: 'short' })
  }

  /** Offset in seconds in force at a whole UTC second */
  offsetAt(epochSeconds: number): number {
    const parts = this.numeric.formatToParts(new Date(epochSeconds * 1000))
    const get = (type: string) => {
      const part = parts.find((p) => p.type === type)
      return part ? parseInt(part.value, 10) : 0
    }

    // hour12:false can return "24" for midnight
    let hour = get('hour')
    if (hour === 24) hour = 0
    // Years are counted within the era: 1 BC is year 0, 2 BC is year -1
    const eraYear = get('year')
    const year = parts.find((p) => p.type === 'era')?.value === 'BC' ? 1 - eraYear : eraYear
    const local = civilToEpochSeconds({
      year,
      month: get('month'),
      day: get('day'),
      hour,
      minute: get('minute'),
      second: get('second'),
      nanosecond: 0,
    })
    return local - epochSeconds
  }

  private abbreviationAt(epochSeconds: number): string {
    const parts = this.short.formatToParts(new Date(epochSeconds * 1000))
    return parts.find((p) => p.type === 'timeZoneName')?.value ?? formatOffset(this.offsetAt(epochSeconds))
  }

  /** The lesser of the January and July offsets of the UTC year containing the instant */
  private standardOffset(epochSeconds: number): number {
    const year = new Date(epochSeconds * 1000).getUTCFullYear()
    const jan = civilToEpochSeconds({ year, month: 1, day: 1, hour: 0, minute: 0, second: 0, nanosecond: 0 })
    const jul = civilToEpochSeconds({ year, month: 7, day: 1, hour: 0, minute: 0, second: 0, nanosecond: 0 })
    return Math.min(this.offsetAt(jan), this.offsetAt(jul))
  }

  /**
   * Nearest second at which the offset stops being `offset`, walking from
   * `from` in weekly steps and then bisecting. Returns the first second of
   * the range going backwards and the first second past it going forwards,
   * or undefined when the offset holds for the whole scan.
   */
  private findChange(from: number, offset: number, direction: 1 | -1): number | undefined {
    let same = from
    for (let step = 1; step <= SCAN_STEPS; step++) {
      const next = from + direction * step * SCAN_STEP_SECONDS
      if (Math.abs(next) > MAX_EPOCH_SECONDS) return undefined
      if (this.offsetAt(next) !== offset) {
        let changed = next
        while (Math.abs(changed - same) > 1) {
          const mid = same + Math.trunc((changed - same) / 2)
          if (this.offsetAt(mid) === offset) same = mid
          else changed = mid
        }
        return direction === 1 ? changed : same
      }
      same = next
    }
    return undefined
  }

  private periodAt(epochSeconds: number): Period {
    const cached = this.spans.find((span) => span.lo <= epochSeconds && epochSeconds < span.hi)
    if (cached) return cached.period

    const utcOffsetSeconds = this.offsetAt(epochSeconds)
    const validFrom = this.findChange(epochSeconds, utcOffsetSeconds, -1)
    const validUntil = this.findChange(epochSeconds, utcOffsetSeconds, 1)
    const period: Period = {
      utcOffsetSeconds,
      abbreviation: this.abbreviationAt(epochSeconds),
      isDst: utcOffsetSeconds > this.standardOffset(epochSeconds),
      validFrom,
      validUntil,
    }

    const reach = SCAN_STEPS * SCAN_STEP_SECONDS
    if (this.spans.length >= MAX_CACHED_SPANS) this.spans.shift()
    this.spans.push({
      lo: validFrom ?? epochSeconds - reach,
      hi: validUntil ?? epochSeconds + reach,
      period,
    })
    return period
  }

  periodForUTC(instant: Instant): Period {
    return this.periodAt(instant.epochSeconds)
  }

  periodsForLocal(local: CivilTime): Period[] {
    const localSeconds = civilToEpochSeconds(local)

    // Any offset in force within a day of the wall clock is a candidate
    const candidates = new Set([
      this.offsetAt(localSeconds - SECONDS_PER_DAY),
      this.offsetAt(localSeconds),
      this.offsetAt(localSeconds + SECONDS_PER_DAY),
    ])

    const instants: number[] = []
    for (const offset of candidates) {
      const utc = localSeconds - offset
      if (this.offsetAt(utc) === offset) instants.push(utc)
    }
    return instants.sort((a, b) => a - b).map((utc) => this.periodAt(utc))
  }

  periodForLocal(local: CivilTime): Period {
    const [first] = this.periodsForLocal(local)
    if (!first) throw gapError(this, local)
    return first
  }
}

// ============================================================================
// Fixed-offset Zone
// ============================================================================

export class FixedOffsetTimezone implements Timezone {
  readonly name: string
  private readonly period: Period

  constructor(utcOffsetSeconds: number) {
    if (!Number.isInteger(utcOffsetSeconds) || Math.abs(utcOffsetSeconds) >= SECONDS_PER_DAY) {
      throw new InvalidZoneError(`Invalid UTC offset: ${utcOffsetSeconds}`)
    }
    const name = utcOffsetSeconds % 60 === 0 ? formatOffset(utcOffsetSeconds) : formatOffset(utcOffsetSeconds, 2)
    this.name = name
    this.period = { utcOffsetSeconds, abbreviation: name, isDst: false }
  }

  periodForUTC(): Period {
    return this.period
  }

  periodForLocal(): Period {
    return this.period
  }

  periodsForLocal(): Period[] {
    return [this.period]
  }
}
