/**
 * ZonedTime
 *
 * A civil time paired with a named zone. Holds whichever of the UTC instant
 * or the wall-clock fields it was built from, derives the other on demand,
 * and memoizes both along with the zone period in force.
 *
 * Fixed-length arithmetic (seconds, minutes, hours) runs on the instant;
 * calendar-variable arithmetic (days, weeks, months, years) runs on the
 * wall clock and is then resolved back into the zone.
 */

import {
  AmbiguousLocalTimeError,
  ConflictingZoneSpecError,
  InvalidDataError,
  NoSuchLocalTimeError,
  UnsupportedOperationError,
} from './errors'
import {
  type CivilTime,
  type CivilRange,
  type AdvanceOptions,
  type CivilChange,
  advanceCivil,
  addSeconds,
  changeCivil,
  civilEquals,
  civilFields,
  epochSecondsToCivil,
  formatCivil,
  isCivilRange,
  parseCivilTime,
  validateCivilTime,
  SECONDS_PER_HOUR,
} from './civil-time'
import { Instant, coerceInstant, parseInstant } from './instant'
import { type DurationInput, isVariableLength, toDuration, fixedSeconds, negateDuration } from './duration'
import { type Timezone, sameZone } from './timezone'
import { type ZoneInput, findZone } from './zone-registry'
import { type Period, type TimeLike, type TimeComparable, includesPeriod, isTimeLike } from './types'
import { type FormattableTime, lookupFormat, applyFormat } from './formats'
import { type LocalOperation, type LocalResult, LOCAL_OPERATIONS, isLocalOperationName } from './local-operations'
import { strftime, formatOffset } from './strftime'
import { defaultZone, getConfig } from './config'
import { unwrap } from './result'

export {
  AmbiguousLocalTimeError,
  ConflictingZoneSpecError,
  UnsupportedOperationError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

/** Anything fromUTC() can read as a UTC instant */
export type UTCInput = Instant | Date | CivilTime | ZonedTime

/** Anything fromLocal() can read as wall-clock fields */
export type LocalInput = CivilTime | ZonedTime

export type ChangeOptions = CivilChange & {
  zone?: ZoneInput
  offset?: string | number
}

export type ZonedRange = {
  readonly begin: ZonedTime
  readonly end: ZonedTime
}

export type ZonedResult = ZonedTime | ZonedRange | number | boolean

/** Forward shifts tried when wall-clock fields land in a gap */
export const MAX_GAP_SHIFTS = 6

function toUtcInstant(input: UTCInput): Instant {
  if (input instanceof Instant) return input
  if (input instanceof Date) return Instant.fromDate(input)
  // Wall-clock fields are reinterpreted as UTC; any offset they carry is dropped
  if (input instanceof ZonedTime) return Instant.fromCivil(input.local())
  return Instant.fromCivil(input)
}

function toLocalFields(input: LocalInput): CivilTime {
  if (input instanceof ZonedTime) return input.local()
  return validateCivilTime(civilFields(input))
}

function describeZone(zone: ZoneInput): string {
  return typeof zone === 'object' ? zone.name : String(zone)
}

// ============================================================================
// ZonedTime
// ============================================================================

export class ZonedTime implements TimeLike, FormattableTime {
  readonly zone: Timezone
  private utcInstant: Instant | undefined
  private localTime: CivilTime | undefined
  private cachedPeriod: Period | undefined

  private constructor(zone: Timezone, utc: Instant | undefined, local: CivilTime | undefined, period: Period | undefined) {
    this.zone = zone
    this.utcInstant = utc
    this.localTime = local
    this.cachedPeriod = period
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static fromUTC(input: UTCInput, zone: ZoneInput = defaultZone()): ZonedTime {
    return new ZonedTime(findZone(zone), toUtcInstant(input), undefined, undefined)
  }

  /**
   * Resolve wall-clock fields in a zone. Fields inside a gap move forward an
   * hour at a time until they exist; inside a fold the zone's first period
   * wins. A known period is trusted as given.
   */
  static fromLocal(input: LocalInput, zone: ZoneInput = defaultZone(), knownPeriod?: Period): ZonedTime {
    const tz = findZone(zone)
    let local = toLocalFields(input)
    if (knownPeriod) return new ZonedTime(tz, undefined, local, knownPeriod)

    for (let shifts = 0; shifts <= MAX_GAP_SHIFTS; shifts++) {
      try {
        return new ZonedTime(tz, undefined, local, tz.periodForLocal(local))
      } catch (err) {
        if (!(err instanceof NoSuchLocalTimeError)) throw err
        local = addSeconds(local, SECONDS_PER_HOUR)
      }
    }
    throw new AmbiguousLocalTimeError(
      `${formatCivil(toLocalFields(input))} could not be resolved in ${tz.name} after ${MAX_GAP_SHIFTS} hourly shifts`,
    )
  }

  static now(zone: ZoneInput = defaultZone()): ZonedTime {
    return ZonedTime.fromUTC(Instant.now(), zone)
  }

  /**
   * Text with `Z` or a numeric offset names an instant; text without one
   * names wall-clock fields in the zone.
   */
  static parse(text: string, zone: ZoneInput = defaultZone()): ZonedTime {
    const instant = parseInstant(text)
    if (instant.ok) return ZonedTime.fromUTC(instant.value, zone)
    return ZonedTime.fromLocal(unwrap(parseCivilTime(text)), zone)
  }

  /**
   * Rebuild a decoded value. The instant is authoritative; wall-clock fields,
   * when given, must agree with it.
   */
  static fromSerialized(utc: Instant, zone: ZoneInput, local?: CivilTime): ZonedTime {
    const value = new ZonedTime(findZone(zone), utc, undefined, undefined)
    if (local !== undefined && !civilEquals(value.local(), local)) {
      throw new InvalidDataError(
        `Local time ${formatCivil(local)} does not match ${utc.toISOString(9)} in ${value.zone.name}`,
      )
    }
    return value
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  utc(): Instant {
    if (this.utcInstant === undefined) {
      this.utcInstant = Instant.fromCivil(this.local()).plusSeconds(-this.utcOffsetSeconds())
    }
    return this.utcInstant
  }

  local(): CivilTime {
    if (this.localTime === undefined) {
      const utc = this.utc()
      this.localTime = epochSecondsToCivil(utc.epochSeconds + this.utcOffsetSeconds(), utc.nanosecond)
    }
    return this.localTime
  }

  period(): Period {
    if (this.cachedPeriod === undefined) {
      // Values built from wall-clock fields always carry a period
      this.cachedPeriod = this.zone.periodForUTC(this.utc())
    }
    return this.cachedPeriod
  }

  utcOffsetSeconds(): number {
    return this.period().utcOffsetSeconds
  }

  abbreviation(): string {
    return this.period().abbreviation
  }

  isDst(): boolean {
    return this.period().isDst
  }

  isUTCZone(): boolean {
    const abbreviation = this.abbreviation()
    return abbreviation === 'UTC' || abbreviation === 'UCT'
  }

  toInstant(): Instant {
    return this.utc()
  }

  toDate(): Date {
    return this.utc().toDate()
  }

  epochSeconds(): number {
    return this.utc().epochSeconds
  }

  toFloat(): number {
    return this.utc().toFloat()
  }

  /** The same instant in another zone; `this` when the zone is unchanged */
  withZone(zone: ZoneInput = defaultZone()): ZonedTime {
    const target = findZone(zone)
    if (sameZone(target, this.zone)) return this
    return ZonedTime.fromUTC(this.utc(), target)
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  add(duration: DurationInput): ZonedTime {
    if (isVariableLength(duration)) {
      const steps = toDuration(duration).toAdvanceSteps()
      return this.wrapLocal(steps.reduce((local, step) => advanceCivil(local, step), this.local()))
    }
    return ZonedTime.fromUTC(this.utc().plusSeconds(fixedSeconds(duration)), this.zone)
  }

  since(duration: DurationInput): ZonedTime {
    return this.add(duration)
  }

  /** Elapsed seconds since another time, or this time moved back by a duration */
  subtract(other: TimeComparable): number
  subtract(duration: DurationInput): ZonedTime
  subtract(arg: TimeComparable | DurationInput): number | ZonedTime {
    if (arg instanceof Date || isTimeLike(arg)) return this.utc().secondsSince(coerceInstant(arg))
    return this.add(negateDuration(arg))
  }

  ago(duration: DurationInput): ZonedTime {
    return this.add(negateDuration(duration))
  }

  advance(options: AdvanceOptions): ZonedTime {
    const { years, months, weeks, days } = options
    if (years !== undefined || months !== undefined || weeks !== undefined || days !== undefined) {
      return this.wrapLocal(advanceCivil(this.local(), options))
    }
    return ZonedTime.fromUTC(this.utc().advance(options), this.zone)
  }

  /**
   * Override wall-clock fields and optionally move to another zone or a fixed
   * offset. The current period survives when it still fits the new fields.
   */
  change(options: ChangeOptions): ZonedTime {
    const { zone, offset, ...fields } = options
    if (zone !== undefined && offset !== undefined) {
      throw new ConflictingZoneSpecError(
        `Cannot change both zone ('${describeZone(zone)}') and offset ('${offset}') at the same time`,
      )
    }

    const local = changeCivil(this.local(), fields)
    let target = this.zone
    if (zone !== undefined) target = findZone(zone)
    else if (offset !== undefined) target = findZone(offset)

    return this.resolveKeepingPeriod(local, target)
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  compareTo(other: TimeComparable): number {
    return this.utc().compareTo(other)
  }

  equals(other: TimeComparable): boolean {
    return this.compareTo(other) === 0
  }

  /** Identical instant and a time-like other; Dates are never eql */
  eql(other: unknown): boolean {
    return isTimeLike(other) && other.toInstant().eql(this.utc())
  }

  isBefore(other: TimeComparable): boolean {
    return this.compareTo(other) < 0
  }

  isAfter(other: TimeComparable): boolean {
    return this.compareTo(other) > 0
  }

  isBetween(min: TimeComparable, max: TimeComparable): boolean {
    return this.compareTo(min) >= 0 && this.compareTo(max) <= 0
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  formattedOffset(colon = true, alternateUtc?: string): string {
    if (alternateUtc !== undefined && this.isUTCZone()) return alternateUtc
    return formatOffset(this.utcOffsetSeconds(), colon ? 1 : 0)
  }

  /**
   * `default` renders `YYYY-MM-DD HH:MM:SS +HH:MM` (`UTC` for a zero offset);
   * `db` renders the UTC fields; other names go through the format table.
   */
  toString(format = 'default'): string {
    if (format === 'db') return this.utc().strftime('%Y-%m-%d %H:%M:%S')
    const named = format === 'default' ? undefined : lookupFormat(format)
    if (named !== undefined) return applyFormat(named, this)
    const offset = this.utcOffsetSeconds()
    return `${this.strftime('%Y-%m-%d %H:%M:%S')} ${offset === 0 ? 'UTC' : formatOffset(offset)}`
  }

  /**
   * Bare `%Z` is replaced before generic expansion; composites such as `%+`
   * expand to `%Z` later and take the abbreviation from the input.
   */
  strftime(pattern: string): string {
    const abbreviation = this.abbreviation()
    const escaped = abbreviation.replace(/%/g, '%%')
    const substituted = pattern.replace(/(?<!%)((?:%%)*)%Z/g, (_match: string, escapes: string) => escapes + escaped)
    return strftime(
      {
        civil: this.local(),
        utcOffsetSeconds: this.utcOffsetSeconds(),
        abbreviation,
        epochSeconds: this.utc().epochSeconds,
      },
      substituted,
    )
  }

  inspect(): string {
    return `${this.strftime('%a, %d %b %Y %H:%M:%S.%9N')} ${this.abbreviation()} ${this.formattedOffset()}`
  }

  xmlschema(fractionDigits = 0): string {
    const pattern = fractionDigits > 0 ? `%Y-%m-%dT%H:%M:%S.%${fractionDigits}N` : '%Y-%m-%dT%H:%M:%S'
    return this.strftime(pattern) + this.formattedOffset(true, 'Z')
  }

  iso8601(fractionDigits = 0): string {
    return this.xmlschema(fractionDigits)
  }

  httpdate(): string {
    return this.utc().strftime('%a, %d %b %Y %H:%M:%S GMT')
  }

  rfc2822(): string {
    return this.strftime('%a, %d %b %Y %H:%M:%S ') + this.formattedOffset(false)
  }

  toJSON(): string {
    return this.xmlschema(getConfig().jsonPrecision)
  }

  /** `[second, minute, hour, day, month, year, weekday, yearDay, isDst, abbreviation]` */
  toArray(): [number, number, number, number, number, number, number, number, boolean, string] {
    const t = this.local()
    return [
      t.second, t.minute, t.hour, t.day, t.month, t.year,
      this.weekday(), this.yearDay(), this.isDst(), this.abbreviation(),
    ]
  }

  // ==========================================================================
  // Delegation to the wall clock
  // ==========================================================================

  respondsTo(name: string): boolean {
    return isLocalOperationName(name)
  }

  perform(name: string, ...args: number[]): ZonedResult {
    if (!isLocalOperationName(name)) {
      throw new UnsupportedOperationError(name, `undefined operation '${name}' for ${this.inspect()}`)
    }
    const operation: LocalOperation = LOCAL_OPERATIONS[name]
    return this.wrap(operation(this.local(), ...args))
  }

  year(): number { return LOCAL_OPERATIONS.year(this.local()) }
  month(): number { return LOCAL_OPERATIONS.month(this.local()) }
  day(): number { return LOCAL_OPERATIONS.day(this.local()) }
  hour(): number { return LOCAL_OPERATIONS.hour(this.local()) }
  minute(): number { return LOCAL_OPERATIONS.minute(this.local()) }
  second(): number { return LOCAL_OPERATIONS.second(this.local()) }
  nanosecond(): number { return LOCAL_OPERATIONS.nanosecond(this.local()) }
  /** 0 = Sunday */
  weekday(): number { return LOCAL_OPERATIONS.weekday(this.local()) }
  yearDay(): number { return LOCAL_OPERATIONS.yearDay(this.local()) }

  beginningOfDay(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.beginningOfDay(this.local())) }
  endOfDay(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.endOfDay(this.local())) }
  beginningOfWeek(firstWeekday = 1): ZonedTime {
    return this.wrap(LOCAL_OPERATIONS.beginningOfWeek(this.local(), firstWeekday))
  }
  beginningOfMonth(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.beginningOfMonth(this.local())) }
  endOfMonth(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.endOfMonth(this.local())) }
  tomorrow(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.tomorrow(this.local())) }
  yesterday(): ZonedTime { return this.wrap(LOCAL_OPERATIONS.yesterday(this.local())) }
  round(digits = 0): ZonedTime { return this.wrap(LOCAL_OPERATIONS.round(this.local(), digits)) }
  allDay(): ZonedRange { return this.wrap(LOCAL_OPERATIONS.allDay(this.local())) }

  // ==========================================================================
  // Freezing
  // ==========================================================================

  /** Force every derived field, then forbid further writes */
  freeze(): this {
    this.period()
    this.utc()
    this.local()
    Object.freeze(this)
    return this
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private resolveKeepingPeriod(local: CivilTime, zone: Timezone): ZonedTime {
    const current = this.period()
    const keep = includesPeriod(zone.periodsForLocal(local), current)
    return ZonedTime.fromLocal(local, zone, keep ? current : undefined)
  }

  private wrapLocal(local: CivilTime): ZonedTime {
    return this.resolveKeepingPeriod(local, this.zone)
  }

  private wrap(result: CivilTime): ZonedTime
  private wrap(result: CivilRange): ZonedRange
  private wrap(result: LocalResult): ZonedResult
  private wrap(result: LocalResult): ZonedResult {
    if (isCivilRange(result)) return { begin: this.wrapLocal(result.begin), end: this.wrapLocal(result.end) }
    if (typeof result === 'object') return this.wrapLocal(result)
    return result
  }
}

// ============================================================================
// Conversion
// ============================================================================

/** The instant of any time-like value, seen in a zone */
export function inTimeZone(time: TimeComparable, zone: ZoneInput = defaultZone()): ZonedTime {
  return ZonedTime.fromUTC(coerceInstant(time), zone)
}
