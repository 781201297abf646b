/**
 * Zone Registry
 *
 * Resolves zone names and UTC offsets to shared Timezone records. Two
 * lookups of the same name return the same object.
 */

import { InvalidZoneError } from './errors'
import { type Timezone, IntlTimezone, FixedOffsetTimezone } from './timezone'

export { InvalidZoneError } from './errors'

/** A zone record, an IANA name, or an offset (`"+05:30"`, `"-0800"`, seconds) */
export type ZoneInput = Timezone | string | number

const OFFSET_PATTERN = /^([+-])(\d{2})(?::?(\d{2}))?(?::?(\d{2}))?$/

/** Seconds east of UTC for an offset string, or undefined when it is not one */
export function parseUtcOffset(text: string): number | undefined {
  const match = OFFSET_PATTERN.exec(text.trim())
  if (!match) return undefined
  const [, sign, hh, mm, ss] = match
  const hours = parseInt(hh ?? '0', 10)
  const minutes = mm ? parseInt(mm, 10) : 0
  const seconds = ss ? parseInt(ss, 10) : 0
  if (minutes > 59 || seconds > 59) return undefined
  const total = hours * 3600 + minutes * 60 + seconds
  return sign === '-' ? -total : total
}

export class ZoneRegistry {
  private readonly zones = new Map<string, Timezone>()

  findZone(input: ZoneInput): Timezone {
    if (typeof input === 'number') return this.fixed(input)
    if (typeof input !== 'string') return input

    const name = input.trim()
    if (name === '') throw new InvalidZoneError('Time zone name must not be empty')

    const offset = parseUtcOffset(name)
    if (offset !== undefined) return this.fixed(offset)

    const cached = this.zones.get(name)
    if (cached) return cached
    const zone = new IntlTimezone(name)
    this.zones.set(name, zone)
    return zone
  }

  /** Register a custom zone under its own name, replacing any cached one */
  register(zone: Timezone): Timezone {
    this.zones.set(zone.name, zone)
    return zone
  }

  private fixed(utcOffsetSeconds: number): Timezone {
    if (utcOffsetSeconds === 0) return this.findZone('UTC')
    const zone = new FixedOffsetTimezone(utcOffsetSeconds)
    const cached = this.zones.get(zone.name)
    if (cached) return cached
    this.zones.set(zone.name, zone)
    return zone
  }
}

export const defaultRegistry = new ZoneRegistry()

export function findZone(input: ZoneInput): Timezone {
  return defaultRegistry.findZone(input)
}
