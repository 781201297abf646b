/**
 * Serialization
 *
 * Two shapes for a ZonedTime: a structured object `{ utc, zone, time }` and a
 * compact triple `[utc, zone, time]`. The UTC instant is written as an ISO
 * 8601 string with nanoseconds and is authoritative on the way back in.
 */

import { InvalidDataError } from './errors'
import { type CivilTime, civilFields, isCivilTime } from './civil-time'
import { parseInstant } from './instant'
import { ZonedTime } from './zoned-time'
import { type ZoneRegistry, defaultRegistry } from './zone-registry'

export { InvalidDataError } from './errors'

export type EncodedZonedTime = {
  utc: string
  zone: string
  time: CivilTime
}

export type DumpedZonedTime = [utc: string, zone: string, time: CivilTime]

// ============================================================================
// Encoding
// ============================================================================

export function encodeZonedTime(value: ZonedTime): EncodedZonedTime {
  return {
    utc: value.utc().toISOString(9),
    zone: value.zone.name,
    time: civilFields(value.local()),
  }
}

export function dumpZonedTime(value: ZonedTime): DumpedZonedTime {
  return [value.utc().toISOString(9), value.zone.name, civilFields(value.local())]
}

// ============================================================================
// Decoding
// ============================================================================

function restore(utc: unknown, zone: unknown, time: unknown, registry: ZoneRegistry): ZonedTime {
  if (typeof utc !== 'string') throw new InvalidDataError(`Expected 'utc' to be a string, got ${typeof utc}`)
  if (typeof zone !== 'string') throw new InvalidDataError(`Expected 'zone' to be a string, got ${typeof zone}`)

  let local: CivilTime | undefined
  if (time !== undefined) {
    if (!isCivilTime(time)) throw new InvalidDataError("Expected 'time' to hold civil time fields")
    local = civilFields(time)
  }

  const instant = parseInstant(utc)
  if (!instant.ok) throw new InvalidDataError(instant.error.message)

  return ZonedTime.fromSerialized(instant.value, registry.findZone(zone), local)
}

export function decodeZonedTime(data: unknown, registry: ZoneRegistry = defaultRegistry): ZonedTime {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new InvalidDataError('Encoded zoned time must be an object')
  }
  return restore(Reflect.get(data, 'utc'), Reflect.get(data, 'zone'), Reflect.get(data, 'time'), registry)
}

export function loadZonedTime(data: unknown, registry: ZoneRegistry = defaultRegistry): ZonedTime {
  if (!Array.isArray(data) || data.length !== 3) {
    throw new InvalidDataError('Dumped zoned time must be a [utc, zone, time] triple')
  }
  const [utc, zone, time]: unknown[] = data
  return restore(utc, zone, time, registry)
}
