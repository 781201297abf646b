/**
 * Segment 11: Serialization Tests
 */

import { describe, it, expect } from 'vitest'
import { ZonedTime } from '../src/zoned-time'
import { Instant } from '../src/instant'
import { makeCivilTime } from '../src/civil-time'
import {
  encodeZonedTime,
  decodeZonedTime,
  dumpZonedTime,
  loadZonedTime,
} from '../src/serialization'
import { ZoneRegistry } from '../src/zone-registry'
import { FixedOffsetTimezone } from '../src/timezone'
import { InvalidDataError, InvalidZoneError } from '../src/errors'

const NY = 'America/New_York'

describe('Segment 11: Serialization', () => {
  const z = ZonedTime.fromUTC(Instant.parse('2024-07-04T13:00:00Z'), NY)

  // ========================================================================
  // Structured form
  // ========================================================================

  describe('encode / decode', () => {
    it('writes the instant, zone name and wall clock', () => {
      expect(encodeZonedTime(z)).toEqual({
        utc: '2024-07-04T13:00:00.000000000Z',
        zone: NY,
        time: makeCivilTime(2024, 7, 4, 9),
      })
    })

    it('restores an eql value in the same zone', () => {
      const restored = decodeZonedTime(encodeZonedTime(z))
      expect(restored.eql(z)).toBe(true)
      expect(restored.zone.name).toBe(NY)
      expect(restored.local()).toEqual(z.local())
    })

    it('survives a trip through JSON text', () => {
      const restored = decodeZonedTime(JSON.parse(JSON.stringify(encodeZonedTime(z))))
      expect(restored.eql(z)).toBe(true)
    })

    it('keeps nanoseconds', () => {
      const fine = ZonedTime.fromUTC(Instant.of(1_720_098_000, 123_456_789), NY)
      expect(decodeZonedTime(encodeZonedTime(fine)).nanosecond()).toBe(123_456_789)
    })

    it('keeps the standard half of a fold', () => {
      const est = ZonedTime.fromUTC(Instant.parse('2024-11-03T06:30:00Z'), NY)
      const restored = decodeZonedTime(encodeZonedTime(est))
      expect(restored.abbreviation()).toBe('EST')
    })

    it('accepts data without the wall clock', () => {
      const restored = decodeZonedTime({ utc: '2024-07-04T13:00:00Z', zone: NY })
      expect(restored.hour()).toBe(9)
    })

    it('resolves zones through the given registry', () => {
      const registry = new ZoneRegistry()
      const custom = registry.register(new FixedOffsetTimezone(7_200))
      const restored = decodeZonedTime({ utc: '2024-07-04T13:00:00Z', zone: '+02:00' }, registry)
      expect(restored.zone).toBe(custom)
    })
  })

  // ========================================================================
  // Compact form
  // ========================================================================

  describe('dump / load', () => {
    it('writes a triple', () => {
      expect(dumpZonedTime(z)).toEqual(['2024-07-04T13:00:00.000000000Z', NY, makeCivilTime(2024, 7, 4, 9)])
    })

    it('restores an eql value', () => {
      expect(loadZonedTime(dumpZonedTime(z)).eql(z)).toBe(true)
    })
  })

  // ========================================================================
  // Malformed data
  // ========================================================================

  describe('malformed data', () => {
    it('rejects non-objects', () => {
      expect(() => decodeZonedTime(null)).toThrow(InvalidDataError)
      expect(() => decodeZonedTime('2024-07-04T13:00:00Z')).toThrow(InvalidDataError)
      expect(() => decodeZonedTime([])).toThrow(InvalidDataError)
    })

    it('rejects fields of the wrong type', () => {
      expect(() => decodeZonedTime({ utc: 5, zone: NY })).toThrow("Expected 'utc' to be a string, got number")
      expect(() => decodeZonedTime({ utc: '2024-07-04T13:00:00Z', zone: NY, time: 'noon' })).toThrow(
        InvalidDataError,
      )
    })

    it('rejects an unreadable instant', () => {
      expect(() => decodeZonedTime({ utc: 'nope', zone: NY })).toThrow(InvalidDataError)
    })

    it('rejects a wall clock that disagrees with the instant', () => {
      const data = { ...encodeZonedTime(z), time: makeCivilTime(2024, 7, 4, 10) }
      expect(() => decodeZonedTime(data)).toThrow(InvalidDataError)
    })

    it('rejects unknown zones', () => {
      expect(() => decodeZonedTime({ utc: '2024-07-04T13:00:00Z', zone: 'Nowhere/City' })).toThrow(InvalidZoneError)
    })

    it('rejects triples of the wrong length', () => {
      expect(() => loadZonedTime(['2024-07-04T13:00:00Z', NY])).toThrow(InvalidDataError)
      expect(() => loadZonedTime({})).toThrow(InvalidDataError)
    })
  })
})
