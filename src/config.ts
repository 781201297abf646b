/**
 * Configuration
 *
 * Process-wide settings, meant to be set once at startup with configure():
 * the default zone used where a caller names none, the number of fraction
 * digits toJSON() writes, and extra named formats for toString().
 */

import { ConfigurationError } from './errors'
import type { Timezone } from './timezone'
import { findZone } from './zone-registry'
import type { TimeFormat } from './formats'

export type ZonedTimeConfig = {
  defaultZone: string
  jsonPrecision: number
  formats: Readonly<Record<string, TimeFormat>>
}

export type ZonedTimeConfigInput = Partial<ZonedTimeConfig>

const DEFAULTS: ZonedTimeConfig = {
  defaultZone: 'UTC',
  jsonPrecision: 3,
  formats: {},
}

let current: ZonedTimeConfig = { ...DEFAULTS }
let defaultZoneConfigured = false

export function configure(input: ZonedTimeConfigInput): ZonedTimeConfig {
  const next: ZonedTimeConfig = { ...current }

  if (input.defaultZone !== undefined) {
    // Throws InvalidZoneError for unknown names
    const zone = findZone(input.defaultZone)
    if (defaultZoneConfigured && zone.name !== current.defaultZone) {
      console.warn(`Default time zone changed from '${current.defaultZone}' to '${zone.name}' after it was configured`)
    }
    next.defaultZone = zone.name
  }

  if (input.jsonPrecision !== undefined) {
    if (!Number.isInteger(input.jsonPrecision) || input.jsonPrecision < 0 || input.jsonPrecision > 9) {
      throw new ConfigurationError(`jsonPrecision must be an integer in 0..9, got ${input.jsonPrecision}`)
    }
    next.jsonPrecision = input.jsonPrecision
  }

  if (input.formats !== undefined) {
    next.formats = { ...current.formats, ...input.formats }
  }

  current = next
  if (input.defaultZone !== undefined) defaultZoneConfigured = true
  return current
}

export function getConfig(): Readonly<ZonedTimeConfig> {
  return current
}

/** Restore the defaults (UTC, precision 3, no extra formats) */
export function resetConfig(): void {
  current = { ...DEFAULTS }
  defaultZoneConfigured = false
}

export function defaultZone(): Timezone {
  return findZone(current.defaultZone)
}
