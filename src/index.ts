/**
 * zonedtime
 *
 * Public API exports
 */

// Error system (base class, codes and subclasses)
export {
  ZonedTimeError, ZonedTimeErrorCode,
  ParseError, InvalidCivilTimeError, InvalidDurationError,
  InvalidZoneError, NoSuchLocalTimeError, AmbiguousLocalTimeError,
  ConflictingZoneSpecError, UnsupportedOperationError,
  InvalidDataError, ConfigurationError,
} from './errors'
export type { ZonedTimeErrorCode as ZonedTimeErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Civil time (wall-clock fields + calendar arithmetic)
export type { CivilTime, CivilRange, AdvanceOptions, CivilChange } from './civil-time'
export {
  isLeapYear, daysInMonth, daysInYear,
  makeCivilTime, validateCivilTime, parseCivilTime, isCivilTime,
  civilToEpochSeconds, epochSecondsToCivil,
  addSeconds, addDays, addMonths, daysBetween, advanceCivil, changeCivil,
  weekdayOf, yearDayOf, compareCivil, civilEquals, formatCivil,
} from './civil-time'

// Shared contracts
export type { Period, TimeLike, TimeComparable } from './types'
export { periodEquals, includesPeriod, isTimeLike } from './types'

// Instant (plain UTC time value)
export { Instant, parseInstant, coerceInstant } from './instant'

// Durations
export type { DurationUnit, DurationParts, DurationPart, DurationInput } from './duration'
export { Duration, toDuration, isVariableLength, fixedSeconds, negateDuration } from './duration'

// Timezones
export type { Timezone } from './timezone'
export { IntlTimezone, FixedOffsetTimezone, sameZone, isValidZoneName } from './timezone'
export type { ZoneInput } from './zone-registry'
export { ZoneRegistry, defaultRegistry, findZone, parseUtcOffset } from './zone-registry'

// Configuration
export type { ZonedTimeConfig, ZonedTimeConfigInput } from './config'
export { configure, getConfig, resetConfig, defaultZone } from './config'

// Formatting
export type { StrftimeInput } from './strftime'
export { strftime, formatOffset } from './strftime'
export type { FormattableTime, TimeFormat } from './formats'
export { TIME_FORMATS, lookupFormat, ordinalize } from './formats'

// Delegated wall-clock operations
export type { LocalOperationName, LocalResult } from './local-operations'
export { LOCAL_OPERATIONS, isLocalOperationName } from './local-operations'

// ZonedTime
export type { UTCInput, LocalInput, ChangeOptions, ZonedRange, ZonedResult } from './zoned-time'
export { ZonedTime, inTimeZone, MAX_GAP_SHIFTS } from './zoned-time'

// Serialization
export type { EncodedZonedTime, DumpedZonedTime } from './serialization'
export { encodeZonedTime, decodeZonedTime, dumpZonedTime, loadZonedTime } from './serialization'
