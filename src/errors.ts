/**
 * Consolidated error system for zonedtime.
 *
 * All error classes extend ZonedTimeError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ZonedTimeErrorCode = {
  // Parsing & fields
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CIVIL_TIME: 'INVALID_CIVIL_TIME',
  INVALID_DURATION: 'INVALID_DURATION',

  // Zone resolution
  INVALID_ZONE: 'INVALID_ZONE',
  NO_SUCH_LOCAL_TIME: 'NO_SUCH_LOCAL_TIME',
  AMBIGUOUS_LOCAL_TIME: 'AMBIGUOUS_LOCAL_TIME',

  // ZonedTime operations
  CONFLICTING_ZONE_SPEC: 'CONFLICTING_ZONE_SPEC',
  UNSUPPORTED_OPERATION: 'UNSUPPORTED_OPERATION',

  // Serialization
  INVALID_DATA: 'INVALID_DATA',

  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type ZonedTimeErrorCode = (typeof ZonedTimeErrorCode)[keyof typeof ZonedTimeErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ZonedTimeError extends Error {
  readonly code: ZonedTimeErrorCode

  constructor(code: ZonedTimeErrorCode, message: string) {
    super(message)
    this.name = 'ZonedTimeError'
    this.code = code
  }
}

// ============================================================================
// Parsing & Field Errors
// ============================================================================

export class ParseError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidCivilTimeError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.INVALID_CIVIL_TIME, message)
    this.name = 'InvalidCivilTimeError'
  }
}

export class InvalidDurationError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.INVALID_DURATION, message)
    this.name = 'InvalidDurationError'
  }
}

// ============================================================================
// Zone Resolution Errors
// ============================================================================

export class InvalidZoneError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.INVALID_ZONE, message)
    this.name = 'InvalidZoneError'
  }
}

/** Thrown by a resolver when wall-clock fields fall in a DST gap */
export class NoSuchLocalTimeError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.NO_SUCH_LOCAL_TIME, message)
    this.name = 'NoSuchLocalTimeError'
  }
}

/** Thrown when forward shifting out of a gap never reaches a valid local time */
export class AmbiguousLocalTimeError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.AMBIGUOUS_LOCAL_TIME, message)
    this.name = 'AmbiguousLocalTimeError'
  }
}

// ============================================================================
// ZonedTime Operation Errors
// ============================================================================

export class ConflictingZoneSpecError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.CONFLICTING_ZONE_SPEC, message)
    this.name = 'ConflictingZoneSpecError'
  }
}

export class UnsupportedOperationError extends ZonedTimeError {
  readonly operation: string

  constructor(operation: string, message: string) {
    super(ZonedTimeErrorCode.UNSUPPORTED_OPERATION, message)
    this.name = 'UnsupportedOperationError'
    this.operation = operation
  }
}

// ============================================================================
// Serialization Errors
// ============================================================================

export class InvalidDataError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends ZonedTimeError {
  constructor(message: string) {
    super(ZonedTimeErrorCode.INVALID_CONFIG, message)
    this.name = 'ConfigurationError'
  }
}
