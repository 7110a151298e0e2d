/**
 * Consolidated error system for datetime-helper.
 *
 * All error classes extend DateTimeHelperError, which carries a typed error code.
 * Operations that can fail on well-formed-but-wrong input throw one of these;
 * operations that model absence return null instead.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DateTimeHelperErrorCode = {
  UNSUPPORTED_SELECTOR: 'UNSUPPORTED_SELECTOR',
  PARSE_ERROR: 'PARSE_ERROR',
  UNKNOWN_ZONE: 'UNKNOWN_ZONE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type DateTimeHelperErrorCode =
  (typeof DateTimeHelperErrorCode)[keyof typeof DateTimeHelperErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DateTimeHelperError extends Error {
  readonly code: DateTimeHelperErrorCode

  constructor(code: DateTimeHelperErrorCode, message: string) {
    super(message)
    this.name = 'DateTimeHelperError'
    this.code = code
  }
}

// ============================================================================
// Subclasses
// ============================================================================

/** Thrown by todayDate for a selector outside FULL | YEAR | MONTH | DAY */
export class UnsupportedSelectorError extends DateTimeHelperError {
  constructor(message: string) {
    super(DateTimeHelperErrorCode.UNSUPPORTED_SELECTOR, message)
    this.name = 'UnsupportedSelectorError'
  }
}

export class ParseError extends DateTimeHelperError {
  constructor(message: string) {
    super(DateTimeHelperErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

/** Zone id is neither Z, a ±HH:MM offset, nor a region the runtime knows */
export class UnknownZoneError extends DateTimeHelperError {
  constructor(message: string) {
    super(DateTimeHelperErrorCode.UNKNOWN_ZONE, message)
    this.name = 'UnknownZoneError'
  }
}

export class InvalidArgumentError extends DateTimeHelperError {
  constructor(message: string) {
    super(DateTimeHelperErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}
