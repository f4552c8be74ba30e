/**
 * Error Codes
 *
 * Stable identifiers for every failure the converter reports.
 */

export enum ErrorCode {
  // Input
  MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  INPUT_UNREADABLE = 'INPUT_UNREADABLE',

  // Output
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',

  // Resources
  STYLESHEET_UNREADABLE = 'STYLESHEET_UNREADABLE',

  // Configuration
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
