/**
 * Conversion Error Types
 *
 * Structured errors raised by the parsing layer, the conversion pipelines
 * and the tool server.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Structured error payload as returned to tool callers.
 */
export interface StructuredError {
  error: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base conversion error
 *
 * Extends Error with a code, a severity and optional details for structured
 * responses.
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ConversionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError);
    }
  }

  /**
   * Convert to structured error object for tool responses
   */
  toStructured(): StructuredError {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Create from standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): ConversionError {
    return new ConversionError(error.message, code, severity, undefined, error);
  }
}

/**
 * Raised when the input cannot be parsed as a document.
 */
export class MalformedDocumentError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.MALFORMED_DOCUMENT, ErrorSeverity.ERROR, details, cause);
    this.name = 'MalformedDocumentError';
  }
}

/**
 * Raised when a file the conversion depends on cannot be read or written.
 */
export class ResourceError extends ConversionError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INPUT_UNREADABLE,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'ResourceError';
  }
}

export class ConfigurationError extends ConversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_CONFIGURATION, ErrorSeverity.ERROR, details);
    this.name = 'ConfigurationError';
  }
}
