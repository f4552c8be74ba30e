/**
 * Error Response Utilities
 *
 * Utilities for creating structured success and error responses for tools
 */

import { ZodError } from 'zod';
import { ConversionError } from './conversion-error.js';
import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Tool response type
 */
export interface ToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Normalize any thrown value into a ConversionError.
 */
export function toConversionError(error: unknown): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return new ConversionError(
      `Invalid input: ${issues.join('; ')}`,
      ErrorCode.INVALID_ARGUMENT,
      ErrorSeverity.ERROR,
      { issues },
      error,
    );
  }
  if (error instanceof Error) {
    return ConversionError.fromError(error);
  }
  return new ConversionError(String(error), ErrorCode.UNKNOWN_ERROR);
}

/**
 * Create a structured error response for tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 * @returns Structured tool response with isError flag
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): ToolResponse {
  const structured = toConversionError(error).toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [
      {
        type: 'text',
        text: textParts.join('\n'),
      },
    ],
    structuredContent: { ...structured },
    isError: true,
  };
}

/**
 * Create a success response with structured output
 *
 * @param output - Output data to return
 * @returns Structured tool response
 */
export function createSuccessResponse(output: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}
