/**
 * Custom Error Classes and Types for the deduplication service
 *
 * Every error raised by the service extends DedupError so callers can read a
 * stable code, an HTTP status and structured context from it.
 */

import type { Logger } from 'pino';

// Base error class for the deduplication service
export class DedupError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown at construction time when an index, sketcher or hash family is
 * given parameters it cannot work with. The instance is never usable.
 */
export class IllegalConfigurationError extends DedupError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ILLEGAL_CONFIGURATION', 500, context);
  }
}

/**
 * Thrown when a sketch does not have the length its sketcher produces
 */
export class InvalidSketchError extends DedupError {
  constructor(expected: number, actual: number) {
    super(
      `Sketch length mismatch. Expected ${expected}, got ${actual}`,
      'INVALID_SKETCH',
      500,
      { expected, actual }
    );
  }
}

/**
 * Thrown when input validation fails
 */
export class ValidationError extends DedupError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Thrown when a new document is given an id another indexed document holds
 */
export class DuplicateDocumentIdError extends DedupError {
  constructor(documentId: string) {
    super(`Document id already indexed: ${documentId}`, 'DUPLICATE_DOCUMENT_ID', 409, { documentId });
  }
}

// Error Response Types

/**
 * Standard error response format for API endpoints
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Error context for logging and debugging
 */
export interface ErrorContext {
  operation?: string;
  documentId?: string;
  requestId?: string;
  [key: string]: unknown;
}

export function isDedupError(error: unknown): error is DedupError {
  return error instanceof DedupError;
}

/**
 * Utility function to extract safe error information for logging
 */
export function extractErrorInfo(error: Error): {
  message: string;
  code?: string;
  statusCode?: number;
  context?: Record<string, unknown>;
} {
  if (isDedupError(error)) {
    return {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      context: error.context,
    };
  }

  return {
    message: error.message,
  };
}

/**
 * Error code constants for consistent usage across the application
 */
export const ERROR_CODES = {
  ILLEGAL_CONFIGURATION: 'ILLEGAL_CONFIGURATION',
  INVALID_SKETCH: 'INVALID_SKETCH',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  DUPLICATE_DOCUMENT_ID: 'DUPLICATE_DOCUMENT_ID',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Utility function to create a standardized error response
 */
export function createErrorResponse(
  error: Error,
  requestId?: string
): ErrorResponse {
  if (isDedupError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

/**
 * Utility function to log errors with proper context
 */
export function logError(
  logger: Logger,
  error: Error,
  context?: ErrorContext
): void {
  const errorInfo = extractErrorInfo(error);

  logger.error({
    error: errorInfo,
    context,
    timestamp: new Date().toISOString(),
  }, `Error occurred: ${error.message}`);
}
