/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a schema helper
 * throw ValidationError.fromZodError(result.error);
 *
 * // In the optimizer service
 * throw new ComputationError('Route assignment failed', { deliveries: 12 });
 * ```
 *
 * The error middleware serializes every AppError through toJSON(), so the
 * status code and error code chosen here are what the client sees.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        timestamp: this.timestamp
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - a field is missing, malformed or not coercible
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = []
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.VALIDATION_ERROR, true, { errors });
    this.errors = errors;
  }

  static fromZodError(
    zodError: { errors: Array<{ path: (string | number)[]; message: string }> },
    message: string = 'Invalid request data'
  ): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(message, errors);
  }
}

/**
 * 404 Not Found - route or resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, HTTP_STATUS.NOT_FOUND, ErrorCode.NOT_FOUND, true);
  }
}

/**
 * 429 Too Many Requests - Rate limited
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message: string = 'Too many requests',
    retryAfter: number = 60
  ) {
    super(message, HTTP_STATUS.TOO_MANY_REQUESTS, ErrorCode.RATE_LIMIT_EXCEEDED, true, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/**
 * 500 Computation Error - assignment or sequencing failed unexpectedly.
 * Not operational: the client only ever sees a generic message.
 */
export class ComputationError extends AppError {
  constructor(
    message: string = 'Route optimization failed',
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.OPTIMIZATION_FAILED, false, details);
    this.cause = cause;
  }
}
