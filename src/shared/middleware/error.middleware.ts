/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * - Every error is logged server-side with request context
 * - AppErrors are serialized through toJSON() with their own status
 * - Non-operational errors never leak details to clients
 * - Stack traces never reach clients
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode, HTTP_STATUS, NotFoundError, ValidationError } from '../../core';
import { config } from '../../config/environment';

/**
 * Shape of the errors raised by express.json() / body-parser
 */
interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(error: Error): error is BodyParserError {
  return 'type' in error && typeof error.type === 'string';
}

/**
 * Map body-parser failures onto AppErrors so clients get the usual shape
 */
function normalizeError(error: Error): Error {
  if (!isBodyParserError(error)) return error;

  if (error.type === 'entity.parse.failed') {
    return new ValidationError('Malformed JSON body', [{ field: 'body', message: error.message }]);
  }
  if (error.type === 'entity.too.large') {
    return new AppError('Request body too large', HTTP_STATUS.PAYLOAD_TOO_LARGE, ErrorCode.VALIDATION_ERROR);
  }
  return error;
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = normalizeError(err);
  const isOperational = error instanceof AppError && error.isOperational;

  const logData = {
    error: error.message,
    code: error instanceof AppError ? error.code : ErrorCode.INTERNAL_ERROR,
    path: req.path,
    method: req.method,
    requestId: req.headers['x-request-id'],
  };

  if (isOperational) {
    logger.warn('Request rejected', logData);
  } else {
    logger.error('Request error', { ...logData, stack: error.stack });
  }

  if (error instanceof AppError) {
    const body = error.toJSON();
    if (!error.isOperational) {
      delete body.error.details;
    }
    res.status(error.statusCode).json(body);
    return;
  }

  // Unknown error - send generic response
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message,
      timestamp: new Date().toISOString()
    }
  });
}

/**
 * Not found handler - turns an unmatched route into a 404 AppError
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
}
