/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Helmet security headers (JSON API, no CSP needed)
 * - Request ID tracking, propagated from the gateway when present
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

const MAX_REQUEST_ID_LENGTH = 128;

function headerValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed.substring(0, MAX_REQUEST_ID_LENGTH) : undefined;
}

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = headerValue(req.headers['x-request-id']) ?? uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Helmet configuration for a JSON-only API
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: false,
  crossOriginEmbedderPolicy: false,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
});
