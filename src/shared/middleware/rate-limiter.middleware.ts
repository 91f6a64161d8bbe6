/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Per-IP request limit with express-rate-limit's in-memory store.
 * The gateway in front of this service does its own limiting; this one only
 * protects the optimizer from a runaway client.
 *
 * Rejections go through the error middleware as RateLimitError (429).
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { RequestHandler } from 'express';
import { RateLimitError } from '../../core';
import { logger } from '../services/logger.service';

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number;
}

/**
 * Build the limiter for the given window
 */
export function createRateLimiter(options: RateLimiterOptions): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.maxRequests,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    // Health probes must never be throttled
    skip: (req) => req.path.startsWith('/health'),
    handler: (req, _res, next) => {
      logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
      next(new RateLimitError('Too many requests, please try again later', Math.ceil(options.windowMs / 1000)));
    },
  });
}
