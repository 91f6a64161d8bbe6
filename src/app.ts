/**
 * =============================================================================
 * EXPRESS APP
 * =============================================================================
 *
 * Builds the HTTP app around an optimizer service the caller owns.
 * server.ts uses it to listen; tests use it against an ephemeral port.
 *
 * Middleware order:
 *   request id -> compression -> helmet -> cors -> json body
 *   -> request logging -> rate limiting -> routes -> 404 -> error handler
 *
 * Routes are served at the root (the gateway proxies paths unchanged) and
 * under /api/v1/optimizer for direct clients.
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './config/environment';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { createRateLimiter, RateLimiterOptions } from './shared/middleware/rate-limiter.middleware';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { createHealthRouter } from './shared/routes/health.routes';
import { createOptimizerRouter, FleetOptimizerService } from './modules/optimizer';

export const API_PREFIX = '/api/v1/optimizer';

export interface AppOptions {
  /** Limiter window, or false to disable. Defaults to RATE_LIMIT_* / ENABLE_RATE_LIMITING */
  rateLimit?: RateLimiterOptions | false;
  /** Defaults to ENABLE_REQUEST_LOGGING */
  requestLogging?: boolean;
}

export function createApp(service: FleetOptimizerService, options: AppOptions = {}): Express {
  const app = express();
  const rateLimit = options.rateLimit ?? (config.security.enableRateLimiting ? config.rateLimit : false);
  const requestLogging = options.requestLogging ?? config.security.enableRequestLogging;

  app.disable('x-powered-by');

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024, // Only compress responses > 1KB
  }));

  app.use(securityHeaders);

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: config.jsonBodyLimit }));

  if (requestLogging) {
    app.use(requestLogger);
  }

  if (rateLimit) {
    app.use(createRateLimiter(rateLimit));
  }

  // Health & monitoring
  app.use('/', createHealthRouter(service));

  // Optimizer API
  const optimizerRouter = createOptimizerRouter(service);
  app.use('/', optimizerRouter);
  app.use(API_PREFIX, optimizerRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
