/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One line per finished request, tagged with the optimizer route that served
 * it (`POST /optimize`, `GET /history`, ...) and the mount it came through
 * (gateway root or /api/v1/optimizer). Optimize calls also carry the size of
 * the submitted problem so slow runs can be matched to their input.
 *
 * Bodies are never logged; sensitive query parameters are masked.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

// Query params to mask in logs
const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password'];

interface RequestLogEntry {
  method: string;
  route: string;
  mount: string;
  status: number;
  durationMs: number;
  requestId?: string;
  deliveries?: number;
  vehicles?: number;
  query?: Record<string, unknown>;
}

function maskQueryParams(query: Request['query']): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(query).map(([key, value]) => [
      key,
      SENSITIVE_PARAMS.some(param => key.toLowerCase().includes(param)) ? '[MASKED]' : value,
    ])
  );
}

/**
 * Matched route pattern, or the raw path when no route handled the request
 */
function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  return typeof pattern === 'string' ? `${req.method} ${pattern}` : `${req.method} ${req.path} (unmatched)`;
}

function listLength(body: unknown, field: string): number | undefined {
  if (typeof body !== 'object' || body === null || !(field in body)) return undefined;
  const value: unknown = Reflect.get(body, field);
  return Array.isArray(value) ? value.length : undefined;
}

function buildRequestLogEntry(req: Request, res: Response, durationMs: number): RequestLogEntry {
  const requestId = req.headers['x-request-id'];
  const isOptimize = req.method === 'POST' && req.route?.path === '/optimize';

  return {
    method: req.method,
    route: routeLabel(req),
    mount: req.baseUrl || '/',
    status: res.statusCode,
    durationMs,
    ...(typeof requestId === 'string' && { requestId }),
    ...(isOptimize && {
      deliveries: listLength(req.body, 'deliveries') ?? 0,
      vehicles: listLength(req.body, 'vehicles') ?? 0,
    }),
    ...(Object.keys(req.query).length > 0 && { query: maskQueryParams(req.query) }),
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const entry = buildRequestLogEntry(req, res, Date.now() - startTime);

    if (entry.status >= 500) {
      logger.error(`[HTTP] ${entry.route} failed`, entry);
    } else if (entry.status >= 400) {
      logger.warn(`[HTTP] ${entry.route} rejected`, entry);
    } else {
      logger.info(`[HTTP] ${entry.route}`, entry);
    }
  });

  next();
}
