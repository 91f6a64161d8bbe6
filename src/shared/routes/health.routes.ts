/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health      - Service status + fleet/ledger counters (gateway, dashboards)
 * - GET /health/live - Liveness probe (is the process running?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/environment';

/**
 * Anything that can report fleet counters for /health
 */
export interface HealthStatsProvider {
  stats(): {
    vehiclesRegistered: number;
    activeRoutes: number;
    optimizationsRecorded: number;
  };
}

export function createHealthRouter(provider: HealthStatsProvider): Router {
  const router = Router();

  // Track router start time
  const startTime = Date.now();

  /**
   * Basic health check
   */
  router.get('/health', (_req: Request, res: Response) => {
    const stats = provider.stats();
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: config.serviceName,
      version: config.version,
      vehicles_registered: stats.vehiclesRegistered,
      active_routes: stats.activeRoutes,
      optimizations_recorded: stats.optimizationsRecorded,
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000),
    });
  });

  return router;
}
