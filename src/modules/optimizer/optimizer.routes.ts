/**
 * =============================================================================
 * OPTIMIZER MODULE - ROUTES
 * =============================================================================
 *
 * @route POST /optimize          Assign and sequence deliveries for a fleet
 * @route POST /fuel-efficiency   Fuel consumption / deficit for one route
 * @route GET  /recommendations   Fuel + efficiency recommendations
 * @route GET  /history?limit=    Recent optimization runs
 *
 * Access is enforced by the gateway in front of this service.
 * =============================================================================
 */

import { Router } from 'express';
import { OptimizerController } from './optimizer.controller';
import { FleetOptimizerService } from './optimizer.service';

export function createOptimizerRouter(service: FleetOptimizerService): Router {
  const router = Router();
  const controller = new OptimizerController(service);

  router.post('/optimize', controller.optimize);
  router.post('/fuel-efficiency', controller.fuelEfficiency);
  router.get('/recommendations', controller.recommendations);
  router.get('/history', controller.history);

  return router;
}
