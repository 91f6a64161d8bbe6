/**
 * =============================================================================
 * OPTIMIZER MODULE - CONTROLLER
 * =============================================================================
 *
 * Validates input with the optimizer schemas, calls the service and maps the
 * outcome to the wire format. Validation failures throw ValidationError
 * before the service is touched.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { validateSchema } from '../../shared/utils/validation.utils';
import { FleetOptimizerService } from './optimizer.service';
import {
  fuelEfficiencyRequestSchema,
  historyQuerySchema,
  optimizeRequestSchema,
} from './optimizer.schema';
import {
  toFuelEfficiencyResponse,
  toHistoryResponse,
  toOptimizeResponse,
  toRecommendationsResponse,
} from './optimizer.mapper';

export class OptimizerController {
  constructor(private readonly service: FleetOptimizerService) {}

  /**
   * POST /optimize
   */
  optimize = (req: Request, res: Response): void => {
    const { deliveries, vehicles } = validateSchema(optimizeRequestSchema, req.body);
    const outcome = this.service.optimize(deliveries, vehicles);
    res.json(toOptimizeResponse(outcome));
  };

  /**
   * POST /fuel-efficiency
   */
  fuelEfficiency = (req: Request, res: Response): void => {
    const { vehicle, routeDistanceKm } = validateSchema(fuelEfficiencyRequestSchema, req.body);
    res.json(toFuelEfficiencyResponse(this.service.fuelEfficiency(vehicle, routeDistanceKm)));
  };

  /**
   * GET /recommendations
   */
  recommendations = (_req: Request, res: Response): void => {
    res.json(toRecommendationsResponse(this.service.recommendations()));
  };

  /**
   * GET /history?limit=10
   */
  history = (req: Request, res: Response): void => {
    const { limit } = validateSchema(historyQuerySchema, req.query, 'Invalid query parameters');
    res.json(toHistoryResponse(this.service.history(limit)));
  };
}
