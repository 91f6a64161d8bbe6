/**
 * =============================================================================
 * FLEET OPTIMIZER SERVICE
 * =============================================================================
 *
 * Orchestrates an optimize call:
 *
 *   assignRoutes() -> OptimizationRun -> ledger.record() -> fleet snapshot
 *                  -> buildRecommendations(submitted vehicles, ledger tail)
 *
 * The ledger only ever sees COMPLETED runs: if assignment throws, the error
 * is logged, wrapped in a ComputationError and nothing is recorded.
 *
 * Owned by the caller (server.ts builds one per process, tests build their
 * own) - there is no module-level instance.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { AppError, ComputationError } from '../../core';
import { logger } from '../../shared/services/logger.service';
import { assignRoutes } from './assignment.engine';
import { evaluateFuelFeasibility } from './fuel-feasibility';
import { buildRecommendations } from './recommendation.engine';
import { OptimizationLedger } from './optimization-ledger';
import { FleetStateStore } from './fleet-state.store';
import {
  AssignmentResult,
  DeliveryStop,
  FuelFeasibility,
  OPTIMIZER_CONFIG,
  OptimizationRun,
  Recommendation,
  Vehicle,
} from './optimizer.schema';

export type RouteAssigner = (
  deliveries: readonly DeliveryStop[],
  vehicles: readonly Vehicle[]
) => AssignmentResult;

export interface FleetOptimizerDeps {
  ledger: OptimizationLedger;
  fleetState: FleetStateStore;
  /** Defaults to the greedy assignment engine */
  assigner?: RouteAssigner;
}

export interface OptimizeOutcome {
  optimizationId: string;
  timestamp: string;
  result: AssignmentResult;
  totalDeliveriesAssigned: number;
  recommendations: Recommendation[];
}

export interface RecommendationsOutcome {
  recommendations: Recommendation[];
  timestamp: string;
}

export interface HistoryOutcome {
  history: OptimizationRun[];
  totalCount: number;
  showing: number;
}

export interface OptimizerStats {
  vehiclesRegistered: number;
  activeRoutes: number;
  optimizationsRecorded: number;
  ledgerCapacity: number;
}

export class FleetOptimizerService {
  private readonly ledger: OptimizationLedger;
  private readonly fleetState: FleetStateStore;
  private readonly assigner: RouteAssigner;

  constructor(deps: FleetOptimizerDeps) {
    this.ledger = deps.ledger;
    this.fleetState = deps.fleetState;
    this.assigner = deps.assigner ?? assignRoutes;
  }

  /**
   * Assign and sequence deliveries for the submitted fleet
   */
  optimize(deliveries: readonly DeliveryStop[], vehicles: readonly Vehicle[]): OptimizeOutcome {
    const startedAt = Date.now();
    const result = this.runAssignment(deliveries, vehicles);

    const assigned = deliveries.length - result.unassigned.length;
    const run: OptimizationRun = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      totalDeliveries: deliveries.length,
      totalVehicles: vehicles.length,
      assignmentsMade: assigned,
      efficiencyScore: assigned / Math.max(1, deliveries.length),
    };

    this.ledger.record(run);
    this.fleetState.update(vehicles, result.assignments.size);

    const recommendations = buildRecommendations(
      vehicles,
      this.ledger.recent(OPTIMIZER_CONFIG.EFFICIENCY_WINDOW)
    );

    logger.info('[Optimizer] Run completed', {
      optimizationId: run.id,
      deliveries: run.totalDeliveries,
      vehicles: run.totalVehicles,
      assigned,
      vehiclesUsed: result.assignments.size,
      efficiency: Number(run.efficiencyScore.toFixed(3)),
      durationMs: Date.now() - startedAt,
    });

    return {
      optimizationId: run.id,
      timestamp: run.timestamp,
      result,
      totalDeliveriesAssigned: assigned,
      recommendations,
    };
  }

  /**
   * Fuel consumption and deficit of a route for one vehicle
   */
  fuelEfficiency(vehicle: Vehicle, routeDistanceKm: number): FuelFeasibility {
    const feasibility = evaluateFuelFeasibility(vehicle, routeDistanceKm);

    if (feasibility.needsRefuel) {
      logger.warn(`[Optimizer] Vehicle ${vehicle.id} needs refuel for ${routeDistanceKm} km`, {
        deficit: feasibility.fuelDeficit,
      });
    }

    return feasibility;
  }

  /**
   * Recommendations for the latest known fleet state
   */
  recommendations(): RecommendationsOutcome {
    const { vehicles } = this.fleetState.snapshot();
    return {
      recommendations: buildRecommendations(
        vehicles,
        this.ledger.recent(OPTIMIZER_CONFIG.EFFICIENCY_WINDOW)
      ),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Most recent runs, oldest first
   */
  history(limit: number): HistoryOutcome {
    const history = this.ledger.recent(limit);
    return {
      history,
      totalCount: this.ledger.count(),
      showing: history.length,
    };
  }

  stats(): OptimizerStats {
    const snapshot = this.fleetState.snapshot();
    return {
      vehiclesRegistered: snapshot.vehicles.length,
      activeRoutes: snapshot.activeRoutes,
      optimizationsRecorded: this.ledger.count(),
      ledgerCapacity: this.ledger.capacity,
    };
  }

  private runAssignment(
    deliveries: readonly DeliveryStop[],
    vehicles: readonly Vehicle[]
  ): AssignmentResult {
    try {
      return this.assigner(deliveries, vehicles);
    } catch (error) {
      if (error instanceof AppError) throw error;

      logger.error('[Optimizer] Route assignment failed', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        deliveries: deliveries.length,
        vehicles: vehicles.length,
      });

      throw new ComputationError(
        'Route optimization failed',
        { deliveries: deliveries.length, vehicles: vehicles.length },
        error
      );
    }
  }
}
