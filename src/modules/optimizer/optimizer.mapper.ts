/**
 * Domain -> wire format (snake_case field names clients already use).
 */

import {
  DeliveryStop,
  DeliveryStopResponse,
  FuelEfficiencyResponse,
  FuelFeasibility,
  HistoryResponse,
  OptimizationRun,
  OptimizationRunResponse,
  OptimizeResponse,
  Recommendation,
  RecommendationResponse,
  RecommendationsResponse,
  RouteAssignment,
  RouteAssignmentResponse,
} from './optimizer.schema';
import { HistoryOutcome, OptimizeOutcome, RecommendationsOutcome } from './optimizer.service';

export function toDeliveryStopResponse(stop: DeliveryStop): DeliveryStopResponse {
  return {
    id: stop.id,
    name: stop.name,
    latitude: stop.latitude,
    longitude: stop.longitude,
    priority: stop.priority,
    time_window_start: stop.timeWindowStart,
    time_window_end: stop.timeWindowEnd,
    estimated_duration: stop.estimatedDurationMinutes,
  };
}

export function toRouteAssignmentResponse(assignment: RouteAssignment): RouteAssignmentResponse {
  return {
    vehicle_id: assignment.vehicleId,
    route: assignment.route.map(toDeliveryStopResponse),
    total_distance: assignment.totalDistanceKm,
    estimated_time: assignment.estimatedTimeMinutes,
    stops_count: assignment.stopsCount,
    optimization_method: assignment.optimizationMethod,
  };
}

export function toRecommendationResponse(recommendation: Recommendation): RecommendationResponse {
  return {
    type: recommendation.type,
    ...(recommendation.vehicleId !== undefined && { vehicle_id: recommendation.vehicleId }),
    ...(recommendation.driverName !== undefined && { driver_name: recommendation.driverName }),
    ...(recommendation.fuelPercentage !== undefined && { fuel_percentage: recommendation.fuelPercentage }),
    priority: recommendation.priority,
    message: recommendation.message,
    recommendation: recommendation.recommendation,
  };
}

export function toOptimizationRunResponse(run: OptimizationRun): OptimizationRunResponse {
  return {
    id: run.id,
    timestamp: run.timestamp,
    total_deliveries: run.totalDeliveries,
    total_vehicles: run.totalVehicles,
    assignments_made: run.assignmentsMade,
    efficiency_score: run.efficiencyScore,
  };
}

export function toOptimizeResponse(outcome: OptimizeOutcome): OptimizeResponse {
  // fromEntries defines own properties, so an id such as "__proto__" stays a key
  const assignments: Record<string, RouteAssignmentResponse> = Object.fromEntries(
    [...outcome.result.assignments].map(([vehicleId, assignment]) => [
      vehicleId,
      toRouteAssignmentResponse(assignment),
    ])
  );

  return {
    optimization_id: outcome.optimizationId,
    result: {
      assignments,
      unassigned_deliveries: outcome.result.unassigned.map(toDeliveryStopResponse),
      total_vehicles_used: outcome.result.assignments.size,
      total_deliveries_assigned: outcome.totalDeliveriesAssigned,
      optimization_timestamp: outcome.timestamp,
    },
    recommendations: outcome.recommendations.map(toRecommendationResponse),
  };
}

export function toFuelEfficiencyResponse(feasibility: FuelFeasibility): FuelEfficiencyResponse {
  return {
    vehicle_id: feasibility.vehicleId,
    route_distance: feasibility.routeDistanceKm,
    estimated_fuel_consumption: feasibility.estimatedFuelConsumption,
    current_fuel_level: feasibility.currentFuelLevel,
    max_fuel: feasibility.maxFuel,
    fuel_deficit: feasibility.fuelDeficit,
    fuel_percentage: feasibility.fuelPercentage,
    needs_refuel: feasibility.needsRefuel,
  };
}

export function toRecommendationsResponse(outcome: RecommendationsOutcome): RecommendationsResponse {
  return {
    recommendations: outcome.recommendations.map(toRecommendationResponse),
    total_count: outcome.recommendations.length,
    timestamp: outcome.timestamp,
  };
}

export function toHistoryResponse(outcome: HistoryOutcome): HistoryResponse {
  return {
    history: outcome.history.map(toOptimizationRunResponse),
    total_count: outcome.totalCount,
    showing: outcome.showing,
  };
}
