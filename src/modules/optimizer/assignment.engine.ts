/**
 * =============================================================================
 * ASSIGNMENT ENGINE - Partition deliveries across the fleet
 * =============================================================================
 *
 * 1. Vehicles are ordered by fuel ratio, fullest tank first (stable order,
 *    fixed for the whole run).
 * 2. Each vehicle takes the FIRST (not the closest) up to 5 pooled stops that
 *    lie strictly within 50 km of its current position.
 * 3. Those stops are sequenced by the route builder and leave the pool.
 * 4. Whatever is left once every vehicle had its turn is unassigned.
 *
 * A greedy feasibility heuristic: deterministic for a given input order,
 * with no claim to a global optimum.
 * =============================================================================
 */

import { haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import { buildRoute } from './route-builder';
import {
  AssignmentResult,
  DeliveryStop,
  OPTIMIZER_CONFIG,
  RouteAssignment,
  Vehicle,
} from './optimizer.schema';

/**
 * Fuel ratio in [0, 1] (above 1 if a caller over-reports the tank)
 */
export function fuelRatio(vehicle: Vehicle): number {
  return vehicle.fuelLevel / vehicle.maxFuel;
}

/**
 * Vehicles ordered most-fueled first; ties keep their input order
 */
export function orderVehiclesByFuel(vehicles: readonly Vehicle[]): Vehicle[] {
  return [...vehicles].sort((a, b) => fuelRatio(b) - fuelRatio(a));
}

/**
 * Indexes of the first pooled stops within range of the vehicle
 */
function selectCandidates(
  deliveries: readonly DeliveryStop[],
  taken: readonly boolean[],
  vehicle: Vehicle
): number[] {
  const candidates: number[] = [];

  for (let i = 0; i < deliveries.length; i++) {
    if (candidates.length >= OPTIMIZER_CONFIG.MAX_STOPS_PER_VEHICLE) break;
    if (taken[i]) continue;

    const delivery = deliveries[i];
    const distanceKm = haversineDistanceKm(
      vehicle.currentLat, vehicle.currentLon,
      delivery.latitude, delivery.longitude
    );

    if (distanceKm < OPTIMIZER_CONFIG.MAX_PICKUP_RADIUS_KM) {
      candidates.push(i);
    }
  }

  return candidates;
}

/**
 * Assign deliveries to vehicles and sequence each vehicle's stops.
 * Neither input array is modified.
 */
export function assignRoutes(
  deliveries: readonly DeliveryStop[],
  vehicles: readonly Vehicle[]
): AssignmentResult {
  const assignments = new Map<string, RouteAssignment>();
  const taken = new Array<boolean>(deliveries.length).fill(false);
  let remaining = deliveries.length;

  for (const vehicle of orderVehiclesByFuel(vehicles)) {
    if (remaining === 0) break;

    const candidateIndexes = selectCandidates(deliveries, taken, vehicle);
    if (candidateIndexes.length === 0) continue;

    const candidates = candidateIndexes.map(i => deliveries[i]);
    const built = buildRoute(candidates, {
      latitude: vehicle.currentLat,
      longitude: vehicle.currentLon,
    });

    assignments.set(vehicle.id, {
      vehicleId: vehicle.id,
      route: built.route,
      totalDistanceKm: built.totalDistanceKm,
      estimatedTimeMinutes: built.estimatedTimeMinutes,
      stopsCount: built.route.length,
      optimizationMethod: OPTIMIZER_CONFIG.METHOD,
    });

    for (const i of candidateIndexes) {
      taken[i] = true;
    }
    remaining -= candidateIndexes.length;
  }

  return {
    assignments,
    unassigned: deliveries.filter((_, i) => !taken[i]),
  };
}
