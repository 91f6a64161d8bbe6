/**
 * =============================================================================
 * ROUTE BUILDER - Priority-weighted nearest neighbour
 * =============================================================================
 *
 * Orders one vehicle's stops greedily:
 *
 *   score(stop) = distance(current, stop) * (1 - (priority - 1) * 0.1)
 *
 * The stop with the lowest score is visited next (first seen wins a tie).
 * The score only decides the ORDER: the route total always adds the raw
 * geodesic leg, never the discounted one.
 *
 * EXAMPLE (from 0,0):
 *   A at (0,1) priority 1 -> raw 111.19 km, score 111.19
 *   B at (0,2) priority 5 -> raw 222.39 km, score 133.43
 *   A is visited first, then B; total = 111.19 + 111.19 km
 * =============================================================================
 */

import { haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import { BuiltRoute, DeliveryStop, OPTIMIZER_CONFIG, Position } from './optimizer.schema';

/**
 * Selection weight for a priority: 1 -> 1.0, 3 -> 0.8, 5 -> 0.6
 */
export function priorityFactor(priority: number): number {
  return 1 - (priority - 1) * OPTIMIZER_CONFIG.PRIORITY_DISCOUNT_STEP;
}

/**
 * Travel time at the average urban speed, in minutes
 */
export function travelMinutes(distanceKm: number): number {
  return (distanceKm / OPTIMIZER_CONFIG.AVERAGE_SPEED_KMH) * 60;
}

/**
 * Sequence stops starting from `start`.
 * The input array is left untouched.
 */
export function buildRoute(stops: readonly DeliveryStop[], start: Position): BuiltRoute {
  if (stops.length === 0) {
    return { route: [], totalDistanceKm: 0, estimatedTimeMinutes: 0 };
  }

  const visited = new Array<boolean>(stops.length).fill(false);
  const route: DeliveryStop[] = [];
  let current: Position = { latitude: start.latitude, longitude: start.longitude };
  let totalDistanceKm = 0;

  while (route.length < stops.length) {
    let bestIndex = -1;
    let bestScore = Infinity;
    let bestRawKm = 0;

    stops.forEach((stop, index) => {
      if (visited[index]) return;

      const rawKm = haversineDistanceKm(
        current.latitude, current.longitude,
        stop.latitude, stop.longitude
      );
      const score = rawKm * priorityFactor(stop.priority);

      if (bestIndex === -1 || score < bestScore) {
        bestIndex = index;
        bestScore = score;
        bestRawKm = rawKm;
      }
    });

    const next = stops[bestIndex];
    visited[bestIndex] = true;
    route.push(next);
    totalDistanceKm += bestRawKm;
    current = { latitude: next.latitude, longitude: next.longitude };
  }

  const serviceMinutes = route.reduce((sum, stop) => sum + stop.estimatedDurationMinutes, 0);

  return {
    route,
    totalDistanceKm,
    estimatedTimeMinutes: travelMinutes(totalDistanceKm) + serviceMinutes,
  };
}
