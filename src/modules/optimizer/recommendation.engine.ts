/**
 * =============================================================================
 * RECOMMENDATION ENGINE
 * =============================================================================
 *
 * Vehicle rules (per vehicle, in the order given):
 *   fuel < 20%        -> fuel_alert   (high)
 *   20% <= fuel < 40% -> fuel_warning (medium)
 *   fuel >= 40%       -> nothing
 *
 * Fleet rule (appended last, at most once):
 *   mean efficiency of the 5 most recent runs < 0.7 -> efficiency_improvement
 * =============================================================================
 */

import { RecommendationPriority, RecommendationType } from '../../core';
import { OPTIMIZER_CONFIG, OptimizationRun, Recommendation, Vehicle } from './optimizer.schema';

function fuelPercentage(vehicle: Vehicle): number {
  return (vehicle.fuelLevel / vehicle.maxFuel) * 100;
}

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Fuel recommendation for one vehicle, or null when the tank is fine
 */
export function fuelRecommendation(vehicle: Vehicle): Recommendation | null {
  const percentage = fuelPercentage(vehicle);

  if (percentage < OPTIMIZER_CONFIG.FUEL_ALERT_PERCENT) {
    return {
      type: RecommendationType.FUEL_ALERT,
      vehicleId: vehicle.id,
      driverName: vehicle.driverName,
      fuelPercentage: percentage,
      priority: RecommendationPriority.HIGH,
      message: `Vehicle ${vehicle.id} (${vehicle.driverName}) needs refueling urgently: fuel at ${formatPercent(percentage)}`,
      recommendation: 'Route vehicle to nearest fuel station',
    };
  }

  if (percentage < OPTIMIZER_CONFIG.FUEL_WARNING_PERCENT) {
    return {
      type: RecommendationType.FUEL_WARNING,
      vehicleId: vehicle.id,
      driverName: vehicle.driverName,
      fuelPercentage: percentage,
      priority: RecommendationPriority.MEDIUM,
      message: `Vehicle ${vehicle.id} (${vehicle.driverName}) fuel level is low: ${formatPercent(percentage)}`,
      recommendation: 'Plan refuel within next 4 hours',
    };
  }

  return null;
}

/**
 * Mean efficiency score of the most recent window of runs, or null while
 * fewer runs than the window have been recorded
 */
export function recentEfficiency(recentRuns: readonly OptimizationRun[]): number | null {
  const windowSize = OPTIMIZER_CONFIG.EFFICIENCY_WINDOW;
  if (recentRuns.length < windowSize) return null;

  const lastRuns = recentRuns.slice(-windowSize);
  const total = lastRuns.reduce((sum, run) => sum + run.efficiencyScore, 0);
  return total / lastRuns.length;
}

/**
 * Build the recommendation list: vehicle rules first, then the fleet rule
 *
 * @param vehicles - current fleet state, in the order recommendations should appear
 * @param recentRuns - ledger tail, oldest first
 */
export function buildRecommendations(
  vehicles: readonly Vehicle[],
  recentRuns: readonly OptimizationRun[]
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  for (const vehicle of vehicles) {
    const recommendation = fuelRecommendation(vehicle);
    if (recommendation) recommendations.push(recommendation);
  }

  const efficiency = recentEfficiency(recentRuns);
  if (efficiency !== null && efficiency < OPTIMIZER_CONFIG.EFFICIENCY_THRESHOLD) {
    recommendations.push({
      type: RecommendationType.EFFICIENCY_IMPROVEMENT,
      priority: RecommendationPriority.MEDIUM,
      message: `Fleet efficiency is below optimal (${formatPercent(efficiency * 100)})`,
      recommendation: 'Consider reassigning delivery zones or adjusting time windows',
    });
  }

  return recommendations;
}
