/**
 * Fuel feasibility of a route for one vehicle at a flat 0.08 L/km.
 * A refuel is required once the deficit exceeds 5 L.
 */

import { FuelFeasibility, OPTIMIZER_CONFIG, Vehicle } from './optimizer.schema';

export function evaluateFuelFeasibility(vehicle: Vehicle, routeDistanceKm: number): FuelFeasibility {
  const estimatedFuelConsumption = routeDistanceKm * OPTIMIZER_CONFIG.FUEL_LITRES_PER_KM;
  const fuelDeficit = Math.max(0, estimatedFuelConsumption - vehicle.fuelLevel);

  return {
    vehicleId: vehicle.id,
    routeDistanceKm,
    estimatedFuelConsumption,
    currentFuelLevel: vehicle.fuelLevel,
    maxFuel: vehicle.maxFuel,
    fuelDeficit,
    fuelPercentage: (vehicle.fuelLevel / vehicle.maxFuel) * 100,
    needsRefuel: fuelDeficit > OPTIMIZER_CONFIG.REFUEL_DEFICIT_THRESHOLD_L,
  };
}
