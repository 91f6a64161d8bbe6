/**
 * =============================================================================
 * OPTIMIZER MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Request schemas (snake_case, as clients and the gateway send them), the
 * camelCase domain types the engine works on, and the wire shapes returned.
 *
 * KEY CONCEPTS:
 * - DeliveryStop: a stop to visit, priority 1 (highest) to 5 (lowest)
 * - Vehicle: a read-only fleet snapshot (position + fuel)
 * - RouteAssignment: one vehicle's ordered stops with distance and time
 * - OptimizationRun: summary of one optimize call, kept in the ledger
 * =============================================================================
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { integerSchema, numericSchema } from '../../shared/utils/validation.utils';
import { RecommendationPriority, RecommendationType } from '../../core';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const OPTIMIZER_CONFIG = {
  /** Maximum stops handed to one vehicle per run */
  MAX_STOPS_PER_VEHICLE: 5,

  /** A stop is a candidate only if it is strictly closer than this to the vehicle */
  MAX_PICKUP_RADIUS_KM: 50,

  /** Average urban speed used for travel time */
  AVERAGE_SPEED_KMH: 40,

  /** Selection discount per priority step below 1 (priority 5 -> 40% off) */
  PRIORITY_DISCOUNT_STEP: 0.1,

  /** Average consumption of a delivery vehicle: 8 L / 100 km */
  FUEL_LITRES_PER_KM: 0.08,

  /** Deficit (litres) above which a refuel is required */
  REFUEL_DEFICIT_THRESHOLD_L: 5,

  /** Fuel percentage below which a fuel_alert is raised */
  FUEL_ALERT_PERCENT: 20,

  /** Fuel percentage below which a fuel_warning is raised */
  FUEL_WARNING_PERCENT: 40,

  /** Number of most recent runs averaged for the efficiency check */
  EFFICIENCY_WINDOW: 5,

  /** Mean efficiency score below which an efficiency_improvement is raised */
  EFFICIENCY_THRESHOLD: 0.7,

  METHOD: 'nearest_neighbor_with_priority',
} as const;

export const HISTORY_DEFAULT_LIMIT = 10;

// =============================================================================
// DOMAIN TYPES
// =============================================================================

export interface DeliveryStop {
  readonly id: string;
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  /** 1 = highest, 5 = lowest */
  readonly priority: number;
  /** Informational only, never enforced */
  readonly timeWindowStart: string;
  readonly timeWindowEnd: string;
  readonly estimatedDurationMinutes: number;
}

export interface Vehicle {
  readonly id: string;
  readonly driverName: string;
  /** Accepted but never checked against stops */
  readonly capacity: number;
  readonly currentLat: number;
  readonly currentLon: number;
  readonly fuelLevel: number;
  readonly maxFuel: number;
}

export interface Position {
  latitude: number;
  longitude: number;
}

export interface BuiltRoute {
  route: DeliveryStop[];
  totalDistanceKm: number;
  estimatedTimeMinutes: number;
}

export interface RouteAssignment extends BuiltRoute {
  vehicleId: string;
  stopsCount: number;
  optimizationMethod: typeof OPTIMIZER_CONFIG.METHOD;
}

export interface AssignmentResult {
  /** Keyed by vehicle id, in the order vehicles were processed */
  assignments: Map<string, RouteAssignment>;
  /** Leftover stops, in submission order */
  unassigned: DeliveryStop[];
}

export interface OptimizationRun {
  readonly id: string;
  readonly timestamp: string;
  readonly totalDeliveries: number;
  readonly totalVehicles: number;
  readonly assignmentsMade: number;
  readonly efficiencyScore: number;
}

export interface FuelFeasibility {
  vehicleId: string;
  routeDistanceKm: number;
  estimatedFuelConsumption: number;
  currentFuelLevel: number;
  maxFuel: number;
  fuelDeficit: number;
  fuelPercentage: number;
  needsRefuel: boolean;
}

export interface Recommendation {
  type: RecommendationType;
  vehicleId?: string;
  driverName?: string;
  fuelPercentage?: number;
  priority: RecommendationPriority;
  message: string;
  recommendation: string;
}

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

/**
 * One delivery as sent by clients.
 * latitude / longitude are required, everything else has a default.
 */
export const deliveryInputSchema = z.object({
  id: idSchema.optional(),
  name: z.string().default('Delivery Point'),
  latitude: numericSchema,
  longitude: numericSchema,
  priority: integerSchema.pipe(z.number().min(1).max(5)).default(3),
  time_window_start: z.string().default('09:00'),
  time_window_end: z.string().default('17:00'),
  estimated_duration: integerSchema.pipe(z.number().min(0)).default(15),
}).transform((input): DeliveryStop => ({
  id: input.id ?? uuidv4(),
  name: input.name,
  latitude: input.latitude,
  longitude: input.longitude,
  priority: input.priority,
  timeWindowStart: input.time_window_start,
  timeWindowEnd: input.time_window_end,
  estimatedDurationMinutes: input.estimated_duration,
}));

/**
 * Vehicle fields shared by /optimize and /fuel-efficiency
 */
const vehicleFields = {
  driver_name: z.string().default('Unknown'),
  capacity: numericSchema.pipe(z.number().min(0)).default(1000),
  current_lat: numericSchema.default(0),
  current_lon: numericSchema.default(0),
  fuel_level: numericSchema.pipe(z.number().min(0)).default(50),
  max_fuel: numericSchema.pipe(z.number().positive()).default(60),
};

export const vehicleInputSchema = z.object({
  id: idSchema.optional(),
  ...vehicleFields,
}).transform((input): Vehicle => ({
  id: input.id ?? uuidv4(),
  driverName: input.driver_name,
  capacity: input.capacity,
  currentLat: input.current_lat,
  currentLon: input.current_lon,
  fuelLevel: input.fuel_level,
  maxFuel: input.max_fuel,
}));

/**
 * POST /optimize
 */
export const optimizeRequestSchema = z.object({
  deliveries: z.array(deliveryInputSchema).default([]),
  vehicles: z.array(vehicleInputSchema).default([]),
}).superRefine((request, ctx) => {
  const seen = new Set<string>();
  request.vehicles.forEach((vehicle, index) => {
    if (seen.has(vehicle.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['vehicles', index, 'id'],
        message: `Duplicate vehicle id: ${vehicle.id}`,
      });
    }
    seen.add(vehicle.id);
  });
});

/**
 * POST /fuel-efficiency
 */
export const fuelEfficiencyRequestSchema = z.object({
  vehicle_id: idSchema.default('unknown'),
  ...vehicleFields,
  route_distance: numericSchema.pipe(z.number().min(0)).default(0),
}).transform((input) => ({
  vehicle: {
    id: input.vehicle_id,
    driverName: input.driver_name,
    capacity: input.capacity,
    currentLat: input.current_lat,
    currentLon: input.current_lon,
    fuelLevel: input.fuel_level,
    maxFuel: input.max_fuel,
  } satisfies Vehicle,
  routeDistanceKm: input.route_distance,
}));

/**
 * GET /history?limit=
 */
export const historyQuerySchema = z.object({
  limit: integerSchema.pipe(z.number().min(0)).default(HISTORY_DEFAULT_LIMIT),
});

export type OptimizeRequest = z.output<typeof optimizeRequestSchema>;
export type FuelEfficiencyRequest = z.output<typeof fuelEfficiencyRequestSchema>;
export type HistoryQuery = z.output<typeof historyQuerySchema>;

// =============================================================================
// RESPONSE SHAPES (wire format)
// =============================================================================

export interface DeliveryStopResponse {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  priority: number;
  time_window_start: string;
  time_window_end: string;
  estimated_duration: number;
}

export interface RouteAssignmentResponse {
  vehicle_id: string;
  route: DeliveryStopResponse[];
  total_distance: number;
  estimated_time: number;
  stops_count: number;
  optimization_method: string;
}

export interface RecommendationResponse {
  type: RecommendationType;
  vehicle_id?: string;
  driver_name?: string;
  fuel_percentage?: number;
  priority: RecommendationPriority;
  message: string;
  recommendation: string;
}

export interface OptimizeResponse {
  optimization_id: string;
  result: {
    assignments: Record<string, RouteAssignmentResponse>;
    unassigned_deliveries: DeliveryStopResponse[];
    total_vehicles_used: number;
    total_deliveries_assigned: number;
    optimization_timestamp: string;
  };
  recommendations: RecommendationResponse[];
}

export interface FuelEfficiencyResponse {
  vehicle_id: string;
  route_distance: number;
  estimated_fuel_consumption: number;
  current_fuel_level: number;
  max_fuel: number;
  fuel_deficit: number;
  fuel_percentage: number;
  needs_refuel: boolean;
}

export interface OptimizationRunResponse {
  id: string;
  timestamp: string;
  total_deliveries: number;
  total_vehicles: number;
  assignments_made: number;
  efficiency_score: number;
}

export interface RecommendationsResponse {
  recommendations: RecommendationResponse[];
  total_count: number;
  timestamp: string;
}

export interface HistoryResponse {
  history: OptimizationRunResponse[];
  total_count: number;
  showing: number;
}
