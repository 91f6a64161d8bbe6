/**
 * =============================================================================
 * OPTIMIZER MODULE
 * =============================================================================
 *
 * Fleet route assignment & optimization:
 * - Greedy assignment of deliveries to vehicles (fullest tank first)
 * - Priority-weighted nearest-neighbour sequencing per vehicle
 * - Fuel feasibility of a route
 * - Fuel / efficiency recommendations from fleet state and run history
 *
 * All calculations are synchronous and CPU-bound (<= 5 stops per vehicle).
 * =============================================================================
 */

export * from './optimizer.schema';
export * from './route-builder';
export * from './assignment.engine';
export * from './fuel-feasibility';
export * from './recommendation.engine';
export * from './optimization-ledger';
export * from './fleet-state.store';
export * from './optimizer.service';
export * from './optimizer.routes';
