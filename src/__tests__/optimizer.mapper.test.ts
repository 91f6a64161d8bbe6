/**
 * =============================================================================
 * OPTIMIZER MAPPER - Wire format tests
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { toOptimizeResponse } from '../modules/optimizer/optimizer.mapper';
import { FleetOptimizerService } from '../modules/optimizer/optimizer.service';
import { InMemoryOptimizationLedger } from '../modules/optimizer/optimization-ledger';
import { FleetStateStore } from '../modules/optimizer/fleet-state.store';
import { OptimizeResponse, optimizeRequestSchema } from '../modules/optimizer/optimizer.schema';

function optimize(body: unknown): OptimizeResponse {
  const { deliveries, vehicles } = optimizeRequestSchema.parse(body);
  const service = new FleetOptimizerService({
    ledger: new InMemoryOptimizationLedger(10),
    fleetState: new FleetStateStore(),
  });
  return toOptimizeResponse(service.optimize(deliveries, vehicles));
}

describe('toOptimizeResponse', () => {
  it('keys assignments by vehicle id in processing order', () => {
    const response = optimize({
      deliveries: [{ id: 'd1', latitude: 0, longitude: 0.1 }, { id: 'd2', latitude: 5, longitude: 5 }],
      vehicles: [
        { id: 'low', fuel_level: 10, current_lat: 5, current_lon: 5 },
        { id: 'high', fuel_level: 55 },
      ],
    });

    expect(Object.keys(response.result.assignments)).toEqual(['high', 'low']);
    expect(response.result.assignments.high.route.map(s => s.id)).toEqual(['d1']);
    expect(response.result.assignments.low.route.map(s => s.id)).toEqual(['d2']);
  });

  it('keeps a vehicle id of "__proto__" as a regular key through JSON', () => {
    const response = optimize({
      deliveries: [{ id: 'd1', latitude: 0, longitude: 0.1 }],
      vehicles: [{ id: '__proto__' }],
    });
    const wire: OptimizeResponse = JSON.parse(JSON.stringify(response));

    expect(Object.keys(response.result.assignments)).toEqual(['__proto__']);
    expect(Object.keys(wire.result.assignments)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(wire.result.assignments, '__proto__')?.value).toMatchObject({
      vehicle_id: '__proto__',
      stops_count: 1,
    });
    expect(wire.result.unassigned_deliveries).toEqual([]);
    expect(wire.result.total_deliveries_assigned).toBe(1);
  });
});
