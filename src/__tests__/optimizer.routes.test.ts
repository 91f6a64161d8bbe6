/**
 * =============================================================================
 * OPTIMIZER HTTP API - Integration Tests
 * =============================================================================
 *
 * Runs the real Express app on an ephemeral port and talks to it with fetch.
 * Every test gets its own service, so ledger state never leaks between tests.
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

import { Server } from 'http';
import { API_PREFIX, AppOptions, createApp } from '../app';
import { FleetOptimizerService, RouteAssigner } from '../modules/optimizer/optimizer.service';
import { InMemoryOptimizationLedger } from '../modules/optimizer/optimization-ledger';
import { FleetStateStore } from '../modules/optimizer/fleet-state.store';
import { haversineDistanceKm } from '../shared/utils/geospatial.utils';

// =============================================================================
// TEST SERVER
// =============================================================================

interface TestResponse {
  status: number;
  body: unknown;
  requestId: string | null;
}

let server: Server | undefined;
let baseUrl = '';
let service: FleetOptimizerService;

async function startServer(options: AppOptions = {}, assigner?: RouteAssigner): Promise<void> {
  service = new FleetOptimizerService({
    ledger: new InMemoryOptimizationLedger(100),
    fleetState: new FleetStateStore(),
    assigner,
  });
  const app = createApp(service, { rateLimit: false, requestLogging: false, ...options });

  const listening = app.listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));

  const address = listening.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
}

async function request(
  method: 'GET' | 'POST',
  path: string,
  body?: unknown,
  headers: Record<string, string> = {}
): Promise<TestResponse> {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  });

  return {
    status: response.status,
    body: await response.json(),
    requestId: response.headers.get('x-request-id'),
  };
}

afterEach(async () => {
  const running = server;
  server = undefined;
  if (!running) return;

  running.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    running.close((err) => (err ? reject(err) : resolve()));
  });
});

const FLEET_REQUEST = {
  deliveries: [
    { id: 'd1', name: 'Warehouse A', latitude: 0, longitude: 0.1 },
    { id: 'd2', latitude: 0, longitude: 0.2, priority: 1, estimated_duration: '20' },
    { id: 'far', latitude: 10, longitude: 10 },
  ],
  vehicles: [
    { id: 'v1', driver_name: 'Driver A', current_lat: 0, current_lon: 0, fuel_level: 10, max_fuel: 60 },
  ],
};

// =============================================================================
// POST /optimize
// =============================================================================

describe('POST /optimize', () => {
  beforeEach(() => startServer());

  it('returns assignments, leftovers and recommendations', async () => {
    const res = await request('POST', '/optimize', FLEET_REQUEST);
    const totalDistance = haversineDistanceKm(0, 0, 0, 0.1) + haversineDistanceKm(0, 0.1, 0, 0.2);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      optimization_id: expect.any(String),
      result: {
        assignments: {
          v1: {
            vehicle_id: 'v1',
            route: [
              { id: 'd1', name: 'Warehouse A', priority: 3, estimated_duration: 15 },
              { id: 'd2', name: 'Delivery Point', priority: 1, estimated_duration: 20 },
            ],
            total_distance: expect.closeTo(totalDistance, 9),
            estimated_time: expect.closeTo((totalDistance / 40) * 60 + 35, 9),
            stops_count: 2,
            optimization_method: 'nearest_neighbor_with_priority',
          },
        },
        unassigned_deliveries: [{
          id: 'far',
          name: 'Delivery Point',
          latitude: 10,
          longitude: 10,
          priority: 3,
          time_window_start: '09:00',
          time_window_end: '17:00',
          estimated_duration: 15,
        }],
        total_vehicles_used: 1,
        total_deliveries_assigned: 2,
        optimization_timestamp: expect.any(String),
      },
      recommendations: [{
        type: 'fuel_alert',
        vehicle_id: 'v1',
        driver_name: 'Driver A',
        fuel_percentage: (10 / 60) * 100,
        priority: 'high',
        message: 'Vehicle v1 (Driver A) needs refueling urgently: fuel at 16.7%',
        recommendation: 'Route vehicle to nearest fuel station',
      }],
    });
  });

  it('records the run in history', async () => {
    await request('POST', '/optimize', FLEET_REQUEST);

    const res = await request('GET', '/history');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      history: [{
        total_deliveries: 3,
        total_vehicles: 1,
        assignments_made: 2,
        efficiency_score: 2 / 3,
      }],
      total_count: 1,
      showing: 1,
    });
  });

  it('accepts an empty body', async () => {
    const res = await request('POST', '/optimize', {});

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      result: {
        assignments: {},
        unassigned_deliveries: [],
        total_vehicles_used: 0,
        total_deliveries_assigned: 0,
      },
      recommendations: [],
    });
  });

  it('rejects invalid input with 400 and records nothing', async () => {
    const res = await request('POST', '/optimize', {
      deliveries: [{ id: 'd1', longitude: 1 }],
      vehicles: [{ id: 'v1' }],
    });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: { errors: [{ field: 'deliveries.0.latitude', message: expect.any(String) }] },
      },
    });
    expect(service.stats().optimizationsRecorded).toBe(0);
  });

  it('returns a "__proto__" vehicle id as an ordinary assignment key', async () => {
    const res = await request('POST', '/optimize', {
      deliveries: [{ id: 'd1', latitude: 0, longitude: 0.1 }],
      vehicles: [{ id: '__proto__' }],
    });

    expect(res.status).toBe(200);
    expect(res.body).toHaveProperty(['result', 'assignments', '__proto__', 'vehicle_id'], '__proto__');
    expect(res.body).toMatchObject({
      result: { unassigned_deliveries: [], total_deliveries_assigned: 1, total_vehicles_used: 1 },
    });
  });

  it('rejects duplicate vehicle ids', async () => {
    const res = await request('POST', '/optimize', { vehicles: [{ id: 'v1' }, { id: 'v1' }] });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { details: { errors: [{ field: 'vehicles.1.id', message: 'Duplicate vehicle id: v1' }] } },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await request('POST', '/optimize', '{"deliveries": [');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
  });
});

describe('POST /optimize when assignment fails', () => {
  beforeEach(() => startServer({}, () => {
    throw new Error('sequencer crashed');
  }));

  it('returns 500 without internal details', async () => {
    const res = await request('POST', '/optimize', FLEET_REQUEST);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      success: false,
      error: {
        code: 'OPTIMIZATION_FAILED',
        message: 'Route optimization failed',
        timestamp: expect.any(String),
      },
    });
    expect(service.stats().optimizationsRecorded).toBe(0);
  });
});

// =============================================================================
// POST /fuel-efficiency
// =============================================================================

describe('POST /fuel-efficiency', () => {
  beforeEach(() => startServer());

  it('fills vehicle defaults', async () => {
    const res = await request('POST', '/fuel-efficiency', { route_distance: 100 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      vehicle_id: 'unknown',
      route_distance: 100,
      estimated_fuel_consumption: 8,
      current_fuel_level: 50,
      max_fuel: 60,
      fuel_deficit: 0,
      fuel_percentage: expect.closeTo(83.3333, 4),
      needs_refuel: false,
    });
  });

  it('flags a refuel for a long route on a low tank', async () => {
    const res = await request('POST', '/fuel-efficiency', {
      vehicle_id: 'truck-9',
      fuel_level: '10',
      route_distance: '200',
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      vehicle_id: 'truck-9',
      fuel_deficit: expect.closeTo(6, 9),
      needs_refuel: true,
    });
  });

  it('rejects a non-numeric distance', async () => {
    const res = await request('POST', '/fuel-efficiency', { route_distance: 'far' });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { code: 'VALIDATION_ERROR', details: { errors: [{ field: 'route_distance' }] } },
    });
  });
});

// =============================================================================
// GET /recommendations, GET /history
// =============================================================================

describe('GET /recommendations', () => {
  beforeEach(() => startServer());

  it('is empty before the first optimize call', async () => {
    const res = await request('GET', '/recommendations');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ recommendations: [], total_count: 0, timestamp: expect.any(String) });
  });

  it('evaluates the fleet from the latest optimize call', async () => {
    await request('POST', '/optimize', FLEET_REQUEST);

    const res = await request('GET', '/recommendations');

    expect(res.body).toMatchObject({
      recommendations: [{ type: 'fuel_alert', vehicle_id: 'v1' }],
      total_count: 1,
    });
  });
});

describe('GET /history', () => {
  beforeEach(() => startServer());

  it('honours the limit and reports the total', async () => {
    for (let i = 0; i < 3; i++) {
      await request('POST', '/optimize', {});
    }

    const res = await request('GET', '/history?limit=2');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ total_count: 3, showing: 2 });
  });

  it('returns nothing for limit=0', async () => {
    await request('POST', '/optimize', {});

    const res = await request('GET', '/history?limit=0');

    expect(res.body).toEqual({ history: [], total_count: 1, showing: 0 });
  });

  it.each(['abc', '-1', '1.5'])('rejects limit=%s', async (limit) => {
    const res = await request('GET', `/history?limit=${limit}`);

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid query parameters',
        details: { errors: [{ field: 'limit' }] },
      },
    });
  });

  it('is also served under the API prefix', async () => {
    const res = await request('GET', `${API_PREFIX}/history`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ history: [], total_count: 0, showing: 0 });
  });
});

// =============================================================================
// HEALTH, 404, REQUEST ID
// =============================================================================

describe('service endpoints', () => {
  beforeEach(() => startServer());

  it('reports fleet counters on /health', async () => {
    await request('POST', '/optimize', FLEET_REQUEST);

    const res = await request('GET', '/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'healthy',
      service: 'fleet-optimizer',
      vehicles_registered: 1,
      active_routes: 1,
      optimizations_recorded: 1,
    });
  });

  it('answers the liveness probe', async () => {
    const res = await request('GET', '/health/live');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'alive', pid: process.pid });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request('GET', '/vehicles');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Cannot GET /vehicles' },
    });
  });

  it('echoes the caller request id', async () => {
    const res = await request('GET', '/health', undefined, { 'X-Request-ID': 'req-123' });

    expect(res.requestId).toBe('req-123');
  });

  it('generates a request id when none is sent', async () => {
    const res = await request('GET', '/health');

    expect(res.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

// =============================================================================
// RATE LIMITING
// =============================================================================

describe('rate limiting', () => {
  beforeEach(() => startServer({ rateLimit: { windowMs: 60_000, maxRequests: 2 } }));

  it('rejects requests over the limit with 429', async () => {
    expect((await request('GET', '/history')).status).toBe(200);
    expect((await request('GET', '/history')).status).toBe(200);

    const res = await request('GET', '/history');

    expect(res.status).toBe(429);
    expect(res.body).toMatchObject({
      success: false,
      error: { code: 'RATE_LIMIT_EXCEEDED', details: { retryAfter: 60 } },
    });
  });

  it('never throttles health checks', async () => {
    for (let i = 0; i < 4; i++) {
      expect((await request('GET', '/health')).status).toBe(200);
    }
  });
});
