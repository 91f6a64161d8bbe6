/**
 * Fleet state as of the latest successful optimize call.
 *
 * GET /recommendations evaluates fuel against this snapshot, and /health
 * reports how many vehicles it holds and how many of them received a route.
 */

import { Vehicle } from './optimizer.schema';

export interface FleetSnapshot {
  vehicles: Vehicle[];
  activeRoutes: number;
}

export class FleetStateStore {
  private vehicles: readonly Vehicle[] = [];
  private activeRoutes = 0;

  /** Replace the snapshot; the caller's array is copied */
  update(vehicles: readonly Vehicle[], activeRoutes: number): void {
    this.vehicles = vehicles.map(vehicle => Object.freeze({ ...vehicle }));
    this.activeRoutes = activeRoutes;
  }

  snapshot(): FleetSnapshot {
    return {
      vehicles: [...this.vehicles],
      activeRoutes: this.activeRoutes,
    };
  }
}
