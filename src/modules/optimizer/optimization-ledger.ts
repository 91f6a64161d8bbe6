/**
 * =============================================================================
 * OPTIMIZATION LEDGER - Bounded history of optimize runs
 * =============================================================================
 *
 * Write-once / read-many log of OptimizationRun summaries.
 *
 * RETENTION:
 * - Ring buffer of the `capacity` most recent runs (LEDGER_CAPACITY)
 * - The oldest run is evicted once the buffer is full
 * - count() keeps counting evicted runs; size() is what is still held
 *
 * CONCURRENCY:
 * - record() is a synchronous append, so two requests can never interleave
 *   inside it on Node's single event-loop thread
 * - Reads hand out copies; callers never see the internal array
 *
 * Swap InMemoryOptimizationLedger for a persisted store by implementing
 * OptimizationLedger and injecting it into FleetOptimizerService.
 * =============================================================================
 */

import { OptimizationRun } from './optimizer.schema';

export interface OptimizationLedger {
  /** Maximum number of runs retained */
  readonly capacity: number;

  /** Append a completed run */
  record(run: OptimizationRun): void;

  /** The last `n` retained runs, oldest first */
  recent(n: number): OptimizationRun[];

  /** Total runs recorded since start, evicted ones included */
  count(): number;

  /** Runs currently retained */
  size(): number;
}

export class InMemoryOptimizationLedger implements OptimizationLedger {
  readonly capacity: number;
  private readonly buffer: OptimizationRun[] = [];
  private head = 0; // index of the oldest run once the buffer is full
  private recorded = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ledger capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  record(run: OptimizationRun): void {
    const entry = Object.freeze({ ...run });

    if (this.buffer.length < this.capacity) {
      this.buffer.push(entry);
    } else {
      this.buffer[this.head] = entry;
      this.head = (this.head + 1) % this.capacity;
    }
    this.recorded++;
  }

  recent(n: number): OptimizationRun[] {
    const take = Math.min(Math.max(0, Math.floor(n)), this.buffer.length);
    if (take === 0) return [];

    const ordered = this.head === 0
      ? this.buffer
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];

    return ordered.slice(ordered.length - take);
  }

  count(): number {
    return this.recorded;
  }

  size(): number {
    return this.buffer.length;
  }
}
