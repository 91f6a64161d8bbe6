/**
 * =============================================================================
 * FLEET OPTIMIZER - MAIN SERVER
 * =============================================================================
 *
 * ENDPOINTS:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ POST /optimize         │ Assign + sequence deliveries across the fleet  │
 * │ POST /fuel-efficiency  │ Fuel consumption / deficit for one route       │
 * │ GET  /recommendations  │ Fuel alerts and efficiency recommendations     │
 * │ GET  /history          │ Recent optimization runs                       │
 * │ GET  /health           │ Service status                                 │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * The optimizer keeps no durable state: run history is a bounded in-memory
 * ring buffer (LEDGER_CAPACITY) owned by the service built below.
 * =============================================================================
 */

import { createServer } from 'http';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { createApp } from './app';
import {
  FleetOptimizerService,
  FleetStateStore,
  InMemoryOptimizationLedger,
} from './modules/optimizer';

// =============================================================================
// SERVICE & APP
// =============================================================================

const service = new FleetOptimizerService({
  ledger: new InMemoryOptimizationLedger(config.ledger.capacity),
  fleetState: new FleetStateStore(),
});

const app = createApp(service);
const server = createServer(app);

// =============================================================================
// START SERVER
// =============================================================================

server.listen(config.port, config.host, () => {
  logger.info(`🚚 Fleet optimizer listening on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    ledgerCapacity: config.ledger.capacity,
    rateLimiting: config.security.enableRateLimiting,
  });
});

server.on('error', (error) => {
  logger.error('Server failed to start', { error: error.message, stack: error.stack });
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const SHUTDOWN_TIMEOUT_MS = 10000;

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully...`);

  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit(0);
  });

  // Force exit if connections don't drain in time
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    error: reason instanceof Error ? reason.message : String(reason),
  });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

export { app, server };
