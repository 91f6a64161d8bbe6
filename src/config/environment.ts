/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() / getNumber() / getBoolean() for values with defaults
 * - Invalid values fail at startup, not on the first request
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value && value.trim() !== '' ? value.trim() : defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 5003),
  host: getOptional('HOST', '0.0.0.0'),
  serviceName: 'fleet-optimizer',
  version: '1.0.0',

  // Logging (tests stay quiet unless LOG_LEVEL is set explicitly)
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 60 * 1000), // 1 minute
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 120),
  },

  // Request body
  jsonBodyLimit: getOptional('JSON_BODY_LIMIT', '1mb'),

  // Optimization history retention (ring buffer size)
  ledger: {
    capacity: getNumber('LEDGER_CAPACITY', 1000),
  },

  // Helpers
  isProduction: nodeEnv === 'production',

  // Feature toggles
  security: {
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly', 'silent'];

/**
 * Validate configuration at startup
 * Fails fast if critical config is invalid
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!['development', 'staging', 'production', 'test'].includes(config.nodeEnv)) {
    errors.push(`NODE_ENV must be one of development, staging, production, test (got "${config.nodeEnv}")`);
  }

  if (config.port <= 0 || config.port >= 65536) {
    errors.push(`PORT must be between 1 and 65535 (got ${config.port})`);
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  if (config.ledger.capacity < 1) {
    errors.push('LEDGER_CAPACITY must be at least 1');
  }

  if (config.rateLimit.maxRequests < 1 || config.rateLimit.windowMs < 1) {
    errors.push('RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS must be positive');
  }

  // Production-specific checks
  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }
    if (!config.security.enableRateLimiting) {
      warnings.push('ENABLE_RATE_LIMITING is false in production');
    }
  }

  // Logger depends on this module, so configuration problems go to the console
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
