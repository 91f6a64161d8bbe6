/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * Application-wide constants. Optimizer tuning values live beside the
 * optimizer schemas (OPTIMIZER_CONFIG), everything shared lives here.
 * =============================================================================
 */

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes returned in `error.code` of every failed response
 */
export enum ErrorCode {
  // Request errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // Optimizer errors
  OPTIMIZATION_FAILED = 'OPTIMIZATION_FAILED',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// =============================================================================
// RECOMMENDATIONS
// =============================================================================

export enum RecommendationType {
  FUEL_ALERT = 'fuel_alert',
  FUEL_WARNING = 'fuel_warning',
  EFFICIENCY_IMPROVEMENT = 'efficiency_improvement',
}

export enum RecommendationPriority {
  HIGH = 'high',
  MEDIUM = 'medium',
}
