/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared zod building blocks and the helpers that turn a ZodError into a
 * ValidationError. Every request body and query goes through validateSchema
 * before it reaches a service.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * A finite number, or a string that parses to one ("12.5", " 7 ").
 * Anything else - null, booleans, "", "abc", objects - is rejected.
 */
export const numericSchema = z
  .union([
    z.number(),
    z.string().trim().min(1, 'Expected a number'),
  ], { errorMap: () => ({ message: 'Expected a number or numeric string' }) })
  .pipe(z.coerce.number().finite());

/**
 * Numeric value that must also be an integer
 */
export const integerSchema = numericSchema.pipe(z.number().int());

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  message?: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, message);
  }
  return result.data;
}
