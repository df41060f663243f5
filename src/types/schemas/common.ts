/**
 * Common Zod schema primitives shared by config and rollout schemas
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = z.number().finite('Must be finite').min(0, 'Must be non-negative');

/**
 * Log level enum (pino levels)
 */
export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
  errorMap: () => ({ message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent' }),
});
