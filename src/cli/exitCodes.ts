/**
 * Process exit codes
 */

import { ConfigurationError, ValidationError } from '../errors.js';
import type { OrderStatus } from '../orders/types.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ORDER_FAILED: 1,
  VALIDATION_ERROR: 2,
  CONFIGURATION_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * A resting SUBMITTED order counts as success: the exchange accepted it
 */
export function exitCodeForStatus(status: OrderStatus): ExitCode {
  switch (status) {
    case 'FILLED':
    case 'PARTIALLY_FILLED':
    case 'SUBMITTED':
      return EXIT_CODES.SUCCESS;
    default:
      return EXIT_CODES.ORDER_FAILED;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ValidationError) {
    return EXIT_CODES.VALIDATION_ERROR;
  }
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.CONFIGURATION_ERROR;
  }
  return EXIT_CODES.ORDER_FAILED;
}
