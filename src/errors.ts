/**
 * Error classes shared across modules.
 *
 * Exchange failures are not thrown: they travel as `ExchangeError` values
 * inside `ExchangeResponse` (see exchange/types.ts).
 */

import type { ExchangeError } from './exchange/types.js';
import type { OrderStatus } from './orders/types.js';

/**
 * Validation failure category
 */
export type ValidationErrorKind =
  | 'BAD_SYMBOL'
  | 'BAD_SIDE'
  | 'BAD_QUANTITY'
  | 'BAD_PRICE'
  | 'MISSING_PRICE'
  | 'MISSING_STOP'
  | 'BAD_STOP_ORDER'
  | 'BAD_SCHEDULE'
  | 'DEGENERATE_SLICE';

/**
 * Caller-fixable problem with an order intent. Never retried.
 */
export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly field: string;

  constructor(kind: ValidationErrorKind, field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
    this.field = field;
  }
}

/**
 * Startup-fatal configuration problem (missing credentials, bad env values)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Bug in the core: broken slicing arithmetic or an illegal state transition.
 * Always fatal to the order it happened on.
 */
export class InternalError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InternalError';
    this.context = context;
  }
}

/**
 * Cancel requested for an order that is already filled or terminal
 */
export class OrderNotCancellableError extends Error {
  readonly orderId: string;
  readonly status: OrderStatus;

  constructor(orderId: string, status: OrderStatus) {
    super(`Order ${orderId} cannot be cancelled in status ${status}`);
    this.name = 'OrderNotCancellableError';
    this.orderId = orderId;
    this.status = status;
  }
}

/**
 * Exchange call made outside an order's attempt loop (symbol rules lookup) failed
 */
export class ExchangeRequestError extends Error {
  readonly error: ExchangeError;

  constructor(operation: string, error: ExchangeError) {
    super(`${operation} failed: ${error.message}`);
    this.name = 'ExchangeRequestError';
    this.error = error;
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
