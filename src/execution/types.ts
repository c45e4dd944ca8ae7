/**
 * Types for Execution Engine
 */

import type { OrderNotCancellableError } from '../errors.js';
import type { ExchangeError } from '../exchange/types.js';
import type { OrderAttempt, OrderState, OrderStatus } from '../orders/types.js';

// ===========================================
// Configuration Types
// ===========================================

/**
 * Retry and backoff settings
 */
export interface RetryPolicyConfig {
  /** Total placement attempts per order, first one included */
  maxAttempts: number;

  /** Delay after the first failed attempt (ms) */
  backoffBaseMs: number;

  /** Multiplier applied per further failure */
  backoffFactor: number;

  /** Upper bound on any single delay (ms) */
  backoffMaxMs: number;
}

/**
 * Execution Engine configuration
 */
export type ExecutionEngineConfig = RetryPolicyConfig;

/**
 * Order status tracker configuration
 */
export interface OrderTrackerConfig {
  /** Polling interval for resting orders (ms) */
  pollIntervalMs: number;
}

// ===========================================
// Result Types
// ===========================================

/**
 * Outcome of a cancel request
 */
export type CancelResult =
  | { success: true; state: OrderState }
  | { success: false; state: OrderState; error: OrderNotCancellableError | ExchangeError };

// ===========================================
// Event Types
// ===========================================

/**
 * Execution Engine events
 */
export type ExecutionEvents = {
  orderUpdated: [state: OrderState, previous: OrderStatus];
  attemptRecorded: [state: OrderState, attempt: OrderAttempt];
  fillUpdated: [state: OrderState];
  error: [error: Error];
};

/**
 * Order Tracker events
 */
export type OrderTrackerEvents = {
  settled: [state: OrderState];
  error: [error: Error];
};
