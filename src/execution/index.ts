/**
 * Execution Engine Module
 *
 * Submits validated intents with retry, idempotency tokens and fill accounting.
 */

// Types
export type {
  RetryPolicyConfig,
  ExecutionEngineConfig,
  OrderTrackerConfig,
  CancelResult,
  ExecutionEvents,
  OrderTrackerEvents,
} from './types.js';

// Classes & functions
export { ExecutionEngine } from './ExecutionEngine.js';
export { OrderTracker } from './OrderTracker.js';
export { RetryPolicy, DEFAULT_RETRY_POLICY } from './RetryPolicy.js';
export { buildPayload, mapExchangeStatus, describeError } from './orderMapping.js';
