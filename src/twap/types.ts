/**
 * Types for TWAP Scheduler
 */

import type { OrderState, OrderStatus } from '../orders/types.js';

/**
 * What happens to the parent when a slice ends FAILED or REJECTED
 * - halt: stop dispatching, cancel un-started slices, parent FAILED
 * - continue: keep dispatching, parent FAILED once all slices are done
 * - reslice: spread the failed quantity over the un-started slices
 */
export type TwapFailurePolicy = 'halt' | 'continue' | 'reslice';

/**
 * TWAP Scheduler configuration
 */
export interface TwapSchedulerConfig {
  failurePolicy: TwapFailurePolicy;
}

/**
 * TWAP Scheduler events
 */
export type TwapEvents = {
  sliceDispatched: [parent: OrderState, child: OrderState, index: number];
  parentUpdated: [parent: OrderState, previous: OrderStatus];
  resliced: [parent: OrderState, plan: readonly string[]];
  error: [error: Error];
};
