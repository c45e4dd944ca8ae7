/**
 * TWAP Scheduler Module
 */

export type { TwapFailurePolicy, TwapSchedulerConfig, TwapEvents } from './types.js';
export { TwapScheduler } from './TwapScheduler.js';
