/**
 * Library entry point
 */

export { App } from './app.js';
export type { AppDependencies, ExecuteOptions } from './app.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export {
  ValidationError,
  ConfigurationError,
  InternalError,
  OrderNotCancellableError,
  ExchangeRequestError,
} from './errors.js';
export type { ValidationErrorKind } from './errors.js';

export * from './orders/index.js';
export * from './exchange/index.js';
export * from './execution/index.js';
export * from './twap/index.js';
export * from './audit/index.js';
export { formatSummary, formatOrderSummary, formatTwapSummary } from './cli/formatter.js';
