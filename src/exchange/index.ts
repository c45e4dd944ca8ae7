/**
 * Exchange Client Module
 *
 * Contract consumed by the Execution Engine and its Binance implementation.
 */

// Types
export type {
  BinanceClientConfig,
  FuturesOrderType,
  OrderPayload,
  ExchangeOrderStatus,
  OrderSnapshot,
  OrderRef,
  ExchangeErrorKind,
  ExchangeError,
  ExchangeResponse,
  ExchangeClient,
} from './types.js';

// Classes & functions
export { BinanceFuturesClient } from './BinanceFuturesClient.js';
export { classifyError, classifyExchangeCode, normalizeErrorMessage } from './errorClassifier.js';
