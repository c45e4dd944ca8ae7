/**
 * Exchange Client contract.
 *
 * The core only depends on this interface; signing, transport and
 * rate-limit headers stay inside the implementation.
 */

import type { OrderSide, SymbolRules, TimeInForce } from '../orders/types.js';

// ===========================================
// Configuration Types
// ===========================================

/**
 * Binance API client configuration
 */
export interface BinanceClientConfig {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  requestTimeoutMs: number;
  recvWindow: number;
}

// ===========================================
// Request / Response Types
// ===========================================

/**
 * Futures order type as sent on the wire. STOP is a stop-limit.
 */
export type FuturesOrderType = 'MARKET' | 'LIMIT' | 'STOP';

/**
 * Order request payload, exactly as sent
 */
export interface OrderPayload {
  symbol: string;
  side: OrderSide;
  type: FuturesOrderType;
  quantity: string;
  price?: string;
  stopPrice?: string;
  timeInForce?: TimeInForce;
  reduceOnly?: boolean;
}

/**
 * Order status values reported by the exchange
 */
export type ExchangeOrderStatus =
  | 'NEW'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED'
  | 'EXPIRED'
  | 'EXPIRED_IN_MATCH'
  | 'NEW_INSURANCE'
  | 'NEW_ADL';

/**
 * Normalized exchange view of one order
 */
export interface OrderSnapshot {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  status: ExchangeOrderStatus;
  /** Cumulative executed quantity, decimal string */
  executedQty: string;
  avgPrice: string;
  updateTime: number;
}

/**
 * Identifies an order on the exchange, by exchange id or client id
 */
export interface OrderRef {
  symbol: string;
  orderId?: string;
  clientOrderId?: string;
}

// ===========================================
// Error Types
// ===========================================

export type ExchangeErrorKind =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'RATE_LIMITED'
  | 'EXCHANGE_UNAVAILABLE'
  | 'INVALID_REQUEST'
  | 'INSUFFICIENT_MARGIN'
  | 'PERMISSION_DENIED'
  | 'UNKNOWN_SYMBOL'
  | 'UNKNOWN_ORDER'
  | 'UNKNOWN';

export interface ExchangeError {
  kind: ExchangeErrorKind;
  /** Exchange error code (-1003) or socket error code ('ETIMEDOUT') */
  code?: number | string;
  message: string;
  /** Safe to send again */
  retriable: boolean;
  /** The request may have reached the matching engine */
  ambiguous: boolean;
}

/**
 * Typed result of every exchange call
 */
export type ExchangeResponse<T> =
  | { success: true; data: T; timestamp: number }
  | { success: false; error: ExchangeError; timestamp: number };

// ===========================================
// Client Contract
// ===========================================

export interface ExchangeClient {
  /** Place an order; `token` is sent as the client order id */
  placeOrder(payload: OrderPayload, token: string): Promise<ExchangeResponse<OrderSnapshot>>;
  cancelOrder(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>>;
  getOrderStatus(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>>;
  getSymbolRules(symbol: string): Promise<ExchangeResponse<SymbolRules>>;
  /** Current mark price, decimal string */
  getMarkPrice(symbol: string): Promise<ExchangeResponse<string>>;
}

export type { SymbolRules };
