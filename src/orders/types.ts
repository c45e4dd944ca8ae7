/**
 * Types for the Order Model
 */

import type { ExchangeError, OrderPayload, OrderSnapshot } from '../exchange/types.js';

// ===========================================
// Intent Types
// ===========================================

/**
 * Order side
 */
export type OrderSide = 'BUY' | 'SELL';

/**
 * Order intent type
 */
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP_LIMIT' | 'TWAP';

/**
 * Time in force for resting orders
 */
export type TimeInForce = 'GTC' | 'IOC' | 'FOK' | 'GTX';

/**
 * Decimal value as accepted from callers
 */
export type DecimalInput = string | number;

/**
 * Unvalidated order intent, as built by the CLI or a library caller
 */
export interface OrderIntentInput {
  symbol: string;
  side: string;
  type: OrderType;
  quantity: DecimalInput;
  price?: DecimalInput;
  stopPrice?: DecimalInput;
  sliceCount?: number;
  intervalSeconds?: number;
  timeInForce?: TimeInForce;
  reduceOnly?: boolean;
}

interface IntentBase {
  readonly symbol: string;
  readonly side: OrderSide;
  /** Normalized decimal string, e.g. '0.01' */
  readonly quantity: string;
  readonly reduceOnly: boolean;
}

export interface MarketIntent extends IntentBase {
  readonly type: 'MARKET';
}

export interface LimitIntent extends IntentBase {
  readonly type: 'LIMIT';
  readonly price: string;
  readonly timeInForce: TimeInForce;
}

export interface StopLimitIntent extends IntentBase {
  readonly type: 'STOP_LIMIT';
  readonly price: string;
  readonly stopPrice: string;
  readonly timeInForce: TimeInForce;
}

export interface TwapIntent extends IntentBase {
  readonly type: 'TWAP';
  readonly sliceCount: number;
  readonly intervalSeconds: number;
  /** Per-slice quantities; they sum to `quantity` exactly */
  readonly slices: readonly string[];
  /** Symbol step size the slices are aligned to */
  readonly stepSize: string;
  /** Symbol maximum quantity per order; resliced slices must stay within it */
  readonly maxQty: string;
}

/**
 * Intent that passed validation
 */
export type ValidatedIntent = MarketIntent | LimitIntent | StopLimitIntent | TwapIntent;

/**
 * Intents the Execution Engine sends to the exchange directly
 */
export type ExecutableIntent = MarketIntent | LimitIntent | StopLimitIntent;

// ===========================================
// Lifecycle Types
// ===========================================

export type OrderStatus =
  | 'PENDING'
  | 'SUBMITTED'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'REJECTED'
  | 'CANCELLED'
  | 'FAILED';

/**
 * One submission to the exchange. Immutable once recorded.
 */
export interface OrderAttempt {
  /** 1, 2, 3... per OrderState */
  readonly sequence: number;
  /** Idempotency token, sent as the client order id */
  readonly token: string;
  readonly payload: OrderPayload;
  readonly outcome: 'ACKNOWLEDGED' | 'ERROR';
  readonly response?: OrderSnapshot;
  readonly error?: ExchangeError;
  readonly timestamp: number;
}

/**
 * Read-only view of one logical order (or TWAP parent)
 */
export interface OrderState {
  readonly id: string;
  readonly intent: ValidatedIntent;
  readonly status: OrderStatus;
  /** Cumulative filled quantity, decimal string */
  readonly filledQuantity: string;
  readonly attempts: readonly OrderAttempt[];
  /** Exchange order id once acknowledged */
  readonly exchangeOrderId?: string;
  readonly averagePrice?: string;
  readonly parentId?: string;
  /** TWAP children, in slice order */
  readonly children: readonly OrderState[];
  /** Human-readable reason for a terminal non-success status */
  readonly reason?: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/**
 * Mutable form, held only by the Engine and the TWAP Scheduler
 */
export interface MutableOrderState {
  id: string;
  intent: ValidatedIntent;
  status: OrderStatus;
  filledQuantity: string;
  attempts: OrderAttempt[];
  exchangeOrderId?: string;
  averagePrice?: string;
  parentId?: string;
  /** Children are owned by the Execution Engine */
  children: OrderState[];
  reason?: string;
  createdAt: number;
  updatedAt: number;
}

// ===========================================
// Exchange Rules
// ===========================================

/**
 * Symbol trading rules (decimal strings)
 */
export interface SymbolRules {
  symbol: string;
  stepSize: string;
  minQty: string;
  maxQty: string;
  tickSize: string;
  minNotional: string;
}

/**
 * Limits applied while validating
 */
export interface ValidationOptions {
  maxSlices: number;
  maxIntervalSeconds: number;
  /** Mark price used for the notional check of MARKET and TWAP intents */
  referencePrice?: DecimalInput;
}
