/**
 * Types for the Audit Log
 */

import type { ExchangeErrorKind } from '../exchange/types.js';
import type { OrderStatus } from '../orders/types.js';

interface AuditEventBase {
  symbol: string;
  /** OrderState id (one per intent) */
  orderId: string;
  parentId?: string;
  /** ISO-8601 */
  timestamp: string;
}

/**
 * One placement attempt and its outcome
 */
export interface AttemptEvent extends AuditEventBase {
  type: 'ATTEMPT';
  sequence: number;
  token: string;
  /** sha256 of the JSON payload */
  payloadDigest: string;
  outcome: 'ACKNOWLEDGED' | 'ERROR';
  exchangeOrderId?: string;
  exchangeStatus?: string;
  errorKind?: ExchangeErrorKind;
  errorCode?: number | string;
}

/**
 * OrderState status change
 */
export interface TransitionEvent extends AuditEventBase {
  type: 'TRANSITION';
  from: OrderStatus;
  to: OrderStatus;
  filledQuantity: string;
  reason?: string;
}

/**
 * Cancel request sent to the exchange
 */
export interface CancelEvent extends AuditEventBase {
  type: 'CANCEL';
  exchangeOrderId: string;
  outcome: 'ACKNOWLEDGED' | 'ERROR';
  errorKind?: ExchangeErrorKind;
}

/**
 * Ambiguous attempt resolved by looking the order up by its token
 */
export interface ReconciledEvent extends AuditEventBase {
  type: 'RECONCILED';
  sequence: number;
  token: string;
  exchangeOrderId: string;
  exchangeStatus: string;
}

export type AuditEvent = AttemptEvent | TransitionEvent | CancelEvent | ReconciledEvent;

/**
 * Write-only sink. Implementations may be sync or async.
 */
export interface AuditLog {
  record(event: AuditEvent): void | Promise<void>;

  /** Failures detected after record() has returned */
  onFailure?(listener: (error: Error) => void): void;
}
