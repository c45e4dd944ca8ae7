/**
 * Mapping between intents, wire payloads and exchange order statuses
 */

import Decimal from 'decimal.js';
import type { ExchangeError, OrderPayload, OrderSnapshot } from '../exchange/types.js';
import type { ExecutableIntent, OrderStatus } from '../orders/types.js';

/**
 * Wire payload for an intent. STOP_LIMIT goes out as the futures STOP type.
 */
export function buildPayload(intent: ExecutableIntent): OrderPayload {
  const base = {
    symbol: intent.symbol,
    side: intent.side,
    quantity: intent.quantity,
    ...(intent.reduceOnly && { reduceOnly: true }),
  };

  switch (intent.type) {
    case 'MARKET':
      return { ...base, type: 'MARKET' };
    case 'LIMIT':
      return { ...base, type: 'LIMIT', price: intent.price, timeInForce: intent.timeInForce };
    case 'STOP_LIMIT':
      return {
        ...base,
        type: 'STOP',
        price: intent.price,
        stopPrice: intent.stopPrice,
        timeInForce: intent.timeInForce,
      };
  }
}

/**
 * Order status implied by an exchange snapshot
 */
export function mapExchangeStatus(snapshot: OrderSnapshot): OrderStatus {
  switch (snapshot.status) {
    case 'NEW':
    case 'NEW_INSURANCE':
    case 'NEW_ADL':
      return 'SUBMITTED';
    case 'PARTIALLY_FILLED':
      return 'PARTIALLY_FILLED';
    case 'FILLED':
      return 'FILLED';
    case 'CANCELED':
      return 'CANCELLED';
    case 'REJECTED':
      return 'REJECTED';
    case 'EXPIRED':
    case 'EXPIRED_IN_MATCH':
      return new Decimal(snapshot.executedQty).gt(0) ? 'PARTIALLY_FILLED' : 'CANCELLED';
  }
}

/**
 * Reason string attached to terminal non-success states
 */
export function describeSnapshot(snapshot: OrderSnapshot): string | undefined {
  switch (snapshot.status) {
    case 'REJECTED':
      return 'Rejected by exchange';
    case 'CANCELED':
      return 'Cancelled on exchange';
    case 'EXPIRED':
    case 'EXPIRED_IN_MATCH':
      return `Expired on exchange after filling ${snapshot.executedQty}`;
    default:
      return undefined;
  }
}

export function describeError(error: ExchangeError): string {
  return error.code !== undefined
    ? `${error.kind} (${error.code}): ${error.message}`
    : `${error.kind}: ${error.message}`;
}
