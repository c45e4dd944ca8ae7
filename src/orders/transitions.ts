/**
 * Order state machine.
 *
 * PENDING -> SUBMITTED -> FILLED | PARTIALLY_FILLED | CANCELLED | FAILED | REJECTED
 * PARTIALLY_FILLED -> FILLED | CANCELLED happens only on an external status update.
 */

import { InternalError } from '../errors.js';
import type { MutableOrderState, OrderStatus } from './types.js';

const ALLOWED_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  PENDING: ['SUBMITTED', 'CANCELLED', 'FAILED'],
  SUBMITTED: ['FILLED', 'PARTIALLY_FILLED', 'CANCELLED', 'FAILED', 'REJECTED'],
  PARTIALLY_FILLED: ['FILLED', 'CANCELLED'],
  FILLED: [],
  REJECTED: [],
  CANCELLED: [],
  FAILED: [],
};

export const TERMINAL_STATUSES: readonly OrderStatus[] = [
  'FILLED',
  'REJECTED',
  'CANCELLED',
  'FAILED',
];

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Terminal, or partially filled with no further Engine-driven attempt
 */
export function isSettled(status: OrderStatus): boolean {
  return isTerminal(status) || status === 'PARTIALLY_FILLED';
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Apply a status change, returning the previous status.
 * Throws InternalError on a transition the state machine does not allow.
 */
export function transition(
  state: MutableOrderState,
  to: OrderStatus,
  reason?: string
): OrderStatus {
  const from = state.status;

  if (!canTransition(from, to)) {
    throw new InternalError(`Illegal order transition ${from} -> ${to}`, {
      orderId: state.id,
      symbol: state.intent.symbol,
      from,
      to,
    });
  }

  state.status = to;
  state.updatedAt = Date.now();
  if (reason !== undefined) {
    state.reason = reason;
  }
  return from;
}
