/**
 * Result Formatter
 *
 * Human-readable summaries of order and TWAP outcomes for stdout.
 */

import Decimal from 'decimal.js';
import type { OrderState, OrderStatus } from '../orders/types.js';

const STATUS_ICONS: Record<OrderStatus, string> = {
  PENDING: '⏳',
  SUBMITTED: '📨',
  PARTIALLY_FILLED: '🟡',
  FILLED: '✅',
  REJECTED: '⛔',
  CANCELLED: '🚫',
  FAILED: '❌',
};

/**
 * One-line headline, e.g. "✅ LIMIT BUY 0.01 BTCUSDT @ 41000: FILLED"
 */
export function formatHeadline(state: OrderState): string {
  const { intent } = state;
  let description = `${intent.type} ${intent.side} ${intent.quantity} ${intent.symbol}`;

  if (intent.type === 'LIMIT') {
    description += ` @ ${intent.price}`;
  } else if (intent.type === 'STOP_LIMIT') {
    description += ` @ ${intent.price} (stop ${intent.stopPrice})`;
  } else if (intent.type === 'TWAP') {
    description += ` over ${intent.sliceCount} slices every ${intent.intervalSeconds}s`;
  }

  return `${STATUS_ICONS[state.status]} ${description}: ${state.status}`;
}

/**
 * Summary of a single MARKET / LIMIT / STOP_LIMIT order
 */
export function formatOrderSummary(state: OrderState): string {
  const lines = [
    formatHeadline(state),
    `• Order ID: ${state.id}`,
  ];

  if (state.exchangeOrderId !== undefined) {
    lines.push(`• Exchange Order ID: ${state.exchangeOrderId}`);
  }
  lines.push(`• Filled: ${state.filledQuantity} / ${state.intent.quantity}`);
  if (state.averagePrice !== undefined) {
    lines.push(`• Avg Price: ${state.averagePrice}`);
  }
  lines.push(`• Attempts: ${state.attempts.length}`);
  if (state.reason !== undefined) {
    lines.push(`• Reason: ${state.reason}`);
  }

  return lines.join('\n');
}

/**
 * Summary of a TWAP parent with one line per slice
 */
export function formatTwapSummary(parent: OrderState): string {
  const count = (status: OrderStatus): number =>
    parent.children.filter((child) => child.status === status).length;

  const lines = [
    formatHeadline(parent),
    `• Parent ID: ${parent.id}`,
    `• Slices: ${parent.children.length} (filled ${count('FILLED')}, failed ${
      count('FAILED') + count('REJECTED')
    }, cancelled ${count('CANCELLED')})`,
    `• Filled: ${parent.filledQuantity} / ${parent.intent.quantity} (${formatFillRate(
      parent.filledQuantity,
      parent.intent.quantity
    )})`,
  ];

  if (parent.averagePrice !== undefined) {
    lines.push(`• Avg Price: ${parent.averagePrice}`);
  }
  if (parent.reason !== undefined) {
    lines.push(`• Reason: ${parent.reason}`);
  }

  parent.children.forEach((child, index) => {
    const exchangeId = child.exchangeOrderId !== undefined ? ` #${child.exchangeOrderId}` : '';
    lines.push(
      `  ${index + 1}. ${child.intent.quantity} ${child.status} filled ${child.filledQuantity}${exchangeId}`
    );
  });

  return lines.join('\n');
}

/**
 * Summary for whichever kind of order the state holds
 */
export function formatSummary(state: OrderState): string {
  return state.intent.type === 'TWAP' ? formatTwapSummary(state) : formatOrderSummary(state);
}

/**
 * Filled share of the requested quantity, e.g. "40.00%"
 */
export function formatFillRate(filled: string, requested: string): string {
  const requestedDecimal = new Decimal(requested);
  if (requestedDecimal.isZero()) {
    return '0.00%';
  }
  return new Decimal(filled).div(requestedDecimal).mul(100).toFixed(2) + '%';
}
