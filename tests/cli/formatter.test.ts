/**
 * Tests for the result formatter and exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  formatFillRate,
  formatHeadline,
  formatOrderSummary,
  formatSummary,
  formatTwapSummary,
} from '../../src/cli/formatter.js';
import { EXIT_CODES, exitCodeForError, exitCodeForStatus } from '../../src/cli/exitCodes.js';
import { ConfigurationError, ValidationError } from '../../src/errors.js';
import { createOrderState } from '../../src/orders/orderState.js';
import type {
  MarketIntent,
  MutableOrderState,
  OrderStatus,
  TwapIntent,
} from '../../src/orders/types.js';

const market: MarketIntent = {
  symbol: 'BTCUSDT',
  side: 'BUY',
  type: 'MARKET',
  quantity: '0.001',
  reduceOnly: false,
};

function orderState(status: OrderStatus, patch: Partial<MutableOrderState> = {}): MutableOrderState {
  const state = createOrderState(market);
  Object.assign(state, { id: 'order-1', status, ...patch });
  return state;
}

describe('formatHeadline', () => {
  it('should describe each order type', () => {
    expect(formatHeadline(orderState('FILLED'))).toBe('✅ MARKET BUY 0.001 BTCUSDT: FILLED');
    expect(
      formatHeadline(
        orderState('SUBMITTED', {
          intent: { ...market, type: 'LIMIT', quantity: '0.01', price: '41000', timeInForce: 'GTC' },
        })
      )
    ).toBe('📨 LIMIT BUY 0.01 BTCUSDT @ 41000: SUBMITTED');
    expect(
      formatHeadline(
        orderState('CANCELLED', {
          intent: {
            ...market,
            type: 'STOP_LIMIT',
            quantity: '0.01',
            price: '41500',
            stopPrice: '41600',
            timeInForce: 'GTC',
          },
        })
      )
    ).toBe('🚫 STOP_LIMIT BUY 0.01 BTCUSDT @ 41500 (stop 41600): CANCELLED');
  });
});

describe('formatOrderSummary', () => {
  it('should list ids, fill, price and attempts', () => {
    const state = orderState('FILLED', {
      exchangeOrderId: '1001',
      filledQuantity: '0.001',
      averagePrice: '50000',
      attempts: [
        {
          sequence: 1,
          token: 'token-1',
          payload: { symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '0.001' },
          outcome: 'ACKNOWLEDGED',
          timestamp: 0,
        },
      ],
    });

    expect(formatOrderSummary(state)).toBe(
      [
        '✅ MARKET BUY 0.001 BTCUSDT: FILLED',
        '• Order ID: order-1',
        '• Exchange Order ID: 1001',
        '• Filled: 0.001 / 0.001',
        '• Avg Price: 50000',
        '• Attempts: 1',
      ].join('\n')
    );
  });

  it('should include the reason of a failed order', () => {
    const state = orderState('REJECTED', { reason: 'INSUFFICIENT_MARGIN (-2019): Error -2019' });

    expect(formatOrderSummary(state).split('\n')).toEqual([
      '⛔ MARKET BUY 0.001 BTCUSDT: REJECTED',
      '• Order ID: order-1',
      '• Filled: 0 / 0.001',
      '• Attempts: 0',
      '• Reason: INSUFFICIENT_MARGIN (-2019): Error -2019',
    ]);
  });
});

describe('formatTwapSummary', () => {
  it('should summarize slices and list each child', () => {
    const twap: TwapIntent = {
      ...market,
      type: 'TWAP',
      quantity: '0.03',
      sliceCount: 3,
      intervalSeconds: 10,
      slices: ['0.01', '0.01', '0.01'],
      stepSize: '0.001',
      maxQty: '100',
    };
    const child = (status: OrderStatus, filled: string, exchangeOrderId?: string) =>
      orderState(status, {
        intent: { ...market, quantity: '0.01' },
        filledQuantity: filled,
        ...(exchangeOrderId !== undefined && { exchangeOrderId }),
      });
    const parent = orderState('CANCELLED', {
      id: 'parent-1',
      intent: twap,
      filledQuantity: '0.01',
      averagePrice: '50000',
      reason: 'TWAP cancelled',
      children: [child('FILLED', '0.01', '1001'), child('CANCELLED', '0'), child('CANCELLED', '0')],
    });

    expect(formatTwapSummary(parent).split('\n')).toEqual([
      '🚫 TWAP BUY 0.03 BTCUSDT over 3 slices every 10s: CANCELLED',
      '• Parent ID: parent-1',
      '• Slices: 3 (filled 1, failed 0, cancelled 2)',
      '• Filled: 0.01 / 0.03 (33.33%)',
      '• Avg Price: 50000',
      '• Reason: TWAP cancelled',
      '  1. 0.01 FILLED filled 0.01 #1001',
      '  2. 0.01 CANCELLED filled 0',
      '  3. 0.01 CANCELLED filled 0',
    ]);
    expect(formatSummary(parent)).toBe(formatTwapSummary(parent));
  });

  it('should pick the single-order summary for other types', () => {
    const state = orderState('FILLED');

    expect(formatSummary(state)).toBe(formatOrderSummary(state));
  });
});

describe('formatFillRate', () => {
  it('should format the filled share with two decimals', () => {
    expect(formatFillRate('0.02', '0.05')).toBe('40.00%');
    expect(formatFillRate('0.05', '0.05')).toBe('100.00%');
    expect(formatFillRate('0', '0')).toBe('0.00%');
  });
});

describe('exit codes', () => {
  it.each([
    ['FILLED', EXIT_CODES.SUCCESS],
    ['PARTIALLY_FILLED', EXIT_CODES.SUCCESS],
    ['SUBMITTED', EXIT_CODES.SUCCESS],
    ['FAILED', EXIT_CODES.ORDER_FAILED],
    ['REJECTED', EXIT_CODES.ORDER_FAILED],
    ['CANCELLED', EXIT_CODES.ORDER_FAILED],
  ] as const)('should map %s to %i', (status, code) => {
    expect(exitCodeForStatus(status)).toBe(code);
  });

  it('should map error classes to their codes', () => {
    expect(exitCodeForError(new ValidationError('BAD_SIDE', 'side', 'Invalid side'))).toBe(2);
    expect(exitCodeForError(new ConfigurationError('Missing key'))).toBe(3);
    expect(exitCodeForError(new Error('boom'))).toBe(1);
  });
});
