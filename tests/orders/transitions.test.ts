/**
 * Tests for the order state machine
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createOrderState } from '../../src/orders/orderState.js';
import {
  canTransition,
  isSettled,
  isTerminal,
  transition,
} from '../../src/orders/transitions.js';
import { InternalError } from '../../src/errors.js';
import type { MarketIntent } from '../../src/orders/types.js';

const intent: MarketIntent = {
  symbol: 'BTCUSDT',
  side: 'BUY',
  type: 'MARKET',
  quantity: '0.001',
  reduceOnly: false,
};

describe('order transitions', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create a PENDING state with nothing filled', () => {
    const state = createOrderState(intent, 'parent-1');

    expect(state).toMatchObject({
      intent,
      status: 'PENDING',
      filledQuantity: '0',
      attempts: [],
      children: [],
      parentId: 'parent-1',
    });
    expect(state.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should omit parentId for top-level orders', () => {
    expect(createOrderState(intent)).not.toHaveProperty('parentId');
  });

  it.each([
    ['PENDING', 'SUBMITTED'],
    ['PENDING', 'CANCELLED'],
    ['PENDING', 'FAILED'],
    ['SUBMITTED', 'FILLED'],
    ['SUBMITTED', 'PARTIALLY_FILLED'],
    ['SUBMITTED', 'REJECTED'],
    ['PARTIALLY_FILLED', 'FILLED'],
    ['PARTIALLY_FILLED', 'CANCELLED'],
  ] as const)('should allow %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it.each([
    ['PENDING', 'FILLED'],
    ['PARTIALLY_FILLED', 'FAILED'],
    ['FILLED', 'CANCELLED'],
    ['CANCELLED', 'SUBMITTED'],
    ['FAILED', 'SUBMITTED'],
  ] as const)('should refuse %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });

  it('should apply a transition and return the previous status', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const state = createOrderState(intent);

    vi.setSystemTime(new Date('2026-01-01T00:00:05Z'));
    const previous = transition(state, 'SUBMITTED');
    transition(state, 'REJECTED', 'Rejected by exchange');

    expect(previous).toBe('PENDING');
    expect(state.status).toBe('REJECTED');
    expect(state.reason).toBe('Rejected by exchange');
    expect(state.updatedAt).toBe(new Date('2026-01-01T00:00:05Z').getTime());
  });

  it('should throw InternalError on an illegal transition', () => {
    const state = createOrderState(intent);

    expect(() => transition(state, 'FILLED')).toThrow(InternalError);
    expect(state.status).toBe('PENDING');
  });

  it('should classify terminal and settled statuses', () => {
    expect(isTerminal('FILLED')).toBe(true);
    expect(isTerminal('FAILED')).toBe(true);
    expect(isTerminal('PARTIALLY_FILLED')).toBe(false);
    expect(isSettled('PARTIALLY_FILLED')).toBe(true);
    expect(isSettled('SUBMITTED')).toBe(false);
  });
});
