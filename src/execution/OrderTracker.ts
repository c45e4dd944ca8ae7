/**
 * Order Tracker
 *
 * Periodic status polling for resting LIMIT / STOP_LIMIT orders.
 * Feeds exchange snapshots back into the Execution Engine until each
 * tracked order reaches a terminal status.
 */

import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import { toError } from '../errors.js';
import { isTerminal } from '../orders/transitions.js';
import type { OrderState } from '../orders/types.js';
import type { ExecutionEngine } from './ExecutionEngine.js';
import type { OrderTrackerConfig, OrderTrackerEvents } from './types.js';

export class OrderTracker extends EventEmitter<OrderTrackerEvents> {
  private readonly config: OrderTrackerConfig;
  private readonly engine: ExecutionEngine;
  private readonly tracked: Set<string> = new Set();
  private pollTimer: NodeJS.Timeout | null = null;
  private isPolling = false;

  constructor(config: OrderTrackerConfig, engine: ExecutionEngine) {
    super();
    this.config = config;
    this.engine = engine;

    logger.info('Order Tracker initialized', {
      pollIntervalMs: config.pollIntervalMs,
    });
  }

  /**
   * Start polling an order until it is terminal
   */
  track(order: OrderState): void {
    if (isTerminal(order.status)) {
      this.emit('settled', order);
      return;
    }

    this.tracked.add(order.id);
    this.startPolling();
  }

  untrack(orderId: string): void {
    this.tracked.delete(orderId);
    if (this.tracked.size === 0) {
      this.stopPolling();
    }
  }

  /**
   * Resolve when the order is terminal, or with its current state after timeoutMs
   */
  waitForSettlement(order: OrderState, timeoutMs: number): Promise<OrderState> {
    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        this.off('settled', onSettled);
        this.untrack(order.id);
        resolve(this.engine.get(order.id) ?? order);
      };
      const onSettled = (state: OrderState): void => {
        if (state.id === order.id) finish();
      };
      const timer = setTimeout(finish, timeoutMs);

      this.on('settled', onSettled);
      this.track(order);
    });
  }

  /**
   * Stop all tracking
   */
  stop(): void {
    this.tracked.clear();
    this.stopPolling();
    logger.debug('Order Tracker stopped');
  }

  get trackedCount(): number {
    return this.tracked.size;
  }

  private startPolling(): void {
    if (this.pollTimer) return;

    this.pollTimer = setInterval(() => {
      this.poll().catch((error: unknown) => this.emit('error', toError(error)));
    }, this.config.pollIntervalMs);
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  /**
   * Refresh every tracked order once; skipped while a previous round is running
   */
  private async poll(): Promise<void> {
    if (this.isPolling) return;
    this.isPolling = true;

    try {
      for (const orderId of Array.from(this.tracked)) {
        const state = this.engine.get(orderId);
        if (!state) {
          this.untrack(orderId);
          continue;
        }

        const refreshed = await this.engine.refresh(state);
        if (isTerminal(refreshed.status)) {
          logger.info('Tracked order settled', {
            orderId,
            status: refreshed.status,
            filledQuantity: refreshed.filledQuantity,
          });
          this.untrack(orderId);
          this.emit('settled', refreshed);
        }
      }
    } finally {
      this.isPolling = false;
    }
  }
}
