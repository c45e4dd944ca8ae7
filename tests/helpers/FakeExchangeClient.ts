/**
 * In-process exchange stand-in.
 *
 * Keeps an order book keyed by client order id, so a token seen twice
 * returns the original order instead of creating a new one.
 */

import { classifyExchangeCode } from '../../src/exchange/errorClassifier.js';
import type {
  ExchangeClient,
  ExchangeError,
  ExchangeOrderStatus,
  ExchangeResponse,
  OrderPayload,
  OrderRef,
  OrderSnapshot,
} from '../../src/exchange/types.js';
import type { SymbolRules } from '../../src/orders/types.js';

/**
 * Scripted result for one placeOrder call
 * - status: the exchange accepts the order in this status
 * - error: the call fails; with `landed` the order exists anyway
 */
export type PlaceStep =
  | { status: ExchangeOrderStatus; executedQty?: string }
  | { error: ExchangeError; landed?: boolean };

export interface PlaceCall {
  payload: OrderPayload;
  token: string;
}

export const TEST_RULES: SymbolRules = {
  symbol: 'BTCUSDT',
  stepSize: '0.001',
  minQty: '0.001',
  maxQty: '100',
  tickSize: '0.1',
  minNotional: '5',
};

export function exchangeError(code: number, message = `Error ${code}`): ExchangeError {
  return classifyExchangeCode(code, message);
}

export class FakeExchangeClient implements ExchangeClient {
  readonly placeCalls: PlaceCall[] = [];
  readonly cancelCalls: OrderRef[] = [];
  readonly statusCalls: OrderRef[] = [];

  markPrice = '50000';
  fillPrice = '50000';
  rules: SymbolRules = TEST_RULES;
  /** Status used when no step is scripted */
  defaultStatus: ExchangeOrderStatus = 'FILLED';

  private readonly script: PlaceStep[] = [];
  private readonly lookupFailures: ExchangeError[] = [];
  private readonly orders: Map<string, OrderSnapshot> = new Map();
  private nextOrderId = 1001;
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => undefined;

  /**
   * Script the next placeOrder results, in order
   */
  queue(...steps: PlaceStep[]): void {
    this.script.push(...steps);
  }

  /**
   * Fail the next getOrderStatus calls with these errors, in order
   */
  failLookups(...errors: ExchangeError[]): void {
    this.lookupFailures.push(...errors);
  }

  /**
   * Hold every placeOrder call until resume()
   */
  pause(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  resume(): void {
    this.gate = null;
    this.openGate();
  }

  /**
   * Change an order on the exchange side (fills arriving later, expiry...)
   */
  updateOrder(orderId: string, status: ExchangeOrderStatus, executedQty: string): OrderSnapshot {
    const order = this.findOrder({ symbol: this.rules.symbol, orderId });
    if (!order) {
      throw new Error(`No such order: ${orderId}`);
    }
    const updated: OrderSnapshot = {
      ...order,
      status,
      executedQty,
      avgPrice: Number(executedQty) > 0 ? this.fillPrice : '0',
      updateTime: Date.now(),
    };
    this.orders.set(updated.clientOrderId, updated);
    return updated;
  }

  get orderCount(): number {
    return this.orders.size;
  }

  async placeOrder(payload: OrderPayload, token: string): Promise<ExchangeResponse<OrderSnapshot>> {
    this.placeCalls.push({ payload, token });
    if (this.gate) {
      await this.gate;
    }

    const existing = this.orders.get(token);
    if (existing) {
      return this.ok(existing);
    }

    const step = this.script.shift() ?? { status: this.defaultStatus };

    if ('error' in step) {
      if (step.landed) {
        this.createOrder(payload, token, 'FILLED', payload.quantity);
      }
      return this.fail(step.error);
    }

    const executedQty =
      step.executedQty ?? (step.status === 'FILLED' ? payload.quantity : '0');
    return this.ok(this.createOrder(payload, token, step.status, executedQty));
  }

  async cancelOrder(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>> {
    this.cancelCalls.push(ref);

    const order = this.findOrder(ref);
    if (!order || (order.status !== 'NEW' && order.status !== 'PARTIALLY_FILLED')) {
      return this.fail(exchangeError(-2011, 'Unknown order sent.'));
    }

    const cancelled: OrderSnapshot = { ...order, status: 'CANCELED', updateTime: Date.now() };
    this.orders.set(cancelled.clientOrderId, cancelled);
    return this.ok(cancelled);
  }

  async getOrderStatus(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>> {
    this.statusCalls.push(ref);

    const failure = this.lookupFailures.shift();
    if (failure) {
      return this.fail(failure);
    }

    const order = this.findOrder(ref);
    if (!order) {
      return this.fail(exchangeError(-2013, 'Order does not exist.'));
    }
    return this.ok(order);
  }

  async getSymbolRules(symbol: string): Promise<ExchangeResponse<SymbolRules>> {
    if (symbol !== this.rules.symbol) {
      return this.fail(exchangeError(-1121, 'Invalid symbol.'));
    }
    return this.ok(this.rules);
  }

  async getMarkPrice(symbol: string): Promise<ExchangeResponse<string>> {
    if (symbol !== this.rules.symbol) {
      return this.fail(exchangeError(-1121, 'Invalid symbol.'));
    }
    return this.ok(this.markPrice);
  }

  private createOrder(
    payload: OrderPayload,
    token: string,
    status: ExchangeOrderStatus,
    executedQty: string
  ): OrderSnapshot {
    const order: OrderSnapshot = {
      orderId: String(this.nextOrderId++),
      clientOrderId: token,
      symbol: payload.symbol,
      status,
      executedQty,
      avgPrice: Number(executedQty) > 0 ? this.fillPrice : '0',
      updateTime: Date.now(),
    };
    this.orders.set(token, order);
    return order;
  }

  private findOrder(ref: OrderRef): OrderSnapshot | undefined {
    if (ref.clientOrderId !== undefined) {
      return this.orders.get(ref.clientOrderId);
    }
    return Array.from(this.orders.values()).find((order) => order.orderId === ref.orderId);
  }

  private ok<T>(data: T): ExchangeResponse<T> {
    return { success: true, data, timestamp: Date.now() };
  }

  private fail<T>(error: ExchangeError): ExchangeResponse<T> {
    return { success: false, error, timestamp: Date.now() };
  }
}
