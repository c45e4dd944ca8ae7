/**
 * Execution Engine
 *
 * Turns one validated intent into one or more exchange calls:
 * Intent → PENDING → attempt(s) with retry/backoff → terminal or resting state
 *
 * Each order has a single attempt loop, so attempts for one order are
 * strictly sequential. Different orders run concurrently.
 */

import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger.js';
import { InternalError, OrderNotCancellableError, toError } from '../errors.js';
import { SafeAuditLog } from '../audit/SafeAuditLog.js';
import { payloadDigest } from '../audit/digest.js';
import { createOrderState } from '../orders/orderState.js';
import { sumDecimals } from '../orders/quantity.js';
import { canTransition, isTerminal, transition } from '../orders/transitions.js';
import { RetryPolicy } from './RetryPolicy.js';
import { buildPayload, describeError, describeSnapshot, mapExchangeStatus } from './orderMapping.js';
import type { AuditLog } from '../audit/types.js';
import type { ExchangeClient, ExchangeError, OrderSnapshot } from '../exchange/types.js';
import type {
  ExecutableIntent,
  MutableOrderState,
  OrderAttempt,
  OrderState,
  OrderStatus,
} from '../orders/types.js';
import type { CancelResult, ExecutionEngineConfig, ExecutionEvents } from './types.js';

interface Fill {
  executedQty: string;
  avgPrice: string;
}

interface OrderRecord {
  state: MutableOrderState;
  /** Latest fill per exchange order id; a redelivered snapshot replaces, never adds */
  fills: Map<string, Fill>;
  cancelRequested: boolean;
  running?: Promise<void>;
  /** Ends a pending backoff wait early */
  wake?: () => void;
}

type ReconcileOutcome =
  | { result: 'found' }
  | { result: 'absent' }
  | { result: 'unresolved'; error: ExchangeError; lookups: number };

const CANCELLABLE_STATUSES: readonly OrderStatus[] = ['PENDING', 'SUBMITTED'];

export class ExecutionEngine extends EventEmitter<ExecutionEvents> {
  private readonly client: ExchangeClient;
  private readonly audit: SafeAuditLog;
  private readonly retryPolicy: RetryPolicy;
  private readonly orders: Map<string, OrderRecord> = new Map();

  constructor(config: ExecutionEngineConfig, client: ExchangeClient, audit: AuditLog) {
    super();
    this.client = client;
    this.audit = audit instanceof SafeAuditLog ? audit : new SafeAuditLog(audit);
    this.retryPolicy = new RetryPolicy(config);

    logger.info('Execution Engine initialized', {
      maxAttempts: config.maxAttempts,
      backoffBaseMs: config.backoffBaseMs,
      backoffFactor: config.backoffFactor,
      backoffMaxMs: config.backoffMaxMs,
    });
  }

  /**
   * Create a PENDING order without sending anything
   */
  prepare(intent: ExecutableIntent, parentId?: string): OrderState {
    const state = createOrderState(intent, parentId);
    this.orders.set(state.id, { state, fills: new Map(), cancelRequested: false });

    logger.debug('Order prepared', {
      orderId: state.id,
      parentId,
      symbol: intent.symbol,
      side: intent.side,
      type: intent.type,
      quantity: intent.quantity,
    });
    return state;
  }

  /**
   * Start the attempt loop for a prepared order. Returns immediately.
   */
  dispatch(order: OrderState): void {
    const record = this.getRecord(order.id);
    if (record.running || record.state.status !== 'PENDING') {
      throw new InternalError('Order already dispatched', {
        orderId: order.id,
        status: record.state.status,
      });
    }
    record.running = this.run(record);
  }

  /**
   * Prepare and dispatch. The returned state updates as attempts complete.
   */
  submit(intent: ExecutableIntent): OrderState {
    const state = this.prepare(intent);
    this.dispatch(state);
    return state;
  }

  /**
   * Resolves once the attempt loop (if any) has finished
   */
  async completion(order: OrderState): Promise<OrderState> {
    const record = this.getRecord(order.id);
    if (record.running) {
      await record.running;
    }
    return record.state;
  }

  /**
   * Cancel an order that is PENDING or SUBMITTED.
   * An attempt already in flight completes first.
   */
  async cancel(order: OrderState): Promise<CancelResult> {
    const record = this.getRecord(order.id);
    const { state } = record;

    if (!CANCELLABLE_STATUSES.includes(state.status)) {
      return this.notCancellable(state);
    }

    record.cancelRequested = true;
    record.wake?.();

    if (record.running) {
      await record.running;
    }

    if (state.status === 'CANCELLED') {
      return { success: true, state };
    }

    if (state.status === 'PENDING') {
      this.changeStatus(record, 'CANCELLED', 'Cancelled before dispatch');
      return { success: true, state };
    }

    if (state.status !== 'SUBMITTED' || state.exchangeOrderId === undefined) {
      return this.notCancellable(state);
    }

    const exchangeOrderId = state.exchangeOrderId;
    logger.info('Cancelling order', { orderId: state.id, exchangeOrderId });

    const response = await this.client.cancelOrder({
      symbol: state.intent.symbol,
      orderId: exchangeOrderId,
    });

    this.audit.record({
      type: 'CANCEL',
      ...this.auditBase(state),
      exchangeOrderId,
      outcome: response.success ? 'ACKNOWLEDGED' : 'ERROR',
      ...(!response.success && { errorKind: response.error.kind }),
    });

    if (!response.success) {
      logger.warn('Cancel request failed', {
        orderId: state.id,
        exchangeOrderId,
        error: describeError(response.error),
      });
      return { success: false, state, error: response.error };
    }

    const status = this.applySnapshot(record, response.data);

    // The exchange may report a fill that raced the cancel
    if (status !== 'CANCELLED') {
      return this.notCancellable(state);
    }
    return { success: true, state };
  }

  /**
   * Apply an order snapshot from an external status feed.
   * The only path from PARTIALLY_FILLED to FILLED.
   */
  applyStatusUpdate(orderId: string, snapshot: OrderSnapshot): OrderState {
    const record = this.getRecord(orderId);
    this.applySnapshot(record, snapshot);
    return record.state;
  }

  /**
   * Fetch the order's status from the exchange once and apply it
   */
  async refresh(order: OrderState): Promise<OrderState> {
    const record = this.getRecord(order.id);
    const { state } = record;

    if (state.exchangeOrderId === undefined) {
      return state;
    }

    const response = await this.client.getOrderStatus({
      symbol: state.intent.symbol,
      orderId: state.exchangeOrderId,
    });

    if (response.success) {
      this.applySnapshot(record, response.data);
    } else {
      logger.warn('Order status refresh failed', {
        orderId: state.id,
        error: describeError(response.error),
      });
    }
    return state;
  }

  get(orderId: string): OrderState | undefined {
    return this.orders.get(orderId)?.state;
  }

  list(): OrderState[] {
    return Array.from(this.orders.values(), (record) => record.state);
  }

  /**
   * Number of audit events the sink failed to record
   */
  get auditFailures(): number {
    return this.audit.failureCount;
  }

  // ===========================================
  // Attempt loop
  // ===========================================

  private async run(record: OrderRecord): Promise<void> {
    const { state } = record;
    let lastError: ExchangeError | null = null;

    try {
      const payload = buildPayload(this.executableIntent(state));

      for (let sequence = 1; sequence <= this.retryPolicy.maxAttempts; sequence++) {
        if (record.cancelRequested) {
          this.changeStatus(record, 'CANCELLED', 'Cancelled before submission');
          return;
        }

        if (state.status === 'PENDING') {
          this.changeStatus(record, 'SUBMITTED');
        }

        const token = uuidv4();
        const response = await this.client.placeOrder(payload, token);

        if (response.success) {
          this.recordAttempt(record, {
            sequence,
            token,
            payload,
            outcome: 'ACKNOWLEDGED',
            response: response.data,
            timestamp: response.timestamp,
          });
          this.applySnapshot(record, response.data);
          return;
        }

        const error = response.error;
        lastError = error;
        this.recordAttempt(record, {
          sequence,
          token,
          payload,
          outcome: 'ERROR',
          error,
          timestamp: response.timestamp,
        });

        if (!error.retriable) {
          this.changeStatus(record, 'REJECTED', describeError(error));
          return;
        }

        if (error.ambiguous) {
          const outcome = await this.reconcile(record, token, sequence);
          if (outcome.result === 'found') {
            return;
          }
          // Without a definite "unknown order" a new placement could duplicate the order
          if (outcome.result === 'unresolved') {
            this.changeStatus(
              record,
              'FAILED',
              `Outcome unknown after ${outcome.lookups} ${outcome.lookups === 1 ? 'lookup' : 'lookups'}: ${describeError(outcome.error)}`
            );
            return;
          }
        }

        if (this.retryPolicy.shouldRetry(error, sequence) && !record.cancelRequested) {
          const delayMs = this.retryPolicy.delayFor(sequence);
          logger.warn(`Order attempt failed, attempt ${sequence}/${this.retryPolicy.maxAttempts}`, {
            orderId: state.id,
            error: describeError(error),
            retryInMs: delayMs,
          });
          await this.sleep(record, delayMs);
        }
      }

      if (record.cancelRequested) {
        this.changeStatus(record, 'CANCELLED', 'Cancelled during retries');
        return;
      }

      const reason = lastError
        ? `Gave up after ${this.retryPolicy.maxAttempts} attempts: ${describeError(lastError)}`
        : 'No attempts made';
      this.changeStatus(record, 'FAILED', reason);
    } catch (error) {
      this.failInternal(record, error);
    }
  }

  /**
   * After an ambiguous failure, look the order up by the attempt's token.
   * Lookups that fail are retried on the backoff schedule; only an
   * UNKNOWN_ORDER answer lets the caller place the order again.
   */
  private async reconcile(
    record: OrderRecord,
    token: string,
    sequence: number
  ): Promise<ReconcileOutcome> {
    const { state } = record;

    for (let lookup = 1; ; lookup++) {
      const response = await this.client.getOrderStatus({
        symbol: state.intent.symbol,
        clientOrderId: token,
      });

      if (response.success) {
        logger.info('Ambiguous attempt found on exchange', {
          orderId: state.id,
          token,
          exchangeOrderId: response.data.orderId,
          status: response.data.status,
        });

        this.audit.record({
          type: 'RECONCILED',
          ...this.auditBase(state),
          sequence,
          token,
          exchangeOrderId: response.data.orderId,
          exchangeStatus: response.data.status,
        });

        this.applySnapshot(record, response.data);
        return { result: 'found' };
      }

      const error = response.error;
      if (error.kind === 'UNKNOWN_ORDER') {
        return { result: 'absent' };
      }

      if (!error.retriable || lookup >= this.retryPolicy.maxAttempts) {
        logger.error('Could not determine outcome of ambiguous attempt', {
          orderId: state.id,
          token,
          lookups: lookup,
          error: describeError(error),
        });
        return { result: 'unresolved', error, lookups: lookup };
      }

      const delayMs = this.retryPolicy.delayFor(lookup);
      logger.warn(`Order lookup failed, lookup ${lookup}/${this.retryPolicy.maxAttempts}`, {
        orderId: state.id,
        token,
        error: describeError(error),
        retryInMs: delayMs,
      });
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }

  // ===========================================
  // State mutation
  // ===========================================

  private recordAttempt(record: OrderRecord, attempt: OrderAttempt): void {
    const { state } = record;

    if (attempt.sequence !== state.attempts.length + 1) {
      throw new InternalError('Attempt sequence out of order', {
        orderId: state.id,
        expected: state.attempts.length + 1,
        actual: attempt.sequence,
      });
    }

    state.attempts.push(Object.freeze(attempt));
    state.updatedAt = Date.now();

    this.audit.record({
      type: 'ATTEMPT',
      ...this.auditBase(state),
      sequence: attempt.sequence,
      token: attempt.token,
      payloadDigest: payloadDigest(attempt.payload),
      outcome: attempt.outcome,
      ...(attempt.response && {
        exchangeOrderId: attempt.response.orderId,
        exchangeStatus: attempt.response.status,
      }),
      ...(attempt.error && {
        errorKind: attempt.error.kind,
        errorCode: attempt.error.code,
      }),
    });

    this.emit('attemptRecorded', state, attempt);
  }

  /**
   * Record a snapshot's fill and move to the status it implies.
   * Returns the resulting status.
   */
  private applySnapshot(record: OrderRecord, snapshot: OrderSnapshot): OrderStatus {
    const { state } = record;

    // Executed quantity never decreases for one exchange order
    const known = record.fills.get(snapshot.orderId);
    if (known && new Decimal(snapshot.executedQty).lt(known.executedQty)) {
      logger.debug('Ignoring stale order snapshot', {
        orderId: state.id,
        exchangeOrderId: snapshot.orderId,
        executedQty: snapshot.executedQty,
        known: known.executedQty,
      });
      return state.status;
    }

    record.fills.set(snapshot.orderId, {
      executedQty: snapshot.executedQty,
      avgPrice: snapshot.avgPrice,
    });

    const previousFilled = state.filledQuantity;
    state.exchangeOrderId = snapshot.orderId;
    state.filledQuantity = sumDecimals(
      Array.from(record.fills.values(), (fill) => fill.executedQty)
    );
    if (new Decimal(snapshot.executedQty).gt(0)) {
      state.averagePrice = snapshot.avgPrice;
    }

    const next = mapExchangeStatus(snapshot);
    if (next !== state.status) {
      if (canTransition(state.status, next)) {
        this.changeStatus(record, next, describeSnapshot(snapshot));
        return state.status;
      }
      logger.debug('Ignoring stale status update', {
        orderId: state.id,
        status: state.status,
        reported: snapshot.status,
      });
    }

    if (state.filledQuantity !== previousFilled) {
      state.updatedAt = Date.now();
      this.emit('fillUpdated', state);
    }
    return state.status;
  }

  private changeStatus(record: OrderRecord, to: OrderStatus, reason?: string): void {
    const { state } = record;
    const from = transition(state, to, reason);
    this.afterTransition(state, from);
  }

  private afterTransition(state: MutableOrderState, from: OrderStatus): void {
    this.audit.record({
      type: 'TRANSITION',
      ...this.auditBase(state),
      from,
      to: state.status,
      filledQuantity: state.filledQuantity,
      ...(state.reason !== undefined && { reason: state.reason }),
    });

    const meta = {
      orderId: state.id,
      symbol: state.intent.symbol,
      from,
      to: state.status,
      filledQuantity: state.filledQuantity,
      reason: state.reason,
    };
    if (state.status === 'FAILED' || state.status === 'REJECTED') {
      logger.warn('Order state changed', meta);
    } else {
      logger.info('Order state changed', meta);
    }

    this.emit('orderUpdated', state, from);
  }

  /**
   * INTERNAL_ERROR: fatal to this order, logged with full context, never rethrown
   */
  private failInternal(record: OrderRecord, error: unknown): void {
    const { state } = record;
    const normalizedError = toError(error);

    logger.error('Internal error while executing order', {
      orderId: state.id,
      symbol: state.intent.symbol,
      status: state.status,
      attempts: state.attempts.length,
      error: normalizedError.message,
      context: normalizedError instanceof InternalError ? normalizedError.context : undefined,
      stack: normalizedError.stack,
    });

    if (!isTerminal(state.status)) {
      const from = state.status;
      state.status = 'FAILED';
      state.reason = `Internal error: ${normalizedError.message}`;
      state.updatedAt = Date.now();
      this.afterTransition(state, from);
    }

    this.emit('error', normalizedError);
  }

  // ===========================================
  // Helpers
  // ===========================================

  private getRecord(orderId: string): OrderRecord {
    const record = this.orders.get(orderId);
    if (!record) {
      throw new InternalError(`Unknown order: ${orderId}`, { orderId });
    }
    return record;
  }

  private executableIntent(state: MutableOrderState): ExecutableIntent {
    const { intent } = state;
    if (intent.type === 'TWAP') {
      throw new InternalError('TWAP intents are executed by the TWAP scheduler', {
        orderId: state.id,
      });
    }
    return intent;
  }

  private notCancellable(state: OrderState): CancelResult {
    return {
      success: false,
      state,
      error: new OrderNotCancellableError(state.id, state.status),
    };
  }

  private auditBase(state: MutableOrderState): {
    symbol: string;
    orderId: string;
    parentId?: string;
    timestamp: string;
  } {
    return {
      symbol: state.intent.symbol,
      orderId: state.id,
      ...(state.parentId !== undefined && { parentId: state.parentId }),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Backoff wait that cancel() can cut short
   */
  private sleep(record: OrderRecord, ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        record.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      record.wake = done;
    });
  }
}
