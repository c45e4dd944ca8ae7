/**
 * TWAP Scheduler
 *
 * Splits a TWAP parent into MARKET child orders dispatched through the
 * Execution Engine, one every `intervalSeconds` starting at t=0, and folds
 * the children's fills back into the parent.
 *
 * Dispatch is timer-driven and never waits for earlier children.
 */

import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import { logger } from '../logger.js';
import { OrderNotCancellableError, InternalError, toError } from '../errors.js';
import { SafeAuditLog } from '../audit/SafeAuditLog.js';
import { createOrderState } from '../orders/orderState.js';
import { splitQuantity, sumDecimals } from '../orders/quantity.js';
import { canTransition, isTerminal, transition } from '../orders/transitions.js';
import type { AuditLog } from '../audit/types.js';
import type { ExecutionEngine } from '../execution/ExecutionEngine.js';
import type {
  MarketIntent,
  MutableOrderState,
  OrderState,
  OrderStatus,
  TwapIntent,
} from '../orders/types.js';
import type { TwapEvents, TwapSchedulerConfig } from './types.js';

interface TwapRun {
  parent: MutableOrderState;
  intent: TwapIntent;
  /** Slice quantities; entries from nextIndex on may still be resliced */
  plan: string[];
  nextIndex: number;
  /** Children whose attempt loop has not finished */
  inFlight: number;
  timer: NodeJS.Timeout | null;
  stopped: boolean;
  cancelRequested: boolean;
  cancelling: boolean;
  failure: string | null;
  /** Failed children whose quantity went back into the plan */
  resliced: Set<string>;
  handledFailures: Set<string>;
  finished: boolean;
  done: Promise<OrderState>;
  resolve: (state: OrderState) => void;
}

interface Outcome {
  status: OrderStatus;
  reason?: string;
}

export class TwapScheduler extends EventEmitter<TwapEvents> {
  private readonly config: TwapSchedulerConfig;
  private readonly engine: ExecutionEngine;
  private readonly audit: SafeAuditLog;
  private readonly runs: Map<string, TwapRun> = new Map();

  constructor(config: TwapSchedulerConfig, engine: ExecutionEngine, audit: AuditLog) {
    super();
    this.config = config;
    this.engine = engine;
    this.audit = audit instanceof SafeAuditLog ? audit : new SafeAuditLog(audit);

    this.engine.on('orderUpdated', (state) => this.onChildEvent(state));
    this.engine.on('fillUpdated', (state) => this.onChildEvent(state));

    logger.info('TWAP Scheduler initialized', {
      failurePolicy: config.failurePolicy,
    });
  }

  /**
   * Begin a TWAP run. The first slice is dispatched before this returns.
   */
  start(intent: TwapIntent): OrderState {
    const parent = createOrderState(intent);

    let resolve: (state: OrderState) => void = () => undefined;
    const done = new Promise<OrderState>((resolveDone) => {
      resolve = resolveDone;
    });

    const run: TwapRun = {
      parent,
      intent,
      plan: [...intent.slices],
      nextIndex: 0,
      inFlight: 0,
      timer: null,
      stopped: false,
      cancelRequested: false,
      cancelling: false,
      failure: null,
      resliced: new Set(),
      handledFailures: new Set(),
      finished: false,
      done,
      resolve,
    };
    this.runs.set(parent.id, run);

    logger.info('TWAP started', {
      parentId: parent.id,
      symbol: intent.symbol,
      side: intent.side,
      quantity: intent.quantity,
      slices: intent.sliceCount,
      intervalSeconds: intent.intervalSeconds,
    });

    this.dispatchNext(run);
    return parent;
  }

  /**
   * Stop dispatching, cancel un-started and open children.
   * Filled children are left as they are.
   */
  async cancel(parentId: string): Promise<OrderState> {
    const run = this.getRun(parentId);
    const { parent } = run;

    if (isTerminal(parent.status)) {
      return parent;
    }

    logger.info('Cancelling TWAP', {
      parentId,
      dispatched: run.nextIndex,
      slices: run.plan.length,
    });

    run.cancelRequested = true;
    run.cancelling = true;
    this.stop(run);

    try {
      await this.abandonRemaining(run);

      const open = parent.children.filter(
        (child) => child.status === 'PENDING' || child.status === 'SUBMITTED'
      );
      const results = await Promise.all(open.map((child) => this.engine.cancel(child)));

      for (const result of results) {
        if (result.success) continue;
        const meta = { parentId, orderId: result.state.id, error: result.error.message };
        if (result.error instanceof OrderNotCancellableError) {
          logger.debug('TWAP child already settled', meta);
        } else {
          logger.warn('TWAP child cancel failed', meta);
        }
      }
    } finally {
      run.cancelling = false;
    }

    this.evaluate(run);
    return run.done;
  }

  /**
   * Resolves once every slice is dispatched and every child's attempt loop is done
   */
  completion(parentId: string): Promise<OrderState> {
    return this.getRun(parentId).done;
  }

  get(parentId: string): OrderState | undefined {
    return this.runs.get(parentId)?.parent;
  }

  /**
   * Parents that are not yet terminal
   */
  active(): OrderState[] {
    return Array.from(this.runs.values(), (run) => run.parent).filter(
      (parent) => !isTerminal(parent.status)
    );
  }

  // ===========================================
  // Dispatch
  // ===========================================

  private dispatchNext(run: TwapRun): void {
    run.timer = null;
    if (run.stopped || run.nextIndex >= run.plan.length) return;

    const index = run.nextIndex;
    const child = this.prepareChild(run, run.plan[index]);
    run.nextIndex++;

    if (run.parent.status === 'PENDING') {
      this.changeParentStatus(run, 'SUBMITTED');
    }

    logger.info(`TWAP slice ${index + 1}/${run.plan.length} dispatched`, {
      parentId: run.parent.id,
      orderId: child.id,
      quantity: child.intent.quantity,
    });

    run.inFlight++;
    this.engine.dispatch(child);
    this.emit('sliceDispatched', run.parent, child, index);

    this.engine
      .completion(child)
      .then(() => {
        run.inFlight--;
        this.evaluate(run);
      })
      .catch((error: unknown) => this.emit('error', toError(error)));

    if (run.nextIndex < run.plan.length) {
      run.timer = setTimeout(() => this.dispatchNext(run), run.intent.intervalSeconds * 1000);
    }
  }

  private prepareChild(run: TwapRun, quantity: string): OrderState {
    const { intent } = run;
    const childIntent: MarketIntent = {
      type: 'MARKET',
      symbol: intent.symbol,
      side: intent.side,
      quantity,
      reduceOnly: intent.reduceOnly,
    };

    const child = this.engine.prepare(childIntent, run.parent.id);
    run.parent.children.push(child);
    return child;
  }

  /**
   * Give every slice not yet dispatched a child state and cancel it
   * before it reaches the exchange
   */
  private async abandonRemaining(run: TwapRun): Promise<void> {
    const pending: OrderState[] = [];
    while (run.nextIndex < run.plan.length) {
      pending.push(this.prepareChild(run, run.plan[run.nextIndex]));
      run.nextIndex++;
    }

    if (pending.length > 0) {
      logger.info('TWAP slices not started', {
        parentId: run.parent.id,
        count: pending.length,
      });
    }

    await Promise.all(pending.map((child) => this.engine.cancel(child)));
  }

  private stop(run: TwapRun): void {
    run.stopped = true;
    if (run.timer) {
      clearTimeout(run.timer);
      run.timer = null;
    }
  }

  // ===========================================
  // Child updates
  // ===========================================

  private onChildEvent(child: OrderState): void {
    if (child.parentId === undefined) return;
    const run = this.runs.get(child.parentId);
    if (!run) return;

    try {
      this.updateParentFill(run);

      const failed = child.status === 'FAILED' || child.status === 'REJECTED';
      if (failed && !run.handledFailures.has(child.id)) {
        run.handledFailures.add(child.id);
        this.handleSliceFailure(run, child);
      }

      this.evaluate(run);
    } catch (error) {
      const normalizedError = toError(error);
      logger.error('TWAP update failed', {
        parentId: run.parent.id,
        orderId: child.id,
        error: normalizedError.message,
        context: normalizedError instanceof InternalError ? normalizedError.context : undefined,
      });
      this.emit('error', normalizedError);
    }
  }

  private handleSliceFailure(run: TwapRun, child: OrderState): void {
    const index = run.parent.children.indexOf(child);
    const label =
      `Slice ${index + 1}/${run.plan.length} ${child.status}` +
      (child.reason ? `: ${child.reason}` : '');

    logger.warn('TWAP slice failed', {
      parentId: run.parent.id,
      orderId: child.id,
      status: child.status,
      reason: child.reason,
      policy: this.config.failurePolicy,
    });

    switch (this.config.failurePolicy) {
      case 'halt':
        this.recordFailure(run, label);
        if (!run.stopped) {
          this.stop(run);
          this.abandonRemaining(run).catch((error: unknown) =>
            this.emit('error', toError(error))
          );
        }
        return;

      case 'continue':
        this.recordFailure(run, label);
        return;

      case 'reslice': {
        const problem = this.reslice(run, child);
        if (problem) {
          this.recordFailure(run, `${label} (${problem})`);
        }
        return;
      }
    }
  }

  /**
   * Spread a failed child's unfilled quantity over the slices not yet dispatched.
   * Slices only grow, so the symbol minimums still hold; the maximum may not.
   * Returns why the plan was left unchanged, or null once resliced.
   */
  private reslice(run: TwapRun, child: OrderState): string | null {
    const remaining = run.plan.length - run.nextIndex;
    if (remaining === 0 || run.stopped) return 'no slices left to reslice';

    const unfilled = new Decimal(child.intent.quantity).minus(child.filledQuantity);
    const pool = unfilled.plus(sumDecimals(run.plan.slice(run.nextIndex)));
    const slices = splitQuantity(pool, remaining, run.intent.stepSize).map((slice) =>
      slice.toFixed()
    );

    const oversized = slices.find((slice) => new Decimal(slice).gt(run.intent.maxQty));
    if (oversized !== undefined) {
      return `resliced quantity ${oversized} exceeds symbol maximum ${run.intent.maxQty}`;
    }

    run.plan.splice(run.nextIndex, remaining, ...slices);
    run.resliced.add(child.id);

    logger.info('TWAP resliced', {
      parentId: run.parent.id,
      failedOrderId: child.id,
      remainingSlices: slices,
    });
    this.emit('resliced', run.parent, [...run.plan]);
    return null;
  }

  private recordFailure(run: TwapRun, reason: string): void {
    if (run.failure === null) {
      run.failure = reason;
    }
  }

  private updateParentFill(run: TwapRun): void {
    const { parent } = run;
    const filled = sumDecimals(parent.children.map((child) => child.filledQuantity));
    if (filled === parent.filledQuantity) return;

    parent.filledQuantity = filled;
    parent.updatedAt = Date.now();

    // Quantity-weighted average of the children's fill prices
    const notional = parent.children.reduce(
      (acc, child) =>
        child.averagePrice === undefined
          ? acc
          : acc.plus(new Decimal(child.filledQuantity).mul(child.averagePrice)),
      new Decimal(0)
    );
    const filledDecimal = new Decimal(filled);
    if (filledDecimal.gt(0)) {
      parent.averagePrice = notional.div(filledDecimal).toDecimalPlaces(8).toFixed();
    }
  }

  // ===========================================
  // Parent outcome
  // ===========================================

  /**
   * Settle the parent once every slice has a child and no attempt loop is running
   */
  private evaluate(run: TwapRun): void {
    const { parent } = run;
    if (run.cancelling || run.inFlight > 0 || parent.children.length < run.plan.length) {
      return;
    }

    const outcome = this.outcome(run);
    if (outcome.status !== parent.status && canTransition(parent.status, outcome.status)) {
      this.changeParentStatus(run, outcome.status, outcome.reason);
    }

    if (!run.finished) {
      run.finished = true;
      this.stop(run);
      logger.info('TWAP finished', {
        parentId: parent.id,
        status: parent.status,
        filledQuantity: parent.filledQuantity,
        quantity: run.intent.quantity,
      });
      run.resolve(parent);
    }
  }

  private outcome(run: TwapRun): Outcome {
    const { parent } = run;
    const counted = parent.children.filter((child) => !run.resliced.has(child.id));

    if (run.failure !== null) {
      return { status: 'FAILED', reason: run.failure };
    }
    if (run.cancelRequested) {
      return { status: 'CANCELLED', reason: 'TWAP cancelled' };
    }
    if (counted.every((child) => child.status === 'FILLED')) {
      return { status: 'FILLED' };
    }
    if (counted.some((child) => child.status === 'PENDING' || child.status === 'SUBMITTED')) {
      return { status: 'SUBMITTED' };
    }
    if (new Decimal(parent.filledQuantity).gt(0)) {
      return {
        status: 'PARTIALLY_FILLED',
        reason: `Filled ${parent.filledQuantity} of ${run.intent.quantity}`,
      };
    }
    return { status: 'FAILED', reason: 'No slice filled' };
  }

  private changeParentStatus(run: TwapRun, to: OrderStatus, reason?: string): void {
    const { parent } = run;
    const from = transition(parent, to, reason);

    this.audit.record({
      type: 'TRANSITION',
      symbol: parent.intent.symbol,
      orderId: parent.id,
      timestamp: new Date().toISOString(),
      from,
      to,
      filledQuantity: parent.filledQuantity,
      ...(parent.reason !== undefined && { reason: parent.reason }),
    });

    const meta = {
      parentId: parent.id,
      symbol: parent.intent.symbol,
      from,
      to,
      filledQuantity: parent.filledQuantity,
      reason: parent.reason,
    };
    if (to === 'FAILED') {
      logger.warn('TWAP state changed', meta);
    } else {
      logger.info('TWAP state changed', meta);
    }

    this.emit('parentUpdated', parent, from);
  }

  private getRun(parentId: string): TwapRun {
    const run = this.runs.get(parentId);
    if (!run) {
      throw new InternalError(`Unknown TWAP parent: ${parentId}`, { parentId });
    }
    return run;
  }
}
