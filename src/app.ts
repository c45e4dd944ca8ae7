/**
 * Application
 *
 * Wires the modules together for one CLI invocation or library caller:
 * Intent → Order Validator → Execution Engine / TWAP Scheduler → Audit Log
 */

import { logger, maskSecret } from './logger.js';
import { ExchangeRequestError, ValidationError, toError } from './errors.js';
import { BinanceFuturesClient } from './exchange/index.js';
import { ExecutionEngine, OrderTracker } from './execution/index.js';
import { TwapScheduler } from './twap/index.js';
import { FileAuditLog, SafeAuditLog } from './audit/index.js';
import { OrderValidator, validateSymbol } from './orders/index.js';
import type { AppConfig } from './config.js';
import type { AuditLog } from './audit/index.js';
import type { ExchangeClient } from './exchange/index.js';
import type {
  ExecutableIntent,
  OrderIntentInput,
  OrderState,
  TwapIntent,
  ValidatedIntent,
} from './orders/index.js';

/**
 * Collaborators that replace the defaults, used by tests and embedders
 */
export interface AppDependencies {
  client?: ExchangeClient;
  audit?: AuditLog;
}

export interface ExecuteOptions {
  /** Poll a resting LIMIT / STOP_LIMIT order for up to this many seconds */
  waitSeconds?: number;
}

export class App {
  private readonly client: ExchangeClient;
  private readonly audit: SafeAuditLog;
  private readonly fileAudit: FileAuditLog | null = null;
  private readonly validator: OrderValidator;
  private readonly engine: ExecutionEngine;
  private readonly tracker: OrderTracker;
  private readonly scheduler: TwapScheduler;
  private isClosed = false;

  constructor(config: AppConfig, dependencies: AppDependencies = {}) {
    this.client =
      dependencies.client ??
      new BinanceFuturesClient({
        apiKey: config.binance.apiKey,
        apiSecret: config.binance.apiSecret,
        testnet: config.binance.testnet,
        requestTimeoutMs: config.binance.requestTimeoutMs,
        recvWindow: config.binance.recvWindow,
      });

    if (dependencies.audit) {
      this.audit = new SafeAuditLog(dependencies.audit);
    } else {
      this.fileAudit = new FileAuditLog(config.audit.file);
      this.audit = new SafeAuditLog(this.fileAudit);
    }

    this.validator = new OrderValidator({
      maxSlices: config.twap.maxSlices,
      maxIntervalSeconds: config.twap.maxIntervalSeconds,
    });

    this.engine = new ExecutionEngine(config.execution, this.client, this.audit);
    this.tracker = new OrderTracker(config.tracking, this.engine);
    this.scheduler = new TwapScheduler(
      { failurePolicy: config.twap.failurePolicy },
      this.engine,
      this.audit
    );

    this.setupErrorHandlers();

    logger.info('Application initialized', {
      testnet: config.binance.testnet,
      apiKey: maskSecret(config.binance.apiKey),
      auditFile: this.fileAudit ? config.audit.file : undefined,
    });
  }

  private setupErrorHandlers(): void {
    this.engine.on('error', (error) => {
      logger.error('Execution Engine error', { error: error.message });
    });

    this.tracker.on('error', (error) => {
      logger.error('Order Tracker error', { error: error.message });
    });

    this.scheduler.on('error', (error) => {
      logger.error('TWAP Scheduler error', { error: error.message });
    });
  }

  /**
   * Validate an intent against the exchange's rules for its symbol.
   * Throws ValidationError, or ExchangeRequestError when the rules cannot be read.
   */
  async validate(input: OrderIntentInput): Promise<ValidatedIntent> {
    const symbolError = validateSymbol(input.symbol);
    if (symbolError) throw symbolError;

    const rules = await this.client.getSymbolRules(input.symbol);
    if (!rules.success) {
      if (rules.error.kind === 'UNKNOWN_SYMBOL') {
        throw new ValidationError(
          'BAD_SYMBOL',
          'symbol',
          `Symbol ${input.symbol} is not traded on this exchange`
        );
      }
      throw new ExchangeRequestError('Symbol rules lookup', rules.error);
    }

    let referencePrice: string | undefined;
    if (input.type === 'MARKET' || input.type === 'TWAP') {
      const mark = await this.client.getMarkPrice(input.symbol);
      if (mark.success) {
        referencePrice = mark.data;
      } else {
        logger.warn('Mark price unavailable, skipping minimum notional check', {
          symbol: input.symbol,
          error: mark.error.message,
        });
      }
    }

    const result = this.validator.validate(input, rules.data, referencePrice);
    if (!result.valid) {
      throw result.error;
    }
    return result.intent;
  }

  /**
   * Validate and execute one intent, resolving with its state once the
   * attempt loop (or, for TWAP, the whole schedule) is done
   */
  async execute(input: OrderIntentInput, options: ExecuteOptions = {}): Promise<OrderState> {
    const intent = await this.validate(input);

    if (intent.type === 'TWAP') {
      return this.executeTwap(intent);
    }
    return this.executeOrder(intent, options);
  }

  private async executeOrder(
    intent: ExecutableIntent,
    options: ExecuteOptions
  ): Promise<OrderState> {
    const order = this.engine.submit(intent);
    const state = await this.engine.completion(order);

    const resting = state.status === 'SUBMITTED' || state.status === 'PARTIALLY_FILLED';
    if (resting && options.waitSeconds !== undefined && options.waitSeconds > 0) {
      logger.info('Waiting for resting order', {
        orderId: state.id,
        exchangeOrderId: state.exchangeOrderId,
        waitSeconds: options.waitSeconds,
      });
      return this.tracker.waitForSettlement(state, options.waitSeconds * 1000);
    }
    return state;
  }

  private executeTwap(intent: TwapIntent): Promise<OrderState> {
    const parent = this.scheduler.start(intent);
    return this.scheduler.completion(parent.id);
  }

  /**
   * Cancel every TWAP still running. Children already filled stay filled.
   */
  async cancelActive(): Promise<OrderState[]> {
    const active = this.scheduler.active();
    if (active.length > 0) {
      logger.info('Cancelling active TWAP runs', { count: active.length });
    }
    return Promise.all(active.map((parent) => this.scheduler.cancel(parent.id)));
  }

  /**
   * Number of audit events that could not be written
   */
  get auditFailures(): number {
    return this.audit.failureCount;
  }

  /**
   * Stop polling and flush the audit file
   */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    this.tracker.stop();

    if (this.audit.failureCount > 0) {
      logger.warn('Some audit events were not recorded', {
        failures: this.audit.failureCount,
      });
    }

    if (this.fileAudit) {
      try {
        await this.fileAudit.close();
      } catch (error) {
        logger.error('Failed to close audit log', { error: toError(error).message });
      }
    }

    logger.debug('Application closed');
  }
}
