/**
 * Binance Futures Client
 *
 * ExchangeClient implementation over the USD-M futures REST API.
 * Authentication and signing are handled by the `binance` library;
 * every call returns a typed ExchangeResponse instead of throwing.
 */

import { USDMClient } from 'binance';
import { logger, maskSecret } from '../logger.js';
import { classifyError } from './errorClassifier.js';
import type { SymbolRules } from '../orders/types.js';
import type {
  BinanceClientConfig,
  ExchangeClient,
  ExchangeError,
  ExchangeOrderStatus,
  ExchangeResponse,
  OrderPayload,
  OrderRef,
  OrderSnapshot,
} from './types.js';

const ORDER_STATUSES: readonly ExchangeOrderStatus[] = [
  'NEW',
  'PARTIALLY_FILLED',
  'FILLED',
  'CANCELED',
  'REJECTED',
  'EXPIRED',
  'EXPIRED_IN_MATCH',
  'NEW_INSURANCE',
  'NEW_ADL',
];

/**
 * Fields read from order responses (new order, cancel, query)
 */
interface RawOrder {
  orderId: number | string;
  clientOrderId: string;
  symbol: string;
  status: string;
  executedQty: number | string;
  avgPrice?: number | string;
  updateTime?: number;
}

/** Rules used when the exchange omits a filter */
const DEFAULT_RULES = {
  stepSize: '0.001',
  minQty: '0.001',
  maxQty: '1000',
  tickSize: '0.1',
  minNotional: '5',
};

export class BinanceFuturesClient implements ExchangeClient {
  private client: USDMClient;
  private symbolRulesCache: Map<string, SymbolRules> = new Map();

  /** Whether using testnet */
  public readonly isTestnet: boolean;

  constructor(config: BinanceClientConfig) {
    this.isTestnet = config.testnet;
    this.client = new USDMClient(
      {
        api_key: config.apiKey,
        api_secret: config.apiSecret,
        recvWindow: config.recvWindow,
        // Raw axios errors keep the HTTP status the classifier needs
        parseExceptions: false,
      },
      { timeout: config.requestTimeoutMs },
      config.testnet
    );

    logger.info('Binance Futures Client initialized', {
      testnet: config.testnet,
      apiKey: maskSecret(config.apiKey),
    });
  }

  /**
   * Submit new order. RESULT response type makes MARKET orders report their fill.
   */
  async placeOrder(
    payload: OrderPayload,
    token: string
  ): Promise<ExchangeResponse<OrderSnapshot>> {
    logger.info('API Request - POST /fapi/v1/order', {
      symbol: payload.symbol,
      side: payload.side,
      type: payload.type,
      quantity: payload.quantity,
      clientOrderId: token,
    });

    try {
      const result = await this.client.submitNewOrder({
        symbol: payload.symbol,
        side: payload.side,
        type: payload.type,
        quantity: Number(payload.quantity),
        ...(payload.price !== undefined && { price: Number(payload.price) }),
        ...(payload.stopPrice !== undefined && { stopPrice: Number(payload.stopPrice) }),
        ...(payload.timeInForce !== undefined && { timeInForce: payload.timeInForce }),
        ...(payload.reduceOnly && { reduceOnly: 'true' as const }),
        newClientOrderId: token,
        newOrderRespType: 'RESULT',
      });

      const snapshot = this.toSnapshot(result);
      logger.info('API Response - /fapi/v1/order', {
        orderId: snapshot.orderId,
        status: snapshot.status,
        executedQty: snapshot.executedQty,
        avgPrice: snapshot.avgPrice,
      });
      return this.ok(snapshot);
    } catch (error) {
      return this.fail('Order placement failed', error, {
        symbol: payload.symbol,
        side: payload.side,
        clientOrderId: token,
      });
    }
  }

  /**
   * Cancel one order by exchange or client id
   */
  async cancelOrder(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>> {
    try {
      const result = await this.client.cancelOrder(this.toOrderParams(ref));
      logger.info('Order cancelled', { symbol: ref.symbol, orderId: result.orderId });
      return this.ok(this.toSnapshot(result));
    } catch (error) {
      return this.fail('Failed to cancel order', error, { ...ref });
    }
  }

  /**
   * Query one order by exchange or client id
   */
  async getOrderStatus(ref: OrderRef): Promise<ExchangeResponse<OrderSnapshot>> {
    try {
      const result = await this.client.getOrder(this.toOrderParams(ref));
      return this.ok(this.toSnapshot(result));
    } catch (error) {
      return this.fail('Failed to get order status', error, { ...ref });
    }
  }

  /**
   * Get symbol trading rules (step size, min/max qty, tick size, min notional)
   */
  async getSymbolRules(symbol: string): Promise<ExchangeResponse<SymbolRules>> {
    // Check cache first
    const cached = this.symbolRulesCache.get(symbol);
    if (cached) {
      return this.ok(cached);
    }

    try {
      const exchangeInfo = await this.client.getExchangeInfo();
      const symbolData = exchangeInfo.symbols.find((s) => s.symbol === symbol);

      if (!symbolData) {
        return {
          success: false,
          error: {
            kind: 'UNKNOWN_SYMBOL',
            message: `Symbol not found: ${symbol}`,
            retriable: false,
            ambiguous: false,
          },
          timestamp: Date.now(),
        };
      }

      const filters = symbolData.filters.map((filter) => new Map<string, unknown>(Object.entries(filter)));
      const lotSize = filters.find((f) => f.get('filterType') === 'LOT_SIZE');
      const priceFilter = filters.find((f) => f.get('filterType') === 'PRICE_FILTER');
      const minNotional = filters.find((f) => f.get('filterType') === 'MIN_NOTIONAL');

      const rules: SymbolRules = {
        symbol,
        stepSize: readDecimal(lotSize, 'stepSize') ?? DEFAULT_RULES.stepSize,
        minQty: readDecimal(lotSize, 'minQty') ?? DEFAULT_RULES.minQty,
        maxQty: readDecimal(lotSize, 'maxQty') ?? DEFAULT_RULES.maxQty,
        tickSize: readDecimal(priceFilter, 'tickSize') ?? DEFAULT_RULES.tickSize,
        minNotional: readDecimal(minNotional, 'notional') ?? DEFAULT_RULES.minNotional,
      };

      // Cache the result
      this.symbolRulesCache.set(symbol, rules);

      return this.ok(rules);
    } catch (error) {
      return this.fail('Failed to get symbol rules', error, { symbol });
    }
  }

  /**
   * Get current mark price for symbol
   */
  async getMarkPrice(symbol: string): Promise<ExchangeResponse<string>> {
    try {
      const prices = await this.client.getMarkPrice({ symbol });

      // API returns array for multiple symbols, single object for one symbol
      const priceData = Array.isArray(prices)
        ? prices.find((p) => p.symbol === symbol)
        : prices;

      if (!priceData) {
        return {
          success: false,
          error: {
            kind: 'UNKNOWN_SYMBOL',
            message: `Mark price not found for symbol: ${symbol}`,
            retriable: false,
            ambiguous: false,
          },
          timestamp: Date.now(),
        };
      }

      return this.ok(String(priceData.markPrice));
    } catch (error) {
      return this.fail('Failed to get mark price', error, { symbol });
    }
  }

  private toOrderParams(ref: OrderRef): {
    symbol: string;
    orderId?: number;
    origClientOrderId?: string;
  } {
    if (ref.orderId !== undefined) {
      return { symbol: ref.symbol, orderId: Number(ref.orderId) };
    }
    return { symbol: ref.symbol, origClientOrderId: ref.clientOrderId };
  }

  private toSnapshot(raw: RawOrder): OrderSnapshot {
    const status = ORDER_STATUSES.find((s) => s === raw.status);
    if (!status) {
      throw new Error(`Unrecognized order status from exchange: ${raw.status}`);
    }

    return {
      orderId: String(raw.orderId),
      clientOrderId: raw.clientOrderId,
      symbol: raw.symbol,
      status,
      executedQty: String(raw.executedQty),
      avgPrice: raw.avgPrice !== undefined ? String(raw.avgPrice) : '0',
      updateTime: raw.updateTime ?? Date.now(),
    };
  }

  private ok<T>(data: T): ExchangeResponse<T> {
    return { success: true, data, timestamp: Date.now() };
  }

  private fail<T>(
    message: string,
    error: unknown,
    context: Record<string, unknown>
  ): ExchangeResponse<T> {
    const exchangeError: ExchangeError = classifyError(error);
    logger.error(message, {
      ...context,
      kind: exchangeError.kind,
      code: exchangeError.code,
      error: exchangeError.message,
    });
    return { success: false, error: exchangeError, timestamp: Date.now() };
  }
}

function readDecimal(filter: Map<string, unknown> | undefined, key: string): string | undefined {
  const value = filter?.get(key);
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  return undefined;
}
