/**
 * Order Validator
 *
 * Pre-submission validation of order intents against the symbol's
 * trading rules. Rules run in a fixed order and the first failure wins.
 * No side effects: nothing here touches the exchange or the logger.
 */

import Decimal from 'decimal.js';
import { ValidationError } from '../errors.js';
import { isStepMultiple, parseDecimal, splitQuantity, truncateToStep } from './quantity.js';
import type {
  DecimalInput,
  OrderIntentInput,
  OrderSide,
  SymbolRules,
  TimeInForce,
  ValidatedIntent,
  ValidationOptions,
} from './types.js';

export type ValidationResult =
  | { valid: true; intent: ValidatedIntent }
  | { valid: false; error: ValidationError };

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;
const DEFAULT_TIME_IN_FORCE: TimeInForce = 'GTC';

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  maxSlices: 50,
  maxIntervalSeconds: 300,
};

/**
 * Check symbol format alone (rule 1), before the symbol's rules are fetched
 */
export function validateSymbol(symbol: string): ValidationError | null {
  if (!symbol || !SYMBOL_PATTERN.test(symbol)) {
    return new ValidationError(
      'BAD_SYMBOL',
      'symbol',
      `Invalid symbol: '${symbol}'. Expected uppercase alphanumeric like 'BTCUSDT'`
    );
  }
  return null;
}

export class OrderValidator {
  private readonly options: ValidationOptions;

  constructor(options: Partial<ValidationOptions> = {}) {
    this.options = { ...DEFAULT_VALIDATION_OPTIONS, ...options };
  }

  /**
   * Validate an intent against symbol rules
   */
  validate(
    input: OrderIntentInput,
    rules: SymbolRules,
    referencePrice: DecimalInput | undefined = this.options.referencePrice
  ): ValidationResult {
    try {
      return { valid: true, intent: this.check(input, rules, referencePrice) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { valid: false, error };
      }
      throw error;
    }
  }

  private check(
    input: OrderIntentInput,
    rules: SymbolRules,
    referencePrice: DecimalInput | undefined
  ): ValidatedIntent {
    // 1. Symbol
    const symbolError = validateSymbol(input.symbol);
    if (symbolError) throw symbolError;

    // 2. Side
    const side = this.checkSide(input.side);

    // 3. Quantity
    const quantity = this.checkQuantity(input, rules);

    const base = {
      symbol: input.symbol,
      side,
      quantity: quantity.toFixed(),
      reduceOnly: input.reduceOnly ?? false,
    };

    // 4. Type-specific rules, then 5. minimum notional
    switch (input.type) {
      case 'MARKET': {
        this.checkNotional(quantity, parseDecimal(referencePrice), rules, 'BAD_QUANTITY');
        return { ...base, type: 'MARKET' };
      }

      case 'LIMIT': {
        const price = this.checkPrice(input.price, rules);
        this.checkNotional(quantity, price, rules, 'BAD_QUANTITY');
        return {
          ...base,
          type: 'LIMIT',
          price: price.toFixed(),
          timeInForce: input.timeInForce ?? DEFAULT_TIME_IN_FORCE,
        };
      }

      case 'STOP_LIMIT': {
        const price = this.checkPrice(input.price, rules);
        const stopPrice = this.checkStopPrice(input.stopPrice, price, side, rules);
        this.checkNotional(quantity, price, rules, 'BAD_QUANTITY');
        return {
          ...base,
          type: 'STOP_LIMIT',
          price: price.toFixed(),
          stopPrice: stopPrice.toFixed(),
          timeInForce: input.timeInForce ?? DEFAULT_TIME_IN_FORCE,
        };
      }

      case 'TWAP': {
        const { sliceCount, intervalSeconds } = this.checkSchedule(input);
        const slices = this.checkSlices(quantity, sliceCount, rules);
        this.checkNotional(slices[0], parseDecimal(referencePrice), rules, 'DEGENERATE_SLICE');
        return {
          ...base,
          type: 'TWAP',
          sliceCount,
          intervalSeconds,
          slices: slices.map((slice) => slice.toFixed()),
          stepSize: rules.stepSize,
          maxQty: rules.maxQty,
        };
      }
    }
  }

  private checkSide(side: string): OrderSide {
    if (side === 'BUY' || side === 'SELL') {
      return side;
    }
    throw new ValidationError(
      'BAD_SIDE',
      'side',
      `Invalid order side: '${side}'. Valid sides: BUY, SELL`
    );
  }

  private checkQuantity(input: OrderIntentInput, rules: SymbolRules): Decimal {
    const quantity = parseDecimal(input.quantity);

    if (!quantity || quantity.lte(0)) {
      throw new ValidationError(
        'BAD_QUANTITY',
        'quantity',
        `Quantity must be a positive number: '${input.quantity}'`
      );
    }

    if (!isStepMultiple(quantity, rules.stepSize)) {
      throw new ValidationError(
        'BAD_QUANTITY',
        'quantity',
        `Quantity ${quantity.toFixed()} is not a multiple of step size ${rules.stepSize}`
      );
    }

    if (quantity.lt(rules.minQty)) {
      throw new ValidationError(
        'BAD_QUANTITY',
        'quantity',
        `Quantity ${quantity.toFixed()} is below symbol minimum ${rules.minQty}`
      );
    }

    // TWAP totals may exceed maxQty; each slice is checked instead
    if (input.type !== 'TWAP' && quantity.gt(rules.maxQty)) {
      throw new ValidationError(
        'BAD_QUANTITY',
        'quantity',
        `Quantity ${quantity.toFixed()} exceeds symbol maximum ${rules.maxQty}`
      );
    }

    return quantity;
  }

  private checkPrice(value: DecimalInput | undefined, rules: SymbolRules): Decimal {
    const price = parseDecimal(value);

    if (!price || price.lte(0)) {
      throw new ValidationError(
        'MISSING_PRICE',
        'price',
        'A positive limit price is required'
      );
    }

    if (!isStepMultiple(price, rules.tickSize)) {
      throw new ValidationError(
        'BAD_PRICE',
        'price',
        `Price ${price.toFixed()} is not a multiple of tick size ${rules.tickSize}`
      );
    }

    return price;
  }

  /**
   * Trigger ordering: a BUY stop-limit must trigger below its limit price,
   * a SELL stop-limit above it.
   */
  private checkStopPrice(
    value: DecimalInput | undefined,
    price: Decimal,
    side: OrderSide,
    rules: SymbolRules
  ): Decimal {
    const stopPrice = parseDecimal(value);

    if (!stopPrice || stopPrice.lte(0)) {
      throw new ValidationError(
        'MISSING_STOP',
        'stopPrice',
        'A positive stop price is required for STOP_LIMIT orders'
      );
    }

    if (!isStepMultiple(stopPrice, rules.tickSize)) {
      throw new ValidationError(
        'BAD_PRICE',
        'stopPrice',
        `Stop price ${stopPrice.toFixed()} is not a multiple of tick size ${rules.tickSize}`
      );
    }

    if (side === 'BUY' && stopPrice.gte(price)) {
      throw new ValidationError(
        'BAD_STOP_ORDER',
        'stopPrice',
        `BUY stop price ${stopPrice.toFixed()} must be below limit price ${price.toFixed()}`
      );
    }

    if (side === 'SELL' && stopPrice.lte(price)) {
      throw new ValidationError(
        'BAD_STOP_ORDER',
        'stopPrice',
        `SELL stop price ${stopPrice.toFixed()} must be above limit price ${price.toFixed()}`
      );
    }

    return stopPrice;
  }

  private checkSchedule(input: OrderIntentInput): {
    sliceCount: number;
    intervalSeconds: number;
  } {
    const { sliceCount, intervalSeconds } = input;

    if (
      sliceCount === undefined ||
      !Number.isInteger(sliceCount) ||
      sliceCount < 1 ||
      sliceCount > this.options.maxSlices
    ) {
      throw new ValidationError(
        'BAD_SCHEDULE',
        'sliceCount',
        `Slice count must be an integer between 1 and ${this.options.maxSlices}`
      );
    }

    if (
      intervalSeconds === undefined ||
      !Number.isInteger(intervalSeconds) ||
      intervalSeconds < 0 ||
      intervalSeconds > this.options.maxIntervalSeconds
    ) {
      throw new ValidationError(
        'BAD_SCHEDULE',
        'intervalSeconds',
        `Interval must be an integer between 0 and ${this.options.maxIntervalSeconds} seconds`
      );
    }

    return { sliceCount, intervalSeconds };
  }

  private checkSlices(quantity: Decimal, sliceCount: number, rules: SymbolRules): Decimal[] {
    const perSlice = truncateToStep(quantity.div(sliceCount), rules.stepSize);

    if (perSlice.lte(0) || perSlice.lt(rules.minQty)) {
      throw new ValidationError(
        'DEGENERATE_SLICE',
        'sliceCount',
        `Quantity ${quantity.toFixed()} over ${sliceCount} slices gives ${perSlice.toFixed()} per slice, below minimum ${rules.minQty}`
      );
    }

    const slices = splitQuantity(quantity, sliceCount, rules.stepSize);
    const largest = slices[slices.length - 1];
    if (largest.gt(rules.maxQty)) {
      throw new ValidationError(
        'BAD_QUANTITY',
        'quantity',
        `Slice quantity ${largest.toFixed()} exceeds symbol maximum ${rules.maxQty}`
      );
    }

    return slices;
  }

  private checkNotional(
    quantity: Decimal,
    price: Decimal | null,
    rules: SymbolRules,
    kind: 'BAD_QUANTITY' | 'DEGENERATE_SLICE'
  ): void {
    if (!price) return;

    const notional = quantity.mul(price);
    if (notional.lt(rules.minNotional)) {
      throw new ValidationError(
        kind,
        kind === 'DEGENERATE_SLICE' ? 'sliceCount' : 'quantity',
        `Notional ${notional.toFixed()} is below symbol minimum ${rules.minNotional}`
      );
    }
  }
}
