/**
 * Order Model Module
 *
 * Intent, attempt and state types, validation and step-size arithmetic.
 */

// Types
export type {
  OrderSide,
  OrderType,
  TimeInForce,
  DecimalInput,
  OrderIntentInput,
  MarketIntent,
  LimitIntent,
  StopLimitIntent,
  TwapIntent,
  ValidatedIntent,
  ExecutableIntent,
  OrderStatus,
  OrderAttempt,
  OrderState,
  MutableOrderState,
  SymbolRules,
  ValidationOptions,
} from './types.js';
export type { ValidationResult } from './OrderValidator.js';

// Classes & functions
export { OrderValidator, validateSymbol, DEFAULT_VALIDATION_OPTIONS } from './OrderValidator.js';
export {
  parseDecimal,
  isStepMultiple,
  truncateToStep,
  splitQuantity,
  sumDecimals,
} from './quantity.js';
export { createOrderState } from './orderState.js';
export {
  TERMINAL_STATUSES,
  isTerminal,
  isSettled,
  canTransition,
  transition,
} from './transitions.js';
