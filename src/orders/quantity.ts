/**
 * Decimal helpers for quantities and prices.
 *
 * Everything goes through decimal.js: exchange step sizes such as 0.001
 * are not representable in binary floating point.
 */

import Decimal from 'decimal.js';
import { InternalError } from '../errors.js';
import type { DecimalInput } from './types.js';

/**
 * Parse a caller-supplied decimal. Returns null for empty or non-finite input.
 */
export function parseDecimal(value: DecimalInput | undefined): Decimal | null {
  if (value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;

  try {
    const parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    // decimal.js throws on malformed strings
    return null;
  }
}

/**
 * Whether value is an exact multiple of step
 */
export function isStepMultiple(value: Decimal.Value, step: Decimal.Value): boolean {
  const stepDecimal = new Decimal(step);
  if (stepDecimal.isZero()) return true;
  return new Decimal(value).mod(stepDecimal).isZero();
}

/**
 * Round down to the nearest multiple of step
 */
export function truncateToStep(value: Decimal.Value, step: Decimal.Value): Decimal {
  const stepDecimal = new Decimal(step);
  if (stepDecimal.isZero()) return new Decimal(value);
  return new Decimal(value).divToInt(stepDecimal).mul(stepDecimal);
}

/**
 * Split total into count step-aligned slices.
 *
 * The first count - 1 slices get floor(total / step / count) steps each,
 * the last one takes whatever remains, so the slices always sum to total.
 */
export function splitQuantity(
  total: Decimal.Value,
  count: number,
  step: Decimal.Value
): Decimal[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new InternalError('Slice count must be a positive integer', { count });
  }

  const totalDecimal = new Decimal(total);
  const base = truncateToStep(totalDecimal.div(count), step);
  const slices: Decimal[] = Array.from({ length: count - 1 }, () => base);
  slices.push(totalDecimal.minus(base.mul(count - 1)));

  const sum = slices.reduce((acc, slice) => acc.plus(slice), new Decimal(0));
  if (!sum.eq(totalDecimal)) {
    throw new InternalError('Slicing lost quantity', {
      total: totalDecimal.toFixed(),
      sum: sum.toFixed(),
    });
  }

  return slices;
}

/**
 * Sum decimal strings
 */
export function sumDecimals(values: readonly string[]): string {
  return values
    .reduce((acc, value) => acc.plus(value), new Decimal(0))
    .toFixed();
}
