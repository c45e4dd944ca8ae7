/**
 * Tests for decimal quantity helpers
 */

import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
  isStepMultiple,
  parseDecimal,
  splitQuantity,
  sumDecimals,
  truncateToStep,
} from '../../src/orders/quantity.js';
import { InternalError } from '../../src/errors.js';

describe('quantity helpers', () => {
  describe('parseDecimal', () => {
    it('should parse strings and numbers', () => {
      expect(parseDecimal('0.01')?.toFixed()).toBe('0.01');
      expect(parseDecimal(' 1.5 ')?.toFixed()).toBe('1.5');
      expect(parseDecimal(5)?.toFixed()).toBe('5');
    });

    it.each([undefined, '', '   ', 'abc', 'NaN', 'Infinity'])('should return null for %j', (value) => {
      expect(parseDecimal(value)).toBeNull();
    });
  });

  describe('isStepMultiple', () => {
    it('should compare exactly, without float error', () => {
      expect(isStepMultiple('0.003', '0.001')).toBe(true);
      expect(isStepMultiple('0.3', '0.1')).toBe(true);
      expect(isStepMultiple('0.0035', '0.001')).toBe(false);
    });

    it('should accept anything for a zero step', () => {
      expect(isStepMultiple('0.123456', '0')).toBe(true);
    });
  });

  describe('truncateToStep', () => {
    it('should round down to the step', () => {
      expect(truncateToStep('0.0129', '0.001').toFixed()).toBe('0.012');
      expect(truncateToStep('0.012', '0.001').toFixed()).toBe('0.012');
    });
  });

  describe('splitQuantity', () => {
    const asStrings = (slices: Decimal[]): string[] => slices.map((slice) => slice.toFixed());

    it('should split evenly when the quantity divides', () => {
      expect(asStrings(splitQuantity('0.05', 5, '0.001'))).toEqual([
        '0.01',
        '0.01',
        '0.01',
        '0.01',
        '0.01',
      ]);
    });

    it('should put the remainder on the last slice', () => {
      expect(asStrings(splitQuantity('0.01', 3, '0.001'))).toEqual(['0.003', '0.003', '0.004']);
      expect(asStrings(splitQuantity('1', 7, '0.01'))).toEqual([
        '0.14',
        '0.14',
        '0.14',
        '0.14',
        '0.14',
        '0.14',
        '0.16',
      ]);
    });

    it('should return the whole quantity for a single slice', () => {
      expect(asStrings(splitQuantity('0.123', 1, '0.001'))).toEqual(['0.123']);
    });

    it('should never lose quantity', () => {
      const cases: Array<[string, number, string]> = [
        ['0.05', 5, '0.001'],
        ['0.999', 7, '0.001'],
        ['12.345', 11, '0.005'],
        ['3', 50, '0.01'],
        ['0.1', 3, '0.1'],
      ];

      for (const [total, count, step] of cases) {
        const slices = splitQuantity(total, count, step);
        const sum = slices.reduce((acc, slice) => acc.plus(slice), new Decimal(0));

        expect(slices).toHaveLength(count);
        expect(sum.toFixed()).toBe(new Decimal(total).toFixed());
        slices.slice(0, -1).forEach((slice) => expect(isStepMultiple(slice, step)).toBe(true));
      }
    });

    it('should throw InternalError for a non-positive count', () => {
      expect(() => splitQuantity('1', 0, '0.001')).toThrow(InternalError);
      expect(() => splitQuantity('1', 1.5, '0.001')).toThrow(InternalError);
    });
  });

  describe('sumDecimals', () => {
    it('should add without float error', () => {
      expect(sumDecimals(['0.1', '0.2'])).toBe('0.3');
      expect(sumDecimals(['0.01', '0.01', '0.01'])).toBe('0.03');
    });

    it('should return 0 for no values', () => {
      expect(sumDecimals([])).toBe('0');
    });
  });
});
