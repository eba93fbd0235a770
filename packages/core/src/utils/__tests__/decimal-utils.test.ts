import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatFixed2, sumDecimals } from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('sumDecimals', () => {
    it('should sum without floating point drift', () => {
      const total = sumDecimals([new Decimal('0.10'), new Decimal('0.20'), new Decimal('9999.99')]);

      expect(total.toString()).toBe('10000.29');
    });

    it('should return zero for an empty list', () => {
      expect(sumDecimals([]).isZero()).toBe(true);
    });
  });

  describe('formatFixed2', () => {
    it('should pad to two fractional digits', () => {
      expect(formatFixed2(new Decimal('12.5'))).toBe('12.50');
      expect(formatFixed2(new Decimal('17'))).toBe('17.00');
      expect(formatFixed2(new Decimal('0'))).toBe('0.00');
    });
  });
});
