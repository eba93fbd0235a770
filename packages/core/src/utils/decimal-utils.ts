import { Decimal } from 'decimal.js';

// Amounts are numeric(6,2); ROUND_HALF_UP matches how the database rounds on insert
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Sum a list of decimals exactly. An empty list sums to zero.
 */
export function sumDecimals(values: readonly Decimal[]): Decimal {
  return values.reduce((total, value) => total.plus(value), new Decimal(0));
}

/**
 * Render a decimal with exactly two fractional digits, e.g. 12.5 -> "12.50".
 */
export function formatFixed2(value: Decimal): string {
  return value.toFixed(2);
}
