import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision.
// Long replays divide C / Q many times, so keep well beyond currency scale.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal to a reporting-currency string with 2 decimal places.
 * Used for gains, losses and tax amounts in reports.
 */
export function toMoney(value: Decimal): string {
  const rounded = value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
  return (rounded.isZero() ? ZERO : rounded).toFixed(2);
}

/**
 * Full-precision string without trailing zeros, for quantities and unit prices.
 */
export function toPlain(value: Decimal): string {
  return (value.isZero() ? ZERO : value).toFixed();
}

/**
 * Sum of Decimal values.
 */
export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), ZERO);
}

/**
 * `value × part / whole` computed in one pass so a full share (part = whole)
 * returns `value` exactly.
 */
export function proportion(value: Decimal, part: Decimal, whole: Decimal): Decimal {
  if (whole.isZero()) {
    throw new Error('Division by zero');
  }
  if (part.equals(whole)) {
    return value;
  }
  return value.times(part).dividedBy(whole);
}

export function isDecimalString(value: string): boolean {
  try {
    return new Decimal(value).isFinite();
  } catch {
    return false;
  }
}
