import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places (standard crypto precision).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Money totals: 2 decimal places as a number. */
export function toMoney(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
}

/**
 * Sample standard deviation (n - 1 denominator).
 * Undefined for fewer than two values.
 */
export function standardDeviation(values: Decimal[]): Decimal | null {
  if (values.length < 2) {
    return null;
  }
  const mean = add(...values).dividedBy(values.length);
  const variance = values
    .reduce((sum, val) => sum.plus(val.minus(mean).pow(2)), new Decimal(0))
    .dividedBy(values.length - 1);
  return variance.sqrt();
}
