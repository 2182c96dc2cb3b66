import Decimal from 'decimal.js';

/** Truncates toward zero, never rounding up. */
export function truncate(value: Decimal.Value, decimals: number): Decimal {
  return new Decimal(value).toDecimalPlaces(decimals, Decimal.ROUND_DOWN);
}

export function roundHalfUp(value: Decimal.Value, decimals: number): Decimal {
  return new Decimal(value).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
}

/**
 * Number of decimals implied by an exchange step such as "0.00001000".
 * Trailing zeros do not count.
 */
export function decimalsOfStep(step: string | number): number {
  const decimal = new Decimal(step);
  if (decimal.isZero()) {
    return 0;
  }
  return decimal.decimalPlaces();
}
