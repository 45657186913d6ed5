import { Decimal } from 'decimal.js';

/**
 * Arithmetic mean, or null for an empty list. Summation is exact for the feed's
 * decimal precision, so the result does not depend on value order.
 */
export const mean = (values: readonly number[]): Decimal | null => {
  if (values.length === 0) {
    return null;
  }

  const total = values.reduce((acc, value) => acc.plus(value), new Decimal(0));
  return total.div(values.length);
};

/**
 * Weighted mean over `(value, weight)` pairs; pairs with a non-positive weight are
 * ignored. Null when no pair qualifies.
 */
export const weightedMean = (
  pairs: readonly { value: number; weight: number }[]
): Decimal | null => {
  let numerator = new Decimal(0);
  let denominator = new Decimal(0);

  for (const { value, weight } of pairs) {
    if (weight <= 0) continue;
    numerator = numerator.plus(new Decimal(value).mul(weight));
    denominator = denominator.plus(weight);
  }

  return denominator.isZero() ? null : numerator.div(denominator);
};

export const roundTo = (value: Decimal, decimals: number): number =>
  value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toNumber();

export const roundOrNull = (value: Decimal | null, decimals: number): number | null =>
  value === null ? null : roundTo(value, decimals);
