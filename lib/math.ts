import { Decimal } from 'decimal.js';

export { Decimal };

/**
 * Converts input to Decimal.
 * Non-finite results (NaN, Infinity) are left for the caller to reject.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  return new Decimal(value);
}

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);

export const FinMath = {
  sum: (values: Decimal[]) => values.reduce((acc, value) => acc.plus(value), ZERO),

  // Annualized rate from a start/end ratio: (end / start)^(1 / years) - 1
  cagr: (start: Decimal.Value, end: Decimal.Value, years: number) =>
    new Decimal(end).dividedBy(start).pow(ONE.dividedBy(years)).minus(ONE),
};
