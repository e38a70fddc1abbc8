import Decimal from "decimal.js";

// Sums and products stay exact: precision is decimal.js's maximum.
export const Amount = Decimal.clone({ precision: 1e9, rounding: Decimal.ROUND_HALF_UP });
export type Amount = Decimal;

// division never terminates for e.g. 10 / 3, so it gets a bounded precision
const Quotient = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_HALF_UP });

export const ZERO: Amount = new Amount(0);

// plain decimal literal: sign, digits, at most one point, optional exponent
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isDecimalLiteral(s: string): boolean {
  return DECIMAL_RE.test(s);
}

export function toCents(x: Amount): Amount {
  return x.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** total / count, rounded half-up to cents. */
export function divideToCents(total: Amount, count: number): Amount {
  return new Amount(toCents(new Quotient(total).dividedBy(count)));
}
