import Decimal from 'decimal.js';

export const MONETARY_DECIMALS = 2;

/**
 * Tolerance used when comparing declared and recomputed amounts
 */
export const AMOUNT_TOLERANCE = 0.01;

/**
 * Exact decimal product, so 0.7 × 0.05 is 0.035 and not 0.034999…
 */
export function multiply(...factors: Decimal.Value[]): Decimal {
  return factors.reduce<Decimal>((product, factor) => product.times(factor), new Decimal(1));
}

export function sum(values: readonly Decimal.Value[]): Decimal {
  return values.reduce<Decimal>((total, value) => total.plus(value), new Decimal(0));
}

/**
 * Round half away from zero on the decimal value, so 1.005 becomes 1.01
 * and 0.035 becomes 0.04.
 */
export function roundHalfUp(value: Decimal.Value, decimals: number = MONETARY_DECIMALS): number {
  return new Decimal(value).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toNumber();
}

export function formatAmount(value: number): string {
  return new Decimal(value).toFixed(MONETARY_DECIMALS, Decimal.ROUND_HALF_UP);
}

/**
 * Unit prices keep any precision beyond the cent that is actually present
 */
export function formatPrice(value: Decimal.Value): string {
  return withMinimumDecimals(new Decimal(value));
}

/**
 * Quantities are written with the precision present, no padding
 */
export function formatQuantity(value: number): string {
  return new Decimal(value).toFixed();
}

/**
 * rate × 100, at least two decimals and every further one the rate carries
 */
export function formatPercent(rate: number): string {
  return withMinimumDecimals(new Decimal(rate).times(100));
}

export function percentToRate(percent: number): number {
  return new Decimal(percent).dividedBy(100).toNumber();
}

export function amountsDiffer(a: number, b: number): boolean {
  return new Decimal(a).minus(b).abs().greaterThan(AMOUNT_TOLERANCE);
}

// xs:decimal has no exponent notation, toFixed() never uses one
function withMinimumDecimals(value: Decimal): string {
  return value.decimalPlaces() < MONETARY_DECIMALS ? value.toFixed(MONETARY_DECIMALS) : value.toFixed();
}
