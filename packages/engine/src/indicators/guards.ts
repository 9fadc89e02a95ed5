/**
 * Numeric guards shared by the streaming indicators
 */

/** Denominators at or below this are treated as zero */
export const EPSILON = 1e-12;

/**
 * Throw unless `value` is a positive integer
 */
export function requirePositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * `numerator / denominator`, or `fallback` when the denominator is ~0
 */
export function safeDiv(numerator: number, denominator: number, fallback = 0): number {
  return Math.abs(denominator) > EPSILON ? numerator / denominator : fallback;
}

/**
 * Decimal fraction to basis points
 */
export function toBps(value: number): number {
  return value * 10000;
}
