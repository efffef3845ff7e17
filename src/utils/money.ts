import Decimal from "decimal.js";

/**
 * Fixed-point money and rate utilities for projection calculations.
 * All amounts and rates in the engine are decimals built here.
 */

/**
 * Decimal constructor used across the engine: 34 significant digits, half-up rounding.
 */
export const Money = Decimal.clone({
  precision: 34,
  rounding: Decimal.ROUND_HALF_UP,
});

/** Amount or rate as accepted on input records. */
export type Numeric = number | string;

export const ZERO = new Money(0);

/**
 * Attempts to convert a raw value to a decimal.
 *
 * @returns The decimal, or null when the value is missing, non-numeric, or not finite
 */
export function tryDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? new Money(value) : null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Money(String(value)) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") {
      return null;
    }
    try {
      const parsed = new Money(trimmed);
      return parsed.isFinite() ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

/**
 * Converts a number or numeric string to a decimal.
 * Numbers go through their shortest string form, so `0.1 + 0.2` becomes `0.30000000000000004`
 * rather than the full binary expansion.
 *
 * @throws Error when the value is not numeric
 */
export function toDecimal(value: Numeric | Decimal): Decimal {
  const parsed = tryDecimal(value);
  if (parsed === null) {
    throw new Error(`Not a numeric value: ${String(value)}`);
  }
  return parsed;
}

/**
 * Compounds a value once (or `periods` times) at an annual rate.
 * Formula: V × (1 + r)^n
 *
 * @example
 * ```ts
 * applyAnnualCompoundRate(toDecimal(500000), toDecimal("0.06")) // 530000
 * ```
 */
export function applyAnnualCompoundRate(value: Decimal, rate: Decimal, periods = 1): Decimal {
  if (periods === 0) {
    return value;
  }
  return value.times(rate.plus(1).pow(periods));
}

/**
 * Inflates a base amount by `years` of annual compounding.
 * Non-positive year counts leave the amount unchanged.
 */
export function applyAnnualInflation(amount: Decimal, inflationRate: Decimal, years: number): Decimal {
  if (years <= 0) {
    return amount;
  }
  return applyAnnualCompoundRate(amount, inflationRate, years);
}

/**
 * Rounds to a currency precision with half-up rounding.
 *
 * @example
 * ```ts
 * roundToCurrency(toDecimal("100.555")).toFixed(2) // "100.56"
 * ```
 */
export function roundToCurrency(value: Decimal, decimalPlaces = 2): Decimal {
  return value.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP);
}

/**
 * Serializes a decimal for JSON output with a fixed number of places.
 */
export function formatAmount(value: Decimal, decimalPlaces = 2): string {
  return value.toFixed(decimalPlaces, Decimal.ROUND_HALF_UP);
}
