import { Decimal } from "decimal.js";

/**
 * Amounts are carried as integer minor units (hundredths) everywhere inside the
 * service and only become decimals at the API boundary.
 */
export const MINOR_UNITS_PER_MAJOR = 100;

const DECIMAL_AMOUNT = /^\d+(?:\.\d+)?$/;

/**
 * Parse an amount as written in an SMS ("50,000", "1500.50 RWF", "RWF 200")
 * into minor units. Returns null for anything that is not a plain
 * non-negative decimal with at most two fractional digits.
 */
export function parseAmountToMinor(text: string): number | null {
  const cleaned = text.replace(/\b(?:RWF|FRW)\b/gi, "").replace(/[,\s]/g, "");
  if (!DECIMAL_AMOUNT.test(cleaned)) return null;

  const minor = new Decimal(cleaned).times(MINOR_UNITS_PER_MAJOR);
  if (!minor.isInteger() || minor.greaterThan(Number.MAX_SAFE_INTEGER)) return null;

  return minor.toNumber();
}

/** Minor units → decimal number for JSON responses. */
export function minorToDecimal(minor: number): number {
  return new Decimal(minor).dividedBy(MINOR_UNITS_PER_MAJOR).toNumber();
}

/** Minor units → canonical two-decimal string ("50000.00"). */
export function formatMinor(minor: number): string {
  return new Decimal(minor).dividedBy(MINOR_UNITS_PER_MAJOR).toFixed(2);
}

/** Decimal amount from a query string → minor units, rounded half-up. */
export function decimalToMinor(amount: number): number {
  return new Decimal(amount)
    .times(MINOR_UNITS_PER_MAJOR)
    .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
    .toNumber();
}
