/**
 * @cliffline/ledger — Token unit conversion.
 *
 * Amounts are held as bigint base units. They arrive as decimal strings
 * of base units and are displayed scaled by the token's decimals.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative
 */

import { LedgerError } from "./types.js";

/**
 * Parse a decimal integer string of base units ("1500" → 1500n).
 */
export function parseBaseUnits(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${value}"`);
  }
  return BigInt(trimmed);
}

/**
 * Format base units as a decimal token amount.
 *
 * 1250000000n with decimals=8 → "12.50000000"
 * 7n with decimals=0 → "7"
 */
export function formatUnits(value: bigint, decimals: number): string {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Cannot format negative amount: ${value.toString()}`);
  }
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

/**
 * Assert an amount is a strictly positive bigint.
 */
export function assertPositive(amount: bigint, context: string): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${context}: amount must be positive, got ${amount.toString()}`,
    );
  }
}
