/**
 * @collegium/ledger - Deterministic integer arithmetic.
 *
 * All amounts are bigint base units. Decimal strings are only a
 * presentation format, produced via explicit scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors; callers own the remainder
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

// ─── Decimal Conversion ──────────────────────────────────────────────────

/**
 * Format a scaled bigint as a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Base Units ──────────────────────────────────────────────────────────

/**
 * Parse a non-negative integer string of base units ("1500" → 1500n).
 * This is the wire format for amounts.
 */
export function parseBaseUnits(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Base-unit amount must be a non-negative integer string, got "${value}"`,
    );
  }
  return BigInt(value);
}

/**
 * Assert an amount is a non-negative bigint.
 */
export function assertNonNegative(amount: bigint, label = "amount"): void {
  if (amount < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${amount.toString()}`,
    );
  }
}

// ─── Proportional Arithmetic ─────────────────────────────────────────────

/**
 * floor(value * numerator / denominator), all non-negative integers.
 */
export function mulDivFloor(
  value: bigint,
  numerator: bigint,
  denominator: bigint,
): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Denominator must be positive");
  }
  if (value < 0n || numerator < 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Operands must be non-negative");
  }
  return (value * numerator) / denominator;
}

/**
 * Sum a list of amounts.
 */
export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
