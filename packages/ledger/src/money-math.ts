/**
 * @tallybook/ledger: Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
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

/**
 * Number of fractional digits written in an amount string.
 * Throws on malformed input.
 */
export function fractionDigits(amount: string): number {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }
  const dot = trimmed.indexOf(".");
  return dot === -1 ? 0 : trimmed.length - dot - 1;
}

/**
 * Rewrite an amount with exactly `decimals` fractional digits.
 *
 * "100" with decimals=2 → "100.00"
 */
export function normalizeAmount(amount: string, decimals: number): string {
  return formatAmount(parseAmount(amount, decimals), decimals);
}

/**
 * Check that an amount is strictly greater than zero.
 */
export function isPositiveAmount(amount: string): boolean {
  return parseAmount(amount, fractionDigits(amount)) > 0n;
}
