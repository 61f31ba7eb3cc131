/**
 * Runtime Type Guards
 *
 * Literal sets for Tallybook's string unions, and narrowing functions
 * for the strings that cross system boundaries: amounts and dates from
 * request input, and dates handed to the data layer.
 */

import type { AccountType, BalanceType } from "./financial.js";
import type { TransactionStatus } from "./journal.js";

// =============================================================================
// Literal sets
// =============================================================================

export const ACCOUNT_TYPES = [
  "asset",
  "liability",
  "equity",
  "income",
  "expense",
] as const satisfies readonly AccountType[];

export const BALANCE_TYPES = ["debit", "credit"] as const satisfies readonly BalanceType[];

export const TRANSACTION_STATUSES = [
  "pending",
  "posted",
  "canceled",
] as const satisfies readonly TransactionStatus[];

// =============================================================================
// Guards
// =============================================================================

/**
 * A decimal amount string: digits with an optional fractional part,
 * no sign, no exponent.
 */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && /^\d+(\.\d+)?$/.test(value);
}

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d{1,3})?)?(Z|[+-]([01]\d|2[0-3]):[0-5]\d)$/;

/**
 * A `YYYY-MM-DD` date that exists on the calendar ("2024-02-30" does not).
 */
export function isCalendarDate(value: unknown): value is string {
  if (typeof value !== "string" || !CALENDAR_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * An ISO 8601 timestamp with an explicit `Z` or UTC offset, on a real
 * calendar date. Local times without an offset are refused.
 */
export function isIsoTimestamp(value: unknown): value is string {
  if (typeof value !== "string") {
    return false;
  }
  const match = ISO_TIMESTAMP.exec(value);
  return match !== null && isCalendarDate(match[1]) && !Number.isNaN(Date.parse(value));
}
