/**
 * Stored timestamps.
 *
 * Entry and post dates are compared as text, so every date the
 * repositories write or filter by is first brought to the one form
 * `toISOString()` produces: `YYYY-MM-DDTHH:mm:ss.sssZ`.
 */

import { isCalendarDate, isIsoTimestamp } from "@tallybook/types";
import { RepositoryError } from "./errors.js";

/**
 * Normalize a date or timestamp for storage and comparison.
 *
 * A bare `YYYY-MM-DD` is the start of that day in UTC, or its last
 * millisecond with `endOfDay` (the inclusive end of a range).
 * Throws RepositoryError("INVALID_ARGUMENT") for anything else that is
 * not an ISO 8601 timestamp with a `Z` or offset.
 */
export function toStoredTimestamp(value: string, field: string, endOfDay = false): string {
  if (isCalendarDate(value)) {
    return `${value}T${endOfDay ? "23:59:59.999" : "00:00:00.000"}Z`;
  }
  if (isIsoTimestamp(value)) {
    return new Date(value).toISOString();
  }
  throw new RepositoryError(
    "INVALID_ARGUMENT",
    `${field} must be a YYYY-MM-DD date or an ISO 8601 timestamp with a UTC offset, got "${value}"`,
  );
}
