/**
 * @tallybook/types: Shared domain types for the Tallybook stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  AccountType,
  BalanceType,
  AssetType,
  Account,
} from "./financial.js";

// Tenancy & identity
export type { Tenant, User } from "./tenant.js";

// Journal entries
export type {
  TransactionStatus,
  JournalEntry,
  JournalEntryAccount,
  NewJournalEntry,
  NewJournalEntryAccount,
  JournalEntryChanges,
} from "./journal.js";

// Runtime type guards
export {
  ACCOUNT_TYPES,
  BALANCE_TYPES,
  TRANSACTION_STATUSES,
  isDecimalString,
  isCalendarDate,
  isIsoTimestamp,
} from "./guards.js";
