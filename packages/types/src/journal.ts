/**
 * Journal Entry Types
 *
 * A journal entry is a dated financial transaction made of debit and
 * credit lines. Lifecycle: pending → posted, or pending → canceled.
 * Nothing leaves posted or canceled.
 */

import type { Account, AssetType, BalanceType } from "./financial.js";
import type { Tenant, User } from "./tenant.js";

/**
 * Lifecycle states of a journal entry.
 */
export type TransactionStatus = "pending" | "posted" | "canceled";

/**
 * One debit-or-credit line of a journal entry.
 */
export interface JournalEntryAccount {
  readonly id: string;
  readonly journalEntryId: string;
  readonly accountId: string;
  readonly assetTypeId: string;
  readonly entryType: BalanceType;

  /** Positive decimal string (e.g. "100.00") */
  readonly amount: string;

  readonly account?: Account | undefined;
  readonly assetType?: AssetType | undefined;
}

/**
 * A journal entry with whichever relations the query populated.
 */
export interface JournalEntry {
  readonly id: string;
  readonly tenantId: string;

  /** Tenant-scoped sequential number, starting at 1. */
  readonly entryId: number;

  /** ISO 8601 timestamp */
  readonly entryDate: string;
  readonly postDate: string | null;
  readonly checkNumber: number | null;
  readonly description: string;
  readonly note: string | null;
  readonly status: TransactionStatus;

  readonly created: string;
  readonly createdById: string;
  readonly updated: string | null;
  readonly updatedById: string | null;
  readonly posted: string | null;
  readonly postedById: string | null;
  readonly canceled: string | null;
  readonly canceledById: string | null;

  readonly tenant?: Tenant | undefined;
  readonly createdBy?: User | undefined;
  readonly updatedBy?: User | null | undefined;
  readonly postedBy?: User | null | undefined;
  readonly canceledBy?: User | null | undefined;
  readonly accounts: readonly JournalEntryAccount[];
}

/**
 * A line as supplied by a caller creating or editing an entry.
 */
export interface NewJournalEntryAccount {
  readonly accountId: string;
  readonly assetTypeId: string;
  readonly entryType: BalanceType;
  readonly amount: string;
}

/**
 * A journal entry as supplied by a caller, before persistence.
 *
 * An `entryId` of 0 (or none) asks the repository to assign the
 * tenant's next sequential number.
 */
export interface NewJournalEntry {
  readonly tenantId: string;
  readonly entryId?: number | undefined;
  readonly entryDate: string;
  readonly postDate?: string | undefined;
  readonly checkNumber?: number | undefined;
  readonly description: string;
  readonly note?: string | undefined;
  readonly createdById: string;
  readonly accounts: readonly NewJournalEntryAccount[];
}

/**
 * Editable fields of a pending entry. Omitted fields are left as they are;
 * `accounts`, when given, replaces every line.
 */
export interface JournalEntryChanges {
  readonly entryDate?: string | undefined;
  readonly checkNumber?: number | null | undefined;
  readonly description?: string | undefined;
  readonly note?: string | null | undefined;
  readonly accounts?: readonly NewJournalEntryAccount[] | undefined;
}
