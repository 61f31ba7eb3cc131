/**
 * Row → domain mapping.
 *
 * Relational queries return rows with whatever relations were asked for;
 * the mappers copy the columns and map each loaded relation, leaving the
 * others undefined.
 */

import type {
  Account,
  AssetType,
  JournalEntry,
  JournalEntryAccount,
  Tenant,
  User,
} from "@tallybook/types";
import type {
  AccountRow,
  AssetTypeRow,
  JournalEntryAccountRow,
  JournalEntryRow,
  TenantRow,
  UserRow,
} from "./schema.js";

// =============================================================================
// Row shapes with optional relations
// =============================================================================

export type AccountGraph = AccountRow & {
  readonly assetType?: AssetTypeRow | undefined;
};

export type JournalEntryAccountGraph = JournalEntryAccountRow & {
  readonly account?: AccountRow | undefined;
  readonly assetType?: AssetTypeRow | undefined;
};

export type JournalEntryGraph = JournalEntryRow & {
  readonly tenant?: TenantRow | undefined;
  readonly createdBy?: UserRow | undefined;
  readonly updatedBy?: UserRow | null | undefined;
  readonly postedBy?: UserRow | null | undefined;
  readonly canceledBy?: UserRow | null | undefined;
  readonly accounts?: readonly JournalEntryAccountGraph[] | undefined;
};

// =============================================================================
// Mappers
// =============================================================================

export function toTenant(row: TenantRow): Tenant {
  return { id: row.id, name: row.name, created: row.created };
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    created: row.created,
  };
}

function toOptionalUser(row: UserRow | null | undefined): User | null | undefined {
  if (row === undefined) return undefined;
  return row === null ? null : toUser(row);
}

export function toAssetType(row: AssetTypeRow): AssetType {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    symbol: row.symbol,
    decimals: row.decimals,
  };
}

export function toAccount(row: AccountGraph): Account {
  return {
    id: row.id,
    tenantId: row.tenantId,
    accountNumber: row.accountNumber,
    name: row.name,
    description: row.description,
    accountType: row.accountType,
    normalBalance: row.normalBalance,
    assetTypeId: row.assetTypeId,
    assetType: row.assetType === undefined ? undefined : toAssetType(row.assetType),
    created: row.created,
    createdById: row.createdById,
  };
}

export function toJournalEntryAccount(row: JournalEntryAccountGraph): JournalEntryAccount {
  return {
    id: row.id,
    journalEntryId: row.journalEntryId,
    accountId: row.accountId,
    assetTypeId: row.assetTypeId,
    entryType: row.entryType,
    amount: row.amount,
    account: row.account === undefined ? undefined : toAccount(row.account),
    assetType: row.assetType === undefined ? undefined : toAssetType(row.assetType),
  };
}

export function toJournalEntry(row: JournalEntryGraph): JournalEntry {
  return {
    id: row.id,
    tenantId: row.tenantId,
    entryId: row.entryId,
    entryDate: row.entryDate,
    postDate: row.postDate,
    checkNumber: row.checkNumber,
    description: row.description,
    note: row.note,
    status: row.status,
    created: row.created,
    createdById: row.createdById,
    updated: row.updated,
    updatedById: row.updatedById,
    posted: row.posted,
    postedById: row.postedById,
    canceled: row.canceled,
    canceledById: row.canceledById,
    tenant: row.tenant === undefined ? undefined : toTenant(row.tenant),
    createdBy: row.createdBy === undefined ? undefined : toUser(row.createdBy),
    updatedBy: toOptionalUser(row.updatedBy),
    postedBy: toOptionalUser(row.postedBy),
    canceledBy: toOptionalUser(row.canceledBy),
    accounts: (row.accounts ?? []).map(toJournalEntryAccount),
  };
}
