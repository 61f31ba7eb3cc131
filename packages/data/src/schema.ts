/**
 * Drizzle table definitions.
 *
 * Must match the DDL in sql/schema.sql, which is what actually creates
 * the tables. Dates are ISO 8601 UTC strings stored as TEXT; amounts are
 * decimal strings.
 */

import { relations } from "drizzle-orm";
import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { ACCOUNT_TYPES, BALANCE_TYPES, TRANSACTION_STATUSES } from "@tallybook/types";

// ============================================================================
// TABLES
// ============================================================================

export const tenants = sqliteTable("tenants", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  created: text("created").notNull(),
});

export const users = sqliteTable(
  "users",
  {
    id: text("id").primaryKey(),
    email: text("email").notNull(),
    firstName: text("first_name").notNull(),
    lastName: text("last_name").notNull(),
    created: text("created").notNull(),
  },
  (table) => ({
    emailIdx: uniqueIndex("ux_users_email").on(table.email),
  }),
);

export const assetTypes = sqliteTable(
  "asset_types",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    description: text("description"),
    symbol: text("symbol"),
    decimals: integer("decimals").notNull().default(2),
  },
  (table) => ({
    nameIdx: uniqueIndex("ux_asset_types_name").on(table.name),
  }),
);

export const accounts = sqliteTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    tenantId: text("tenant_id")
      .notNull()
      .references(() => tenants.id),
    accountNumber: integer("account_number").notNull(),
    name: text("name").notNull(),
    description: text("description"),
    accountType: text("account_type", { enum: ACCOUNT_TYPES }).notNull(),
    normalBalance: text("normal_balance", { enum: BALANCE_TYPES }).notNull(),
    assetTypeId: text("asset_type_id")
      .notNull()
      .references(() => assetTypes.id),
    created: text("created").notNull(),
    createdById: text("created_by_id")
      .notNull()
      .references(() => users.id),
  },
  (table) => ({
    tenantNumberIdx: uniqueIndex("ux_accounts_tenant_number").on(
      table.tenantId,
      table.accountNumber,
    ),
  }),
);

export const journalEntries = sqliteTable(
  "journal_entries",
  {
    id: text("id").primaryKey(),
    tenantId: text("tenant_id")
      .notNull()
      .references(() => tenants.id),
    entryId: integer("entry_id").notNull(),
    entryDate: text("entry_date").notNull(),
    postDate: text("post_date"),
    checkNumber: integer("check_number"),
    description: text("description").notNull(),
    note: text("note"),
    status: text("status", { enum: TRANSACTION_STATUSES }).notNull().default("pending"),
    created: text("created").notNull(),
    createdById: text("created_by_id")
      .notNull()
      .references(() => users.id),
    updated: text("updated"),
    updatedById: text("updated_by_id").references(() => users.id),
    posted: text("posted"),
    postedById: text("posted_by_id").references(() => users.id),
    canceled: text("canceled"),
    canceledById: text("canceled_by_id").references(() => users.id),
  },
  (table) => ({
    tenantEntryIdx: uniqueIndex("ux_journal_entries_tenant_entry").on(
      table.tenantId,
      table.entryId,
    ),
    statusIdx: index("idx_journal_entries_status").on(table.tenantId, table.status),
  }),
);

export const journalEntryAccounts = sqliteTable(
  "journal_entry_accounts",
  {
    id: text("id").primaryKey(),
    journalEntryId: text("journal_entry_id")
      .notNull()
      .references(() => journalEntries.id, { onDelete: "cascade" }),
    accountId: text("account_id")
      .notNull()
      .references(() => accounts.id),
    assetTypeId: text("asset_type_id")
      .notNull()
      .references(() => assetTypes.id),
    entryType: text("entry_type", { enum: BALANCE_TYPES }).notNull(),
    amount: text("amount").notNull(),
  },
  (table) => ({
    entryIdx: index("idx_journal_entry_accounts_entry").on(table.journalEntryId),
    accountIdx: index("idx_journal_entry_accounts_account").on(table.accountId),
  }),
);

// ============================================================================
// RELATIONS
// ============================================================================

export const accountsRelations = relations(accounts, ({ one }) => ({
  tenant: one(tenants, { fields: [accounts.tenantId], references: [tenants.id] }),
  assetType: one(assetTypes, { fields: [accounts.assetTypeId], references: [assetTypes.id] }),
}));

export const journalEntriesRelations = relations(journalEntries, ({ one, many }) => ({
  tenant: one(tenants, { fields: [journalEntries.tenantId], references: [tenants.id] }),
  createdBy: one(users, { fields: [journalEntries.createdById], references: [users.id] }),
  updatedBy: one(users, { fields: [journalEntries.updatedById], references: [users.id] }),
  postedBy: one(users, { fields: [journalEntries.postedById], references: [users.id] }),
  canceledBy: one(users, { fields: [journalEntries.canceledById], references: [users.id] }),
  accounts: many(journalEntryAccounts),
}));

export const journalEntryAccountsRelations = relations(journalEntryAccounts, ({ one }) => ({
  journalEntry: one(journalEntries, {
    fields: [journalEntryAccounts.journalEntryId],
    references: [journalEntries.id],
  }),
  account: one(accounts, { fields: [journalEntryAccounts.accountId], references: [accounts.id] }),
  assetType: one(assetTypes, {
    fields: [journalEntryAccounts.assetTypeId],
    references: [assetTypes.id],
  }),
}));

// ============================================================================
// ROW TYPES
// ============================================================================

export type TenantRow = typeof tenants.$inferSelect;
export type UserRow = typeof users.$inferSelect;
export type AssetTypeRow = typeof assetTypes.$inferSelect;
export type AccountRow = typeof accounts.$inferSelect;
export type JournalEntryRow = typeof journalEntries.$inferSelect;
export type JournalEntryAccountRow = typeof journalEntryAccounts.$inferSelect;
