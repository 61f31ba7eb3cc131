/**
 * @tallybook/data: Persistence for Tallybook.
 *
 * SQLite through drizzle-orm and better-sqlite3:
 * - A data context shared by all tenants
 * - Offset pagination
 * - Repositories for tenants, users, asset types, accounts,
 *   journal entries and posted lines
 */

// Context
export { createDataContext } from "./context.js";
export type { DataContext, DataContextOptions, Db, Queryable, Schema } from "./context.js";

// Paging
export { getPaged, assertPagination } from "./paging.js";
export type { Pagination, PagedResult } from "./paging.js";

// Errors
export { RepositoryError } from "./errors.js";
export type { RepositoryErrorCode } from "./errors.js";

// Repositories
export { TenantRepository } from "./repositories/tenant-repository.js";
export { UserRepository } from "./repositories/user-repository.js";
export type { NewUser } from "./repositories/user-repository.js";
export { AssetTypeRepository } from "./repositories/asset-type-repository.js";
export type { NewAssetType } from "./repositories/asset-type-repository.js";
export { AccountRepository } from "./repositories/account-repository.js";
export type { NewAccount } from "./repositories/account-repository.js";
export { JournalEntryRepository } from "./repositories/journal-entry-repository.js";
export { PostingRepository } from "./repositories/posting-repository.js";
export type { PostingRange } from "./repositories/posting-repository.js";

// Schema
export * as tables from "./schema.js";
