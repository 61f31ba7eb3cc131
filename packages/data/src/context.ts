/**
 * Persistence context.
 *
 * Opens a better-sqlite3 database, applies sql/schema.sql and wraps it in
 * a drizzle instance that knows the relational schema. One context is
 * shared by every tenant's repositories.
 */

import { readFileSync } from "node:fs";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import * as schema from "./schema.js";

// ============================================================================
// TYPES
// ============================================================================

export type Schema = typeof schema;

export type Db = BetterSQLite3Database<Schema>;

/**
 * Anything queries can run against: the database itself or an open
 * transaction.
 */
export type Queryable = BaseSQLiteDatabase<"sync", Database.RunResult, Schema>;

export interface DataContextOptions {
  /** Path to the SQLite file (default: ':memory:') */
  readonly filename?: string;
}

export interface DataContext {
  /** The drizzle instance */
  readonly db: Db;
  /** The underlying better-sqlite3 connection */
  readonly sqlite: Database.Database;
  /** True when the database answers a trivial query */
  ping(): boolean;
  /** Close the connection */
  close(): void;
}

// ============================================================================
// SCHEMA
// ============================================================================

const SCHEMA_URL = new URL("../sql/schema.sql", import.meta.url);

let schemaSql: string | undefined;

function loadSchemaSql(): string {
  schemaSql ??= readFileSync(SCHEMA_URL, "utf-8");
  return schemaSql;
}

// ============================================================================
// CONTEXT CREATION
// ============================================================================

/**
 * Open (or create) a database and apply the schema.
 *
 * @example
 * ```ts
 * const ctx = createDataContext({ filename: "./tallybook.db" });
 * const journal = new JournalEntryRepository(ctx);
 * ```
 */
export function createDataContext(options: DataContextOptions = {}): DataContext {
  const sqlite = new Database(options.filename ?? ":memory:");

  sqlite.pragma("foreign_keys = ON");
  if (options.filename !== undefined && options.filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(loadSchemaSql());

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    ping() {
      const row: unknown = sqlite.prepare("SELECT 1 AS ok").get();
      return typeof row === "object" && row !== null && "ok" in row && row.ok === 1;
    },
    close() {
      sqlite.close();
    },
  };
}
