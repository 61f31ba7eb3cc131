/**
 * Journal entry repository.
 *
 * The rule-governed core of the data layer:
 * - Only balanced entries are written (debits = credits per asset type)
 * - Entry numbers are sequential per tenant: next = max + 1
 * - An entry and its lines are written in one IMMEDIATE transaction,
 *   backed by a unique (tenant_id, entry_id) index
 * - Lifecycle: pending → posted, pending → canceled; nothing else
 *
 * Canceled entries are kept but never appear in date-range listings.
 */

import { randomUUID } from "node:crypto";
import { and, asc, count, desc, eq, gte, lte, max, ne, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type {
  JournalEntry,
  JournalEntryChanges,
  NewJournalEntry,
  NewJournalEntryAccount,
} from "@tallybook/types";
import { LedgerError, assertBalanced } from "@tallybook/ledger";
import type { DataContext, Db, Queryable } from "../context.js";
import { RepositoryError } from "../errors.js";
import { toJournalEntry } from "../mappers.js";
import { toStoredTimestamp } from "../dates.js";
import { getPaged } from "../paging.js";
import type { PagedResult, Pagination } from "../paging.js";
import { journalEntries, journalEntryAccounts, tenants } from "../schema.js";
import type { JournalEntryRow } from "../schema.js";

// =============================================================================
// Relation graphs
// =============================================================================

const DETAILED = {
  tenant: true,
  createdBy: true,
  updatedBy: true,
  postedBy: true,
  canceledBy: true,
  accounts: { with: { account: true, assetType: true } },
} as const;

const LISTED = {
  createdBy: true,
  postedBy: true,
  accounts: { with: { account: true, assetType: true } },
} as const;

const SUMMARY = {
  tenant: true,
  accounts: true,
} as const;

// =============================================================================
// Query helpers
// =============================================================================

type EntryColumns = Pick<
  typeof journalEntries,
  "id" | "tenantId" | "entryId" | "status" | "entryDate" | "postDate"
>;

/** Post date when posted, entry date otherwise. */
export function effectiveDate(je: EntryColumns): SQL<string> {
  return sql<string>`coalesce(${je.postDate}, ${je.entryDate})`;
}

function inRange(
  je: EntryColumns,
  tenantId: string,
  start: string,
  end: string,
): SQL | undefined {
  return and(
    eq(je.tenantId, tenantId),
    ne(je.status, "canceled"),
    gte(effectiveDate(je), start),
    lte(effectiveDate(je), end),
  );
}

function pendingOf(je: EntryColumns, tenantId: string): SQL | undefined {
  return and(eq(je.tenantId, tenantId), eq(je.status, "pending"));
}

function nextEntryId(q: Queryable, tenantId: string): number {
  const row = q
    .select({ current: max(journalEntries.entryId) })
    .from(journalEntries)
    .where(eq(journalEntries.tenantId, tenantId))
    .get();
  return (row?.current ?? 0) + 1;
}

function loadDetailed(q: Queryable, id: string): JournalEntry | undefined {
  const row = q.query.journalEntries
    .findFirst({ where: (je) => eq(je.id, id), with: DETAILED })
    .sync();
  return row === undefined ? undefined : toJournalEntry(row);
}

function requireDetailed(q: Queryable, id: string): JournalEntry {
  const entry = loadDetailed(q, id);
  if (entry === undefined) {
    throw new Error(`Journal entry ${id} vanished inside its own transaction`);
  }
  return entry;
}

function findRow(q: Queryable, id: string): JournalEntryRow | undefined {
  return q.select().from(journalEntries).where(eq(journalEntries.id, id)).get();
}

/**
 * Reject unbalanced or malformed lines before anything is written.
 */
function validateLines(lines: readonly NewJournalEntryAccount[]): void {
  try {
    assertBalanced(lines);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new RepositoryError("INVALID_ARGUMENT", err.message);
    }
    throw err;
  }
}

function insertLines(
  q: Queryable,
  journalEntryId: string,
  lines: readonly NewJournalEntryAccount[],
): void {
  q.insert(journalEntryAccounts)
    .values(
      lines.map((line) => ({
        id: randomUUID(),
        journalEntryId,
        accountId: line.accountId,
        assetTypeId: line.assetTypeId,
        entryType: line.entryType,
        amount: line.amount.trim(),
      })),
    )
    .run();
}

function assertPending(row: JournalEntryRow, action: string): void {
  if (row.status !== "pending") {
    throw new RepositoryError(
      "INVALID_TRANSITION",
      `Cannot ${action} journal entry ${String(row.entryId)}: it is ${row.status}`,
    );
  }
}

// =============================================================================
// Repository
// =============================================================================

export class JournalEntryRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  // ─── Create ────────────────────────────────────────────────────────────

  /**
   * Create a balanced journal entry with all of its lines.
   *
   * When `entryId` is unset (or 0) the next number for the tenant is
   * assigned. Everything happens in one transaction: on failure nothing
   * is written and the original error propagates.
   *
   * @returns The entry re-read with its full relation graph
   */
  async createJournalEntry(entry: NewJournalEntry | null | undefined): Promise<JournalEntry> {
    if (entry === null || entry === undefined) {
      throw new RepositoryError("INVALID_ARGUMENT", "A journal entry is required");
    }
    validateLines(entry.accounts);
    const entryDate = toStoredTimestamp(entry.entryDate, "entryDate");
    const postDate =
      entry.postDate === undefined ? null : toStoredTimestamp(entry.postDate, "postDate");

    const id = randomUUID();
    const now = new Date().toISOString();

    return this.db.transaction(
      (tx) => {
        const tenant = tx
          .select({ id: tenants.id })
          .from(tenants)
          .where(eq(tenants.id, entry.tenantId))
          .get();
        if (tenant === undefined) {
          throw new RepositoryError("INVALID_ARGUMENT", `Tenant not found: "${entry.tenantId}"`);
        }

        const entryId =
          entry.entryId !== undefined && entry.entryId > 0
            ? entry.entryId
            : nextEntryId(tx, entry.tenantId);

        tx.insert(journalEntries)
          .values({
            id,
            tenantId: entry.tenantId,
            entryId,
            entryDate,
            postDate,
            checkNumber: entry.checkNumber ?? null,
            description: entry.description,
            note: entry.note ?? null,
            status: "pending",
            created: now,
            createdById: entry.createdById,
          })
          .run();

        insertLines(tx, id, entry.accounts);

        return requireDetailed(tx, id);
      },
      { behavior: "immediate" },
    );
  }

  // ─── Lookups ───────────────────────────────────────────────────────────

  /** Entry with its tenant and lines. */
  async getById(id: string): Promise<JournalEntry | undefined> {
    const row = await this.db.query.journalEntries.findFirst({
      where: (je) => eq(je.id, id),
      with: SUMMARY,
    });
    return row === undefined ? undefined : toJournalEntry(row);
  }

  async getByTenantAndEntryId(tenantId: string, entryId: number): Promise<JournalEntry | undefined> {
    const row = await this.db.query.journalEntries.findFirst({
      where: (je) => and(eq(je.tenantId, tenantId), eq(je.entryId, entryId)),
      with: SUMMARY,
    });
    return row === undefined ? undefined : toJournalEntry(row);
  }

  /** Entry with tenant, audit users, and lines with account and asset type. */
  async getDetailedById(id: string): Promise<JournalEntry | undefined> {
    return loadDetailed(this.db, id);
  }

  async getDetailedByTenantAndEntryId(
    tenantId: string,
    entryId: number,
  ): Promise<JournalEntry | undefined> {
    const row = await this.db.query.journalEntries.findFirst({
      where: (je) => and(eq(je.tenantId, tenantId), eq(je.entryId, entryId)),
      with: DETAILED,
    });
    return row === undefined ? undefined : toJournalEntry(row);
  }

  // ─── Listings ──────────────────────────────────────────────────────────

  /**
   * Non-canceled entries whose effective date is within [start, end],
   * newest first, then by entry number. A date-only `end` covers that
   * whole day.
   */
  async getJournalEntries(
    tenantId: string,
    start: string,
    end: string,
    pagination: Pagination,
  ): Promise<PagedResult<JournalEntry>> {
    const from = toStoredTimestamp(start, "start");
    const to = toStoredTimestamp(end, "end", true);

    return getPaged(
      pagination,
      async (limit, offset) => {
        const rows = await this.db.query.journalEntries.findMany({
          where: (je) => inRange(je, tenantId, from, to),
          orderBy: (je) => [desc(effectiveDate(je)), asc(je.entryId)],
          with: LISTED,
          limit,
          offset,
        });
        return rows.map(toJournalEntry);
      },
      () => this.count(inRange(journalEntries, tenantId, from, to)),
    );
  }

  /**
   * Pending entries, newest entry date first, then by entry number.
   */
  async getPendingJournalEntries(
    tenantId: string,
    pagination: Pagination,
  ): Promise<PagedResult<JournalEntry>> {
    return getPaged(
      pagination,
      async (limit, offset) => {
        const rows = await this.db.query.journalEntries.findMany({
          where: (je) => pendingOf(je, tenantId),
          orderBy: (je) => [desc(je.entryDate), asc(je.entryId)],
          with: LISTED,
          limit,
          offset,
        });
        return rows.map(toJournalEntry);
      },
      () => this.count(pendingOf(journalEntries, tenantId)),
    );
  }

  /**
   * The number the tenant's next entry will get (1 when it has none).
   */
  async getNextEntryId(tenantId: string): Promise<number> {
    return nextEntryId(this.db, tenantId);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Post a pending entry.
   *
   * The note is replaced only by a non-blank note that differs from the
   * current one.
   *
   * @returns The refreshed detailed entry, or undefined when no entry has this id
   */
  async postJournalEntry(
    id: string,
    postDate: string,
    postedByUserId: string,
    note?: string,
  ): Promise<JournalEntry | undefined> {
    const storedPostDate = toStoredTimestamp(postDate, "postDate");

    return this.db.transaction(
      (tx) => {
        const row = findRow(tx, id);
        if (row === undefined) return undefined;
        assertPending(row, "post");

        const now = new Date().toISOString();
        const replaceNote = note !== undefined && note.trim() !== "" && note !== row.note;

        tx.update(journalEntries)
          .set({
            status: "posted",
            postDate: storedPostDate,
            posted: now,
            postedById: postedByUserId,
            updated: now,
            updatedById: postedByUserId,
            note: replaceNote ? note : row.note,
          })
          .where(eq(journalEntries.id, id))
          .run();

        return requireDetailed(tx, id);
      },
      { behavior: "immediate" },
    );
  }

  /**
   * Cancel a pending entry.
   *
   * @returns The refreshed detailed entry, or undefined when no entry has this id
   */
  async cancelJournalEntry(
    id: string,
    canceledByUserId: string,
  ): Promise<JournalEntry | undefined> {
    return this.db.transaction(
      (tx) => {
        const row = findRow(tx, id);
        if (row === undefined) return undefined;
        assertPending(row, "cancel");

        const now = new Date().toISOString();
        tx.update(journalEntries)
          .set({
            status: "canceled",
            canceled: now,
            canceledById: canceledByUserId,
            updated: now,
            updatedById: canceledByUserId,
          })
          .where(eq(journalEntries.id, id))
          .run();

        return requireDetailed(tx, id);
      },
      { behavior: "immediate" },
    );
  }

  /**
   * Edit a pending entry. Supplied lines replace all existing lines and
   * must balance.
   *
   * @returns The refreshed detailed entry, or undefined when no entry has this id
   */
  async updateJournalEntry(
    id: string,
    changes: JournalEntryChanges,
    updatedByUserId: string,
  ): Promise<JournalEntry | undefined> {
    if (changes.accounts !== undefined) {
      validateLines(changes.accounts);
    }
    const lines = changes.accounts;
    const entryDate =
      changes.entryDate === undefined ? undefined : toStoredTimestamp(changes.entryDate, "entryDate");

    return this.db.transaction(
      (tx) => {
        const row = findRow(tx, id);
        if (row === undefined) return undefined;
        assertPending(row, "update");

        tx.update(journalEntries)
          .set({
            entryDate: entryDate ?? row.entryDate,
            checkNumber: changes.checkNumber === undefined ? row.checkNumber : changes.checkNumber,
            description: changes.description ?? row.description,
            note: changes.note === undefined ? row.note : changes.note,
            updated: new Date().toISOString(),
            updatedById: updatedByUserId,
          })
          .where(eq(journalEntries.id, id))
          .run();

        if (lines !== undefined) {
          tx.delete(journalEntryAccounts).where(eq(journalEntryAccounts.journalEntryId, id)).run();
          insertLines(tx, id, lines);
        }

        return requireDetailed(tx, id);
      },
      { behavior: "immediate" },
    );
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private count(where: SQL | undefined): number {
    const row = this.db.select({ total: count() }).from(journalEntries).where(where).get();
    return row?.total ?? 0;
  }
}
