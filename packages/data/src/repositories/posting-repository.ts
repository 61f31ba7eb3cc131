/**
 * Posted lines for reports.
 *
 * Flattens every line of the tenant's posted entries with its entry's
 * number, effective date and description, in the shape the ledger report
 * builders take.
 */

import { and, asc, eq, gte, lte } from "drizzle-orm";
import type { Posting } from "@tallybook/ledger";
import type { DataContext, Db } from "../context.js";
import { toStoredTimestamp } from "../dates.js";
import { journalEntries, journalEntryAccounts } from "../schema.js";
import { effectiveDate } from "./journal-entry-repository.js";

export interface PostingRange {
  /** Inclusive lower bound; omitted means from the beginning */
  readonly from?: string | undefined;
  /** Inclusive upper bound; a date-only value covers that whole day */
  readonly to: string;
}

export class PostingRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  /**
   * Lines of posted entries with an effective date in range, ordered by
   * effective date then entry number.
   */
  async getPostedLines(tenantId: string, range: PostingRange): Promise<readonly Posting[]> {
    const effective = effectiveDate(journalEntries);
    const from = range.from === undefined ? undefined : toStoredTimestamp(range.from, "from");
    const to = toStoredTimestamp(range.to, "to", true);

    return this.db
      .select({
        journalEntryId: journalEntries.id,
        entryId: journalEntries.entryId,
        effectiveDate: effective,
        description: journalEntries.description,
        accountId: journalEntryAccounts.accountId,
        entryType: journalEntryAccounts.entryType,
        amount: journalEntryAccounts.amount,
      })
      .from(journalEntryAccounts)
      .innerJoin(journalEntries, eq(journalEntryAccounts.journalEntryId, journalEntries.id))
      .where(
        and(
          eq(journalEntries.tenantId, tenantId),
          eq(journalEntries.status, "posted"),
          from === undefined ? undefined : gte(effective, from),
          lte(effective, to),
        ),
      )
      .orderBy(asc(effective), asc(journalEntries.entryId), asc(journalEntryAccounts.id))
      .all();
  }
}
