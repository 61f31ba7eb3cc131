/**
 * Journal entry routes.
 *
 * GET    /api/v1/journal-entries                 Entries in a date range (paged)
 * GET    /api/v1/journal-entries/pending         Pending entries (paged)
 * GET    /api/v1/journal-entries/next-entry-id   Number the next entry will get
 * GET    /api/v1/journal-entries/:entryId        One entry, with ETag
 * POST   /api/v1/journal-entries                 Create a pending entry
 * PUT    /api/v1/journal-entries/:entryId        Edit a pending entry (If-Match)
 * POST   /api/v1/journal-entries/:entryId/post   Post a pending entry
 * DELETE /api/v1/journal-entries/:entryId        Cancel a pending entry
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateJournalEntrySchema,
  ListJournalEntriesQuerySchema,
  PaginationQuerySchema,
  PostJournalEntrySchema,
  UpdateJournalEntrySchema,
} from "../types/dto.js";
import type { PaginationQuery } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { checkIfMatch, isNotModified, setETag } from "../middleware/etag.js";
import { toPaginatedResponse } from "../types/pagination.js";

const EntryIdParam = z.coerce.number().int().min(1);

export interface PagingConfig {
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
}

export function createJournalEntryRoutes(paging: PagingConfig): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  /** Requested page size, defaulted and capped. */
  const pageOf = (query: PaginationQuery) => ({
    pageNumber: query.pageNumber,
    pageSize: Math.min(query.pageSize ?? paging.defaultPageSize, paging.maxPageSize),
  });

  // ─── Listings ──────────────────────────────────────────────────────

  routes.get(
    "/",
    requirePermission("read"),
    validateQuery(ListJournalEntriesQuerySchema),
    async (c) => {
      const service = c.get("service");
      const query = c.get("validatedQuery");
      const page = await service.listJournalEntries(
        { start: query.dateRangeStart, end: query.dateRangeEnd },
        pageOf(query),
      );
      return c.json(toPaginatedResponse(page));
    },
  );

  routes.get(
    "/pending",
    requirePermission("read"),
    validateQuery(PaginationQuerySchema),
    async (c) => {
      const service = c.get("service");
      const page = await service.listPendingJournalEntries(pageOf(c.get("validatedQuery")));
      return c.json(toPaginatedResponse(page));
    },
  );

  routes.get("/next-entry-id", requirePermission("read"), async (c) => {
    const service = c.get("service");
    return c.json({ data: { nextEntryId: await service.getNextEntryId() } });
  });

  // ─── Single Entry ──────────────────────────────────────────────────

  routes.get("/:entryId", requirePermission("read"), async (c) => {
    const service = c.get("service");
    const entry = await service.getJournalEntry(EntryIdParam.parse(c.req.param("entryId")));

    setETag(c, entry);
    if (isNotModified(c, entry)) {
      return c.body(null, 304);
    }
    return c.json({ data: entry });
  });

  routes.post(
    "/",
    requirePermission("write"),
    validateBody(CreateJournalEntrySchema),
    async (c) => {
      const service = c.get("service");
      const entry = await service.createJournalEntry(
        c.get("validatedBody"),
        c.get("auth").userId,
      );

      setETag(c, entry);
      return c.json({ data: entry }, 201);
    },
  );

  routes.put(
    "/:entryId",
    requirePermission("write"),
    validateBody(UpdateJournalEntrySchema),
    async (c) => {
      const service = c.get("service");
      const entryId = EntryIdParam.parse(c.req.param("entryId"));

      const current = await service.getJournalEntry(entryId);
      const mismatch = checkIfMatch(c, current);
      if (mismatch !== undefined) {
        return mismatch;
      }

      const entry = await service.updateJournalEntry(
        entryId,
        c.get("validatedBody"),
        c.get("auth").userId,
      );

      setETag(c, entry);
      return c.json({ data: entry });
    },
  );

  // ─── Lifecycle ─────────────────────────────────────────────────────

  routes.post(
    "/:entryId/post",
    requirePermission("write"),
    validateBody(PostJournalEntrySchema),
    async (c) => {
      const service = c.get("service");
      const entry = await service.postJournalEntry(
        EntryIdParam.parse(c.req.param("entryId")),
        c.get("validatedBody"),
        c.get("auth").userId,
      );

      setETag(c, entry);
      return c.json({ data: entry });
    },
  );

  routes.delete("/:entryId", requirePermission("write"), async (c) => {
    const service = c.get("service");
    const entry = await service.cancelJournalEntry(
      EntryIdParam.parse(c.req.param("entryId")),
      c.get("auth").userId,
    );

    setETag(c, entry);
    return c.json({ data: entry });
  });

  return routes;
}
