/**
 * Financial report routes.
 *
 * GET /api/v1/reports/balance-sheet?dateRangeStart&dateRangeEnd
 * GET /api/v1/reports/profit-and-loss?dateRangeStart&dateRangeEnd
 * GET /api/v1/reports/ledger?dateRangeStart&dateRangeEnd[&accountNumber]
 * GET /api/v1/reports/trial-balance[?asOf]
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DateRangeQuerySchema,
  LedgerQuerySchema,
  TrialBalanceQuerySchema,
} from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/balance-sheet", validateQuery(DateRangeQuerySchema), async (c) => {
    const service = c.get("service");
    const { dateRangeStart, dateRangeEnd } = c.get("validatedQuery");
    const report = await service.getBalanceSheet({ start: dateRangeStart, end: dateRangeEnd });
    return c.json({ data: report });
  });

  routes.get("/profit-and-loss", validateQuery(DateRangeQuerySchema), async (c) => {
    const service = c.get("service");
    const { dateRangeStart, dateRangeEnd } = c.get("validatedQuery");
    const report = await service.getProfitAndLoss({ start: dateRangeStart, end: dateRangeEnd });
    return c.json({ data: report });
  });

  routes.get("/ledger", validateQuery(LedgerQuerySchema), async (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    const report = await service.getLedger(
      { start: query.dateRangeStart, end: query.dateRangeEnd },
      query.accountNumber,
    );
    return c.json({ data: report });
  });

  routes.get("/trial-balance", validateQuery(TrialBalanceQuerySchema), async (c) => {
    const service = c.get("service");
    const asOf = c.get("validatedQuery").asOf ?? new Date().toISOString();
    return c.json({ data: await service.getTrialBalance(asOf) });
  });

  return routes;
}
