/**
 * Report download.
 *
 * GET /api/v1/export?report&format&dateRangeStart&dateRangeEnd
 *
 * report: balance-sheet | profit-and-loss | ledger | journal-entries
 * format: csv (default) | xlsx | pdf
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ExportQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { exportReport } from "../services/export-service.js";

export function createExportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get(
    "/",
    requirePermission("read"),
    validateQuery(ExportQuerySchema),
    async (c) => {
      const service = c.get("service");
      const query = c.get("validatedQuery");

      const file = await exportReport(service, query.report, query.format, {
        start: query.dateRangeStart,
        end: query.dateRangeEnd,
      });

      return c.body(file.body, 200, {
        "Content-Type": file.contentType,
        "Content-Disposition": `attachment; filename="${file.fileName}"`,
      });
    },
  );

  return routes;
}
