/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready  Readiness probe (200 when the database answers, else 503)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TenantRegistry } from "../services/tenant-registry.js";

export function createHealthRoutes(
  tenantRegistry: TenantRegistry,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = tenantRegistry.isReady();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        database: ready ? "ok" : "down",
        tenants: tenantRegistry.tenantIds().length,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
