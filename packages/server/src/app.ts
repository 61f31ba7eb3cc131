/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { DataContext } from "@tallybook/data";
import type { AppEnv } from "./types/api-contract.js";
import { TenantRegistry } from "./services/tenant-registry.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { tenantMiddleware } from "./middleware/tenant.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAdminRoutes, createCurrentTenantRoutes } from "./routes/tenants.js";
import { createAccountRoutes, createAssetTypeRoutes } from "./routes/accounts.js";
import { createJournalEntryRoutes } from "./routes/journal-entries.js";
import type { PagingConfig } from "./routes/journal-entries.js";
import { createReportRoutes } from "./routes/reports.js";
import { createExportRoutes } from "./routes/export.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly dataContext: DataContext;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called with every error answered with a 500 */
  readonly onInternalError?: ((err: Error, c: Context<AppEnv>) => void) | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  /** Tenant used in unsecured mode when no X-Tenant-Id header is sent */
  readonly defaultTenantId?: string | undefined;
  /** User used in unsecured mode when no X-User-Id header is sent */
  readonly defaultUserId?: string | undefined;
  /** Default: 25 per page, at most 100 */
  readonly paging?: PagingConfig | undefined;
}

/** Route prefixes that act on a single tenant's books. */
const TENANT_SCOPED = [
  "/api/v1/tenant",
  "/api/v1/asset-types",
  "/api/v1/accounts",
  "/api/v1/journal-entries",
  "/api/v1/reports",
  "/api/v1/export",
] as const;

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly tenantRegistry: TenantRegistry;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const tenantRegistry = new TenantRegistry(options.dataContext);
  const paging = options.paging ?? { defaultPageSize: 25, maxPageSize: 100 };

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler({ onInternalError: options.onInternalError }));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `Route ${c.req.method} ${c.req.path} not found`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(tenantRegistry));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Tenant-Id / X-User-Id headers or defaults
    app.use(
      "/api/*",
      unsecuredAuthMiddleware({
        defaultTenantId: options.defaultTenantId,
        defaultUserId: options.defaultUserId,
      }),
    );
  }

  for (const prefix of TENANT_SCOPED) {
    app.use(`${prefix}/*`, tenantMiddleware(tenantRegistry));
  }

  // Mount v1 API routes
  app.route("/api/v1", createAdminRoutes(tenantRegistry));
  app.route("/api/v1/tenant", createCurrentTenantRoutes());
  app.route("/api/v1/asset-types", createAssetTypeRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/journal-entries", createJournalEntryRoutes(paging));
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/export", createExportRoutes());

  return { app, tenantRegistry };
}
