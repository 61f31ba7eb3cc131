/**
 * Multi-tenancy middleware.
 *
 * Resolves the current tenant from the authenticated context
 * (set by auth middleware) and provides that tenant's
 * AccountingService via c.set("service").
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TenantRegistry } from "../services/tenant-registry.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Create tenant resolution middleware.
 *
 * Must run AFTER auth middleware. Returns 400 when no tenant was
 * selected and 404 when the tenant does not exist.
 */
export function tenantMiddleware(
  tenantRegistry: TenantRegistry,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const { tenantId } = c.get("auth");
    if (tenantId === "") {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "No tenant selected"),
        400,
      );
    }

    const service = await tenantRegistry.get(tenantId);
    if (service === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Tenant '${tenantId}' not found`),
        404,
      );
    }

    c.set("service", service);
    return next();
  };
}
