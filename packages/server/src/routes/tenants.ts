/**
 * Tenant and user administration.
 *
 * GET  /api/v1/tenants     List tenants
 * POST /api/v1/tenants     Create a tenant
 * POST /api/v1/users       Create a user
 * GET  /api/v1/users/:id   Get a user
 * GET  /api/v1/tenant      The caller's tenant
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateTenantSchema, CreateUserSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import type { TenantRegistry } from "../services/tenant-registry.js";

/**
 * Admin-only routes that work across tenants.
 */
export function createAdminRoutes(tenantRegistry: TenantRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { tenants, users } = tenantRegistry.repositories;

  const admin = requirePermission("admin");

  routes.get("/tenants", admin, async (c) => {
    return c.json({ data: await tenants.list() });
  });

  routes.post("/tenants", admin, validateBody(CreateTenantSchema), async (c) => {
    const body = c.get("validatedBody");
    const tenant = await tenantRegistry.createTenant(body.name);
    return c.json({ data: tenant }, 201);
  });

  routes.post("/users", admin, validateBody(CreateUserSchema), async (c) => {
    const body = c.get("validatedBody");
    const user = await users.create(body);
    return c.json({ data: user }, 201);
  });

  routes.get("/users/:id", admin, async (c) => {
    const id = c.req.param("id");
    const user = await users.getById(id);
    if (user === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `User '${id}' not found`), 404);
    }
    return c.json({ data: user });
  });

  return routes;
}

/**
 * The caller's own tenant. Mounted behind the tenant middleware.
 */
export function createCurrentTenantRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), async (c) => {
    const service = c.get("service");
    return c.json({ data: await service.getTenant() });
  });

  return routes;
}
