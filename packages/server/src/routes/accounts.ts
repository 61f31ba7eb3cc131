/**
 * Chart of accounts and asset types.
 *
 * GET  /api/v1/accounts                 Chart of accounts, by number
 * POST /api/v1/accounts                 Create an account
 * GET  /api/v1/accounts/:accountNumber  One account
 * GET  /api/v1/asset-types              List asset types
 * POST /api/v1/asset-types              Create an asset type (admin)
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema, CreateAssetTypeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

const AccountNumberParam = z.coerce.number().int().min(1);

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), async (c) => {
    const service = c.get("service");
    return c.json({ data: await service.listAccounts() });
  });

  routes.post(
    "/",
    requirePermission("write"),
    validateBody(CreateAccountSchema),
    async (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");
      const account = await service.createAccount(body, c.get("auth").userId);
      return c.json({ data: account }, 201);
    },
  );

  routes.get("/:accountNumber", requirePermission("read"), async (c) => {
    const service = c.get("service");
    const accountNumber = AccountNumberParam.parse(c.req.param("accountNumber"));
    return c.json({ data: await service.getAccount(accountNumber) });
  });

  return routes;
}

export function createAssetTypeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), async (c) => {
    const service = c.get("service");
    return c.json({ data: await service.listAssetTypes() });
  });

  routes.post(
    "/",
    requirePermission("admin"),
    validateBody(CreateAssetTypeSchema),
    async (c) => {
      const service = c.get("service");
      const assetType = await service.createAssetType(c.get("validatedBody"));
      return c.json({ data: assetType }, 201);
    },
  );

  return routes;
}
