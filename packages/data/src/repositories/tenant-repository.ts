/**
 * Tenant data access.
 */

import { randomUUID } from "node:crypto";
import { asc, eq } from "drizzle-orm";
import type { Tenant } from "@tallybook/types";
import type { DataContext, Db } from "../context.js";
import { RepositoryError } from "../errors.js";
import { toTenant } from "../mappers.js";
import { tenants } from "../schema.js";

export class TenantRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  async create(name: string): Promise<Tenant> {
    if (name.trim() === "") {
      throw new RepositoryError("INVALID_ARGUMENT", "Tenant name must not be empty");
    }

    const row = { id: randomUUID(), name: name.trim(), created: new Date().toISOString() };
    this.db.insert(tenants).values(row).run();
    return toTenant(row);
  }

  async getById(id: string): Promise<Tenant | undefined> {
    const row = this.db.select().from(tenants).where(eq(tenants.id, id)).get();
    return row === undefined ? undefined : toTenant(row);
  }

  async list(): Promise<readonly Tenant[]> {
    return this.db.select().from(tenants).orderBy(asc(tenants.name)).all().map(toTenant);
  }
}
