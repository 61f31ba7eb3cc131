/**
 * TenantRegistry: Maps tenant IDs to AccountingService instances.
 *
 * All tenants share one data context and one set of repositories;
 * each service scopes every query to its own tenant.
 */

import type { DataContext } from "@tallybook/data";
import type { Tenant } from "@tallybook/types";
import { AccountingService, createRepositories } from "./accounting-service.js";
import type { Repositories } from "./accounting-service.js";

export class TenantRegistry {
  readonly repositories: Repositories;
  private readonly _tenants = new Map<string, AccountingService>();
  private readonly _ctx: DataContext;

  constructor(ctx: DataContext) {
    this._ctx = ctx;
    this.repositories = createRepositories(ctx);
  }

  /**
   * Get the service for an existing tenant, creating it on first use.
   *
   * @returns undefined when no tenant has this ID
   */
  async get(tenantId: string): Promise<AccountingService | undefined> {
    const cached = this._tenants.get(tenantId);
    if (cached !== undefined) {
      return cached;
    }

    const tenant = await this.repositories.tenants.getById(tenantId);
    if (tenant === undefined) {
      return undefined;
    }
    return this.getOrCreate(tenant.id);
  }

  /**
   * Get or lazily create the service instance for a tenant ID,
   * without checking that the tenant exists.
   */
  getOrCreate(tenantId: string): AccountingService {
    let service = this._tenants.get(tenantId);
    if (service === undefined) {
      service = new AccountingService(tenantId, this.repositories);
      this._tenants.set(tenantId, service);
    }
    return service;
  }

  /**
   * Create a tenant and its service.
   */
  async createTenant(name: string): Promise<Tenant> {
    const tenant = await this.repositories.tenants.create(name);
    this.getOrCreate(tenant.id);
    return tenant;
  }

  /**
   * Check if a tenant has been initialized.
   */
  has(tenantId: string): boolean {
    return this._tenants.has(tenantId);
  }

  /**
   * Get all initialized tenant IDs.
   */
  tenantIds(): readonly string[] {
    return [...this._tenants.keys()];
  }

  /**
   * True when the shared database answers. A closed database is not ready.
   */
  isReady(): boolean {
    try {
      return this._ctx.ping();
    } catch {
      return false;
    }
  }

  /**
   * Drop all tenant services and close the database.
   */
  async stopAll(): Promise<void> {
    this._tenants.clear();
    this._ctx.close();
  }
}
