/**
 * Tests for TenantRegistry.
 */

import { describe, it, expect } from "vitest";
import { createDataContext } from "@tallybook/data";
import { TenantRegistry } from "../src/services/tenant-registry.js";

describe("TenantRegistry", () => {
  it("get() returns undefined for an unknown tenant", async () => {
    const registry = new TenantRegistry(createDataContext());
    expect(await registry.get("nonexistent")).toBeUndefined();
    expect(registry.has("nonexistent")).toBe(false);
  });

  it("get() creates one service per existing tenant and reuses it", async () => {
    const registry = new TenantRegistry(createDataContext());
    const tenant = await registry.repositories.tenants.create("Acme Books");

    const first = await registry.get(tenant.id);
    const second = await registry.get(tenant.id);

    expect(first).toBeDefined();
    expect(first).toBe(second);
    expect(first?.tenantId).toBe(tenant.id);
    expect(registry.tenantIds()).toEqual([tenant.id]);
  });

  it("createTenant() stores the tenant and initializes its service", async () => {
    const registry = new TenantRegistry(createDataContext());

    const tenant = await registry.createTenant("  Acme Books ");

    expect(tenant.name).toBe("Acme Books");
    expect(registry.has(tenant.id)).toBe(true);
    expect(await registry.repositories.tenants.getById(tenant.id)).toEqual(tenant);
  });

  it("keeps tenants' services apart", async () => {
    const registry = new TenantRegistry(createDataContext());
    const a = await registry.createTenant("A");
    const b = await registry.createTenant("B");

    expect(registry.getOrCreate(a.id)).not.toBe(registry.getOrCreate(b.id));
    expect((await registry.getOrCreate(b.id).getTenant()).name).toBe("B");
  });

  it("stopAll() clears the registry and closes the database", async () => {
    const registry = new TenantRegistry(createDataContext());
    registry.getOrCreate("t1");
    registry.getOrCreate("t2");

    expect(registry.tenantIds().length).toBe(2);
    expect(registry.isReady()).toBe(true);

    await registry.stopAll();

    expect(registry.tenantIds().length).toBe(0);
    expect(registry.has("t1")).toBe(false);
    expect(registry.isReady()).toBe(false);
  });
});
