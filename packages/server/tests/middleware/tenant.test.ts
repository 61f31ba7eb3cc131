/**
 * Tests for tenant middleware.
 *
 * Verifies:
 * - The tenant comes from the auth context (X-Tenant-Id in unsecured mode)
 * - Missing and unknown tenants are refused
 * - Tenants' books are isolated
 */

import { describe, it, expect } from "vitest";
import { createDataContext, TenantRepository } from "@tallybook/data";
import { createApp } from "../../src/app.js";
import { createTestApp, entryBody, jsonRequest, seedBooks } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string };
}

describe("tenant middleware (unsecured mode)", () => {
  it("returns 400 when no tenant is selected", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/accounts");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "No tenant selected" });
  });

  it("returns 404 for a tenant that does not exist", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/tenant", "GET", undefined, { "X-Tenant-Id": "no-such-tenant" }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Tenant 'no-such-tenant' not found");
  });

  it("uses the configured default tenant", async () => {
    const dataContext = createDataContext();
    const tenant = await new TenantRepository(dataContext).create("Default Books");
    const { app } = createApp({ dataContext, defaultTenantId: tenant.id });

    const res = await app.request("/api/v1/tenant");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { name: string } };
    expect(body.data.name).toBe("Default Books");
  });

  it("reports the selected tenant", async () => {
    const instance = createTestApp();
    const books = await seedBooks(instance);

    const res = await instance.app.request(
      jsonRequest("/api/v1/tenant", "GET", undefined, books.headers),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { id: string; name: string } };
    expect(body.data.id).toBe(books.tenant.id);
    expect(body.data.name).toBe("Acme Books");
  });

  it("keeps each tenant's accounts and entries apart", async () => {
    const instance = createTestApp();
    const { app } = instance;
    const books = await seedBooks(instance);
    const otherHeaders = { "X-Tenant-Id": books.otherTenant.id, "X-User-Id": books.user.id };

    const created = await app.request(
      jsonRequest("/api/v1/journal-entries", "POST", entryBody(books.cash, books.sales, "10"), books.headers),
    );
    expect(created.status).toBe(201);

    const otherAccounts = await app.request(
      jsonRequest("/api/v1/accounts", "GET", undefined, otherHeaders),
    );
    expect(((await otherAccounts.json()) as { data: unknown[] }).data).toEqual([]);

    const otherPending = await app.request(
      jsonRequest("/api/v1/journal-entries/pending", "GET", undefined, otherHeaders),
    );
    expect(((await otherPending.json()) as { pagination: { total: number } }).pagination.total).toBe(0);

    // The other tenant cannot book against this tenant's accounts
    const crossed = await app.request(
      jsonRequest("/api/v1/journal-entries", "POST", entryBody(books.cash, books.sales, "10"), otherHeaders),
    );
    expect(crossed.status).toBe(400);
    expect(((await crossed.json()) as ErrorBody).error.code).toBe("UNKNOWN_ACCOUNT");
  });
});
