/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired)
 * - Unsecured mode headers and defaults
 * - Permission guard (allowed, denied)
 * - Secured app end to end
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  requirePermission,
  signJwt,
  unsecuredAuthMiddleware,
  verifyJwt,
} from "../../src/middleware/auth.js";
import { createTestApp, entryBody, jsonRequest, seedBooks } from "../setup.js";

const JWT_SECRET = "test-secret";

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: keyMap,
      jwtSecret: JWT_SECRET,
      jwtIssuer: "tallybook",
    }),
  );
  app.get("/test", (c) => {
    const auth = c.get("auth");
    return c.json({ auth });
  });
  app.get("/admin-only", requirePermission("admin"), (c) => {
    return c.json({ ok: true });
  });
  app.get("/write-only", requirePermission("write"), (c) => {
    return c.json({ ok: true });
  });

  return app;
}

function inOneHour(): number {
  return Math.floor(Date.now() / 1000) + 3600;
}

describe("API Key auth", () => {
  it("authenticates with a valid API key", async () => {
    const app = makeApp([
      { key: "key-1", role: "operator", tenantId: "tenant-1", userId: "user-1" },
    ]);

    const res = await app.request("/test", {
      headers: { "X-Api-Key": "key-1" },
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({
      type: "api-key",
      identity: "key-1",
      role: "operator",
      tenantId: "tenant-1",
      userId: "user-1",
    });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp([
      { key: "key-1", role: "operator", tenantId: "tenant-1", userId: "user-1" },
    ]);

    const res = await app.request("/test", {
      headers: { "X-Api-Key": "invalid-key" },
    });

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("returns 401 when no auth is provided", async () => {
    const app = makeApp();
    const res = await app.request("/test");
    expect(res.status).toBe(401);
  });
});

describe("JWT Bearer auth", () => {
  it("authenticates with a valid JWT and takes the user from sub", async () => {
    const app = makeApp();

    const token = signJwt(
      { sub: "user-1", role: "admin", tenantId: "jwt-tenant", iss: "tallybook", exp: inOneHour() },
      JWT_SECRET,
    );

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({
      type: "jwt",
      identity: "user-1",
      role: "admin",
      tenantId: "jwt-tenant",
      userId: "user-1",
    });
  });

  it("returns 401 for an expired JWT", async () => {
    const app = makeApp();

    const token = signJwt(
      {
        sub: "user-1",
        role: "admin",
        tenantId: "jwt-tenant",
        iss: "tallybook",
        exp: Math.floor(Date.now() / 1000) - 100,
      },
      JWT_SECRET,
    );

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const app = makeApp();

    const token = signJwt(
      { sub: "user-1", role: "admin", tenantId: "jwt-tenant", iss: "tallybook", exp: inOneHour() },
      JWT_SECRET,
    );

    const tampered = token.slice(0, -5) + "XXXXX";

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${tampered}` },
    });

    expect(res.status).toBe(401);
  });
});

describe("verifyJwt", () => {
  it("returns undefined for malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for wrong issuer", () => {
    const token = signJwt(
      { sub: "user-1", role: "admin", tenantId: "t1", iss: "wrong-issuer", exp: inOneHour() },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, "tallybook")).toBeUndefined();
  });

  it("returns undefined for a token signed with another secret", () => {
    const token = signJwt(
      { sub: "user-1", role: "admin", tenantId: "t1", iss: "tallybook", exp: inOneHour() },
      "other-secret",
    );

    expect(verifyJwt(token, JWT_SECRET)).toBeUndefined();
  });

  it("returns the claims of a valid token", () => {
    const exp = inOneHour();
    const token = signJwt(
      { sub: "user-1", role: "viewer", tenantId: "t1", iss: "tallybook", exp, iat: 1700000000 },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, "tallybook")).toEqual({
      sub: "user-1",
      role: "viewer",
      tenantId: "t1",
      iss: "tallybook",
      exp,
      iat: 1700000000,
    });
  });
});

describe("unsecured mode", () => {
  function makeUnsecuredApp() {
    const app = new Hono<AppEnv>();
    app.use("*", unsecuredAuthMiddleware({ defaultTenantId: "t-default", defaultUserId: "u-default" }));
    app.get("/test", (c) => c.json({ auth: c.get("auth") }));
    return app;
  }

  it("acts as an admin of the tenant named in X-Tenant-Id", async () => {
    const res = await makeUnsecuredApp().request("/test", {
      headers: { "X-Tenant-Id": "t1", "X-User-Id": "u1" },
    });

    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({
      type: "unsecured",
      identity: "u1",
      role: "admin",
      tenantId: "t1",
      userId: "u1",
    });
  });

  it("falls back to the configured defaults", async () => {
    const res = await makeUnsecuredApp().request("/test");

    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth.tenantId).toBe("t-default");
    expect(body.auth.userId).toBe("u-default");
  });
});

describe("permission guard", () => {
  it("allows admin to access admin-only route", async () => {
    const app = makeApp([{ key: "admin-key", role: "admin", tenantId: "t1", userId: "u1" }]);

    const res = await app.request("/admin-only", {
      headers: { "X-Api-Key": "admin-key" },
    });
    expect(res.status).toBe(200);
  });

  it("denies viewer from admin-only route", async () => {
    const app = makeApp([{ key: "viewer-key", role: "viewer", tenantId: "t1", userId: "u1" }]);

    const res = await app.request("/admin-only", {
      headers: { "X-Api-Key": "viewer-key" },
    });
    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error.message).toBe("Role 'viewer' lacks 'admin' permission");
  });

  it("allows operator to access write routes", async () => {
    const app = makeApp([{ key: "op-key", role: "operator", tenantId: "t1", userId: "u1" }]);

    const res = await app.request("/write-only", {
      headers: { "X-Api-Key": "op-key" },
    });
    expect(res.status).toBe(200);
  });

  it("denies viewer from write routes", async () => {
    const app = makeApp([{ key: "viewer-key", role: "viewer", tenantId: "t1", userId: "u1" }]);

    const res = await app.request("/write-only", {
      headers: { "X-Api-Key": "viewer-key" },
    });
    expect(res.status).toBe(403);
  });
});

describe("secured app", () => {
  async function securedBooks() {
    const apiKeys = new Map<string, ApiKeyRecord>();
    const instance = createTestApp({ auth: { apiKeys } });
    const books = await seedBooks(instance);
    for (const [key, role] of [["op-key", "operator"], ["view-key", "viewer"]] as const) {
      apiKeys.set(key, { key, role, tenantId: books.tenant.id, userId: books.user.id });
    }
    return { app: instance.app, books };
  }

  it("rejects API calls without credentials", async () => {
    const { app } = await securedBooks();

    const res = await app.request("/api/v1/accounts");
    expect(res.status).toBe(401);
  });

  it("lets a viewer read the key's tenant but not write to it", async () => {
    const { app, books } = await securedBooks();

    const read = await app.request(jsonRequest("/api/v1/accounts", "GET", undefined, { "X-Api-Key": "view-key" }));
    expect(read.status).toBe(200);
    const body = (await read.json()) as { data: { accountNumber: number }[] };
    expect(body.data.map((a) => a.accountNumber)).toEqual([1000, 1100, 3000, 4000, 5000]);

    const write = await app.request(
      jsonRequest("/api/v1/journal-entries", "POST", entryBody(books.cash, books.sales, "10"), {
        "X-Api-Key": "view-key",
      }),
    );
    expect(write.status).toBe(403);
  });

  it("records the key's user as the creator", async () => {
    const { app, books } = await securedBooks();

    const res = await app.request(
      jsonRequest("/api/v1/journal-entries", "POST", entryBody(books.cash, books.sales, "10"), {
        "X-Api-Key": "op-key",
        // Ignored outside unsecured mode
        "X-Tenant-Id": books.otherTenant.id,
      }),
    );
    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { tenantId: string; createdById: string } };
    expect(body.data.tenantId).toBe(books.tenant.id);
    expect(body.data.createdById).toBe(books.user.id);
  });

  it("keeps the health probes public", async () => {
    const { app } = await securedBooks();

    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });
});
