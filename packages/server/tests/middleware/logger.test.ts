/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, entryBody, jsonRequest, seedBooks } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("logs health checks without a tenant", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toHaveLength(1);
    expect(entries[0]!.method).toBe("GET");
    expect(entries[0]!.path).toBe("/health");
    expect(entries[0]!.status).toBe(200);
    expect(entries[0]!.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]!.requestId).toBe("req-1");
    expect(entries[0]!.tenantId).toBeUndefined();
    expect(entries[0]!.userId).toBeUndefined();
  });

  it("logs the caller's tenant and user", async () => {
    const entries: RequestLogEntry[] = [];
    const instance = createTestApp({ logFn: (entry) => entries.push(entry) });
    const books = await seedBooks(instance);

    await instance.app.request(
      jsonRequest(
        "/api/v1/journal-entries",
        "POST",
        entryBody(books.cash, books.sales, "5"),
        books.headers,
      ),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]!.method).toBe("POST");
    expect(entries[0]!.path).toBe("/api/v1/journal-entries");
    expect(entries[0]!.status).toBe(201);
    expect(entries[0]!.tenantId).toBe(books.tenant.id);
    expect(entries[0]!.userId).toBe(books.user.id);
  });

  it("logs error responses", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/api/v1/accounts");

    expect(entries).toHaveLength(1);
    expect(entries[0]!.status).toBe(400);
  });
});
