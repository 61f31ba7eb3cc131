/**
 * Test helpers for @tallybook/server.
 *
 * Provides a test app factory that creates a Hono app with all
 * middleware and routes over an in-memory database, but no HTTP server.
 */

import { createDataContext } from "@tallybook/data";
import type { Account, AssetType, Tenant, User } from "@tallybook/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

/**
 * Create a test app (unsecured mode) over a fresh in-memory database.
 */
export function createTestApp(
  options: Partial<Omit<CreateAppOptions, "dataContext">> = {},
): AppInstance {
  return createApp({ dataContext: createDataContext(), ...options });
}

export interface Books {
  readonly tenant: Tenant;
  readonly otherTenant: Tenant;
  readonly user: User;
  readonly usd: AssetType;
  readonly gold: AssetType;
  readonly cash: Account;
  readonly capital: Account;
  readonly sales: Account;
  readonly rent: Account;
  readonly vault: Account;
  /** Unsecured-mode headers selecting the tenant and user */
  readonly headers: Record<string, string>;
}

/**
 * Seed two tenants, a user, USD and Gold, and a small chart of
 * accounts for the first tenant.
 */
export async function seedBooks(instance: AppInstance): Promise<Books> {
  const { tenants, users, assetTypes, accounts } = instance.tenantRegistry.repositories;

  const tenant = await tenants.create("Acme Books");
  const otherTenant = await tenants.create("Other Books");
  const user = await users.create({ email: "clerk@example.com", firstName: "Pat", lastName: "Clerk" });
  const usd = await assetTypes.create({ name: "USD", symbol: "$", decimals: 2 });
  const gold = await assetTypes.create({ name: "Gold", description: "Troy ounces", decimals: 3 });

  const base = { tenantId: tenant.id, createdById: user.id, assetTypeId: usd.id };
  const cash = await accounts.create({ ...base, accountNumber: 1000, name: "Cash", accountType: "asset" });
  const capital = await accounts.create({ ...base, accountNumber: 3000, name: "Capital", accountType: "equity" });
  const sales = await accounts.create({ ...base, accountNumber: 4000, name: "Sales", accountType: "income" });
  const rent = await accounts.create({ ...base, accountNumber: 5000, name: "Rent", accountType: "expense" });
  const vault = await accounts.create({
    ...base,
    accountNumber: 1100,
    name: "Gold Vault",
    accountType: "asset",
    assetTypeId: gold.id,
  });

  return {
    tenant,
    otherTenant,
    user,
    usd,
    gold,
    cash,
    capital,
    sales,
    rent,
    vault,
    headers: { "X-Tenant-Id": tenant.id, "X-User-Id": user.id },
  };
}

/**
 * Request body for a balanced two-line entry.
 */
export function entryBody(
  debit: Account,
  credit: Account,
  amount: string,
  entryDate = "2024-01-10",
  description = "Cash sale",
): Record<string, unknown> {
  return {
    entryDate,
    description,
    accounts: [
      { accountId: debit.id, entryType: "debit", amount },
      { accountId: credit.id, entryType: "credit", amount },
    ],
  };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Record a year-end and a January of activity through the API:
 *
 * | # | Date       | Debit       | Credit        | Amount | Status  |
 * |---|------------|-------------|---------------|--------|---------|
 * | 1 | 2023-12-15 | 1000 Cash   | 3000 Capital  | 500    | posted  |
 * | 2 | 2023-12-20 | 1000 Cash   | 4000 Sales    | 100    | posted  |
 * | 3 | 2024-01-10 | 1000 Cash   | 4000 Sales    | 250    | posted  |
 * | 4 | 2024-01-15 | 5000 Rent   | 1000 Cash     | 80     | posted  |
 * | 5 | 2024-01-20 | 1000 Cash   | 4000 Sales    | 999    | pending |
 */
export async function seedActivity(instance: AppInstance, books: Books): Promise<void> {
  const entries: [Account, Account, string, string, string, boolean][] = [
    [books.cash, books.capital, "500", "2023-12-15", "Owner investment", true],
    [books.cash, books.sales, "100", "2023-12-20", "December sale", true],
    [books.cash, books.sales, "250", "2024-01-10", "January sale", true],
    [books.rent, books.cash, "80", "2024-01-15", "January rent", true],
    [books.cash, books.sales, "999", "2024-01-20", "Unconfirmed sale", false],
  ];

  for (const [debit, credit, amount, date, description, posted] of entries) {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/journal-entries",
        "POST",
        entryBody(debit, credit, amount, date, description),
        books.headers,
      ),
    );
    if (res.status !== 201) {
      throw new Error(`Seeding "${description}" failed with ${String(res.status)}`);
    }
    if (!posted) continue;

    const { data } = (await res.json()) as { data: { entryId: number } };
    const post = await instance.app.request(
      jsonRequest(
        `/api/v1/journal-entries/${String(data.entryId)}/post`,
        "POST",
        { postDate: date },
        books.headers,
      ),
    );
    if (post.status !== 200) {
      throw new Error(`Posting "${description}" failed with ${String(post.status)}`);
    }
  }
}
