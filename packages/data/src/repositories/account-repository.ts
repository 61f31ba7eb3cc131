/**
 * Chart-of-accounts data access.
 *
 * Account numbers are unique within a tenant. The normal balance
 * defaults from the account type.
 */

import { randomUUID } from "node:crypto";
import { and, asc, eq } from "drizzle-orm";
import type { Account, AccountType, BalanceType } from "@tallybook/types";
import { NORMAL_BALANCE } from "@tallybook/ledger";
import type { DataContext, Db } from "../context.js";
import { RepositoryError } from "../errors.js";
import { toAccount } from "../mappers.js";
import { accounts, assetTypes, tenants } from "../schema.js";

export interface NewAccount {
  readonly tenantId: string;
  readonly accountNumber: number;
  readonly name: string;
  readonly description?: string | null | undefined;
  readonly accountType: AccountType;
  /** Defaults to the account type's normal balance */
  readonly normalBalance?: BalanceType | undefined;
  readonly assetTypeId: string;
  readonly createdById: string;
}

export class AccountRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  /**
   * Create an account.
   *
   * Throws RepositoryError("INVALID_ARGUMENT") for an unknown tenant or
   * asset type, RepositoryError("DUPLICATE_KEY") when the tenant already
   * has an account with that number.
   */
  async create(input: NewAccount): Promise<Account> {
    if (!Number.isInteger(input.accountNumber) || input.accountNumber < 1) {
      throw new RepositoryError("INVALID_ARGUMENT", "accountNumber must be a positive integer");
    }

    return this.db.transaction(
      (tx) => {
        const tenant = tx
          .select({ id: tenants.id })
          .from(tenants)
          .where(eq(tenants.id, input.tenantId))
          .get();
        if (tenant === undefined) {
          throw new RepositoryError("INVALID_ARGUMENT", `Tenant not found: "${input.tenantId}"`);
        }

        const assetType = tx
          .select()
          .from(assetTypes)
          .where(eq(assetTypes.id, input.assetTypeId))
          .get();
        if (assetType === undefined) {
          throw new RepositoryError(
            "INVALID_ARGUMENT",
            `Asset type not found: "${input.assetTypeId}"`,
          );
        }

        const existing = tx
          .select({ id: accounts.id })
          .from(accounts)
          .where(
            and(
              eq(accounts.tenantId, input.tenantId),
              eq(accounts.accountNumber, input.accountNumber),
            ),
          )
          .get();
        if (existing !== undefined) {
          throw new RepositoryError(
            "DUPLICATE_KEY",
            `Account number ${String(input.accountNumber)} already exists`,
          );
        }

        const row = {
          id: randomUUID(),
          tenantId: input.tenantId,
          accountNumber: input.accountNumber,
          name: input.name,
          description: input.description ?? null,
          accountType: input.accountType,
          normalBalance: input.normalBalance ?? NORMAL_BALANCE[input.accountType],
          assetTypeId: input.assetTypeId,
          created: new Date().toISOString(),
          createdById: input.createdById,
        };
        tx.insert(accounts).values(row).run();
        return toAccount({ ...row, assetType });
      },
      { behavior: "immediate" },
    );
  }

  async getById(id: string): Promise<Account | undefined> {
    const row = await this.db.query.accounts.findFirst({
      where: (a) => eq(a.id, id),
      with: { assetType: true },
    });
    return row === undefined ? undefined : toAccount(row);
  }

  async getByTenantAndNumber(tenantId: string, accountNumber: number): Promise<Account | undefined> {
    const row = await this.db.query.accounts.findFirst({
      where: (a) => and(eq(a.tenantId, tenantId), eq(a.accountNumber, accountNumber)),
      with: { assetType: true },
    });
    return row === undefined ? undefined : toAccount(row);
  }

  /**
   * The tenant's chart of accounts, ordered by account number.
   */
  async getByTenant(tenantId: string): Promise<readonly Account[]> {
    const rows = await this.db.query.accounts.findMany({
      where: (a) => eq(a.tenantId, tenantId),
      orderBy: (a) => [asc(a.accountNumber)],
      with: { assetType: true },
    });
    return rows.map(toAccount);
  }
}
