/**
 * Asset type data access. Asset types are global: every tenant shares
 * the same list of units.
 */

import { randomUUID } from "node:crypto";
import { asc, eq } from "drizzle-orm";
import type { AssetType } from "@tallybook/types";
import type { DataContext, Db } from "../context.js";
import { RepositoryError } from "../errors.js";
import { toAssetType } from "../mappers.js";
import { assetTypes } from "../schema.js";

export interface NewAssetType {
  readonly name: string;
  readonly description?: string | null | undefined;
  readonly symbol?: string | null | undefined;
  /** Fractional digits amounts may carry (default 2) */
  readonly decimals?: number | undefined;
}

const MAX_DECIMALS = 18;

export class AssetTypeRepository {
  private readonly db: Db;

  constructor(ctx: DataContext) {
    this.db = ctx.db;
  }

  async create(input: NewAssetType): Promise<AssetType> {
    const decimals = input.decimals ?? 2;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
      throw new RepositoryError(
        "INVALID_ARGUMENT",
        `decimals must be an integer between 0 and ${String(MAX_DECIMALS)}`,
      );
    }

    return this.db.transaction(
      (tx) => {
        const existing = tx
          .select({ id: assetTypes.id })
          .from(assetTypes)
          .where(eq(assetTypes.name, input.name))
          .get();
        if (existing !== undefined) {
          throw new RepositoryError("DUPLICATE_KEY", `Asset type "${input.name}" already exists`);
        }

        const row = {
          id: randomUUID(),
          name: input.name,
          description: input.description ?? null,
          symbol: input.symbol ?? null,
          decimals,
        };
        tx.insert(assetTypes).values(row).run();
        return toAssetType(row);
      },
      { behavior: "immediate" },
    );
  }

  async getById(id: string): Promise<AssetType | undefined> {
    const row = this.db.select().from(assetTypes).where(eq(assetTypes.id, id)).get();
    return row === undefined ? undefined : toAssetType(row);
  }

  async getByName(name: string): Promise<AssetType | undefined> {
    const row = this.db.select().from(assetTypes).where(eq(assetTypes.name, name)).get();
    return row === undefined ? undefined : toAssetType(row);
  }

  async list(): Promise<readonly AssetType[]> {
    return this.db.select().from(assetTypes).orderBy(asc(assetTypes.name)).all().map(toAssetType);
  }
}
