/**
 * Financial Types
 *
 * Chart-of-accounts primitives for double-entry bookkeeping.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - The unit of an amount is always explicit (an AssetType)
 * - Direction is carried by BalanceType, never by the sign of an amount
 */

/**
 * The five fundamental account types.
 */
export type AccountType = "asset" | "liability" | "equity" | "income" | "expense";

/**
 * Debit or credit. Used both for a line's direction and for an
 * account's normal balance.
 */
export type BalanceType = "debit" | "credit";

/**
 * The unit an amount is expressed in: a currency, a commodity, a token.
 */
export interface AssetType {
  readonly id: string;

  /** Short unique name (e.g. "USD", "EUR", "BTC") */
  readonly name: string;

  readonly description: string | null;

  /** Display symbol (e.g. "$") */
  readonly symbol: string | null;

  /** Number of decimal places amounts in this unit may carry. */
  readonly decimals: number;
}

/**
 * An account in a tenant's chart of accounts.
 */
export interface Account {
  readonly id: string;
  readonly tenantId: string;

  /** Unique within the tenant; orders the chart of accounts. */
  readonly accountNumber: number;

  readonly name: string;
  readonly description: string | null;
  readonly accountType: AccountType;

  /** Direction in which the account increases. */
  readonly normalBalance: BalanceType;

  readonly assetTypeId: string;
  readonly assetType?: AssetType | undefined;

  /** ISO 8601 timestamp */
  readonly created: string;
  readonly createdById: string;
}
