/**
 * Shared fixtures for the ledger tests.
 */

import type { AccountType, AssetType, BalanceType } from "@tallybook/types";
import type { Posting, ReportAccount } from "../src/types.js";
import { NORMAL_BALANCE } from "../src/types.js";

export const USD: AssetType = {
  id: "usd",
  name: "USD",
  description: null,
  symbol: "$",
  decimals: 2,
};

export const GOLD: AssetType = {
  id: "gold",
  name: "Gold",
  description: "Troy ounces",
  symbol: null,
  decimals: 3,
};

export function account(
  id: string,
  accountNumber: number,
  name: string,
  accountType: AccountType,
  assetType: AssetType = USD,
): ReportAccount {
  return {
    id,
    tenantId: "tenant-1",
    accountNumber,
    name,
    description: null,
    accountType,
    normalBalance: NORMAL_BALANCE[accountType],
    assetTypeId: assetType.id,
    assetType,
    created: "2024-01-01T00:00:00.000Z",
    createdById: "user-1",
  };
}

export const CASH = account("cash", 1000, "Cash", "asset");
export const PAYABLE = account("ap", 2000, "Accounts Payable", "liability");
export const CAPITAL = account("capital", 3000, "Owner Capital", "equity");
export const SALES = account("sales", 4000, "Sales", "income");
export const RENT = account("rent", 5000, "Rent", "expense");
export const VAULT = account("vault", 1100, "Gold Vault", "asset", GOLD);
export const GOLD_CAPITAL = account("gold-capital", 3100, "Gold Capital", "equity", GOLD);

export const CHART: readonly ReportAccount[] = [
  SALES,
  CASH,
  RENT,
  PAYABLE,
  CAPITAL,
  VAULT,
  GOLD_CAPITAL,
];

export function posting(
  entryId: number,
  effectiveDate: string,
  accountId: string,
  entryType: BalanceType,
  amount: string,
  description = `Entry ${String(entryId)}`,
): Posting {
  return {
    journalEntryId: `je-${String(entryId)}`,
    entryId,
    effectiveDate,
    description,
    accountId,
    entryType,
    amount,
  };
}

/** Both sides of a two-line entry. */
export function transfer(
  entryId: number,
  effectiveDate: string,
  debitAccountId: string,
  creditAccountId: string,
  amount: string,
  description?: string,
): Posting[] {
  return [
    posting(entryId, effectiveDate, debitAccountId, "debit", amount, description),
    posting(entryId, effectiveDate, creditAccountId, "credit", amount, description),
  ];
}
