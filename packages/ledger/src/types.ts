/**
 * @tallybook/ledger: Internal types for the ledger math and reports.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are decimal strings; arithmetic happens in bigint
 * - Fail-closed: malformed amounts throw, never silently succeed
 */

import type {
  Account,
  AccountType,
  AssetType,
  BalanceType,
} from "@tallybook/types";

// ─── Normal Balances ─────────────────────────────────────────────────────

/**
 * Map account types to their natural balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, BalanceType>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

// ─── Inputs ──────────────────────────────────────────────────────────────

/**
 * An account with its asset type resolved, as reports need it.
 */
export type ReportAccount = Account & { readonly assetType: AssetType };

/**
 * The minimum a line needs for the balanced-entry check.
 */
export interface BalanceLine {
  readonly assetTypeId: string;
  readonly entryType: BalanceType;
  readonly amount: string;
}

/**
 * A line of a posted journal entry, flattened with its entry's
 * number, effective date and description.
 */
export interface Posting {
  readonly journalEntryId: string;
  readonly entryId: number;
  /** post date, or entry date when unposted (ISO 8601) */
  readonly effectiveDate: string;
  readonly description: string;
  readonly accountId: string;
  readonly entryType: BalanceType;
  readonly amount: string;
}

/**
 * Inclusive date range, ISO 8601 strings.
 */
export interface DateRange {
  readonly start: string;
  readonly end: string;
}

// ─── Balance Check ───────────────────────────────────────────────────────

export interface AssetTypeTotals {
  readonly assetTypeId: string;
  readonly debits: string;
  readonly credits: string;
}

export interface BalanceCheck {
  /** True when there is at least one line and debits = credits per asset type. */
  readonly balanced: boolean;
  readonly totals: readonly AssetTypeTotals[];
}

// ─── Balances ────────────────────────────────────────────────────────────

/**
 * Balance of one account, in the account's normal direction.
 * Positive = normal direction, negative = contra.
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly accountNumber: number;
  readonly name: string;
  readonly accountType: AccountType;
  readonly assetType: string;
  readonly balance: string;
  readonly totalDebits: string;
  readonly totalCredits: string;
}

export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountNumber: number;
  readonly name: string;
  readonly accountType: AccountType;
  readonly assetType: string;
  readonly decimals: number;
  readonly debitBalance: string;
  readonly creditBalance: string;
}

/**
 * Total debits MUST equal total credits (per asset type).
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  readonly balanced: boolean;
}

// ─── Statements ──────────────────────────────────────────────────────────

/** An amount tagged with the asset type it is expressed in. */
export interface AssetTypeAmount {
  readonly assetType: string;
  readonly decimals: number;
  readonly amount: string;
}

/**
 * A statement line. Computed lines (retained earnings, net income)
 * carry no account.
 */
export interface ReportLine {
  readonly accountId: string | null;
  readonly accountNumber: number | null;
  readonly name: string;
  readonly assetType: string;
  readonly amount: string;
}

export interface ReportSection {
  readonly title: string;
  readonly lines: readonly ReportLine[];
  readonly totals: readonly AssetTypeAmount[];
}

export interface BalanceSheet {
  readonly start: string;
  readonly end: string;
  readonly assets: ReportSection;
  readonly liabilities: ReportSection;
  readonly equity: ReportSection;
  readonly totalLiabilitiesAndEquity: readonly AssetTypeAmount[];
  /** Assets = Liabilities + Equity for every asset type. */
  readonly balanced: boolean;
}

export interface ProfitAndLoss {
  readonly start: string;
  readonly end: string;
  readonly income: ReportSection;
  readonly expenses: ReportSection;
  readonly netIncome: readonly AssetTypeAmount[];
}

export interface LedgerReportLine {
  readonly journalEntryId: string;
  readonly entryId: number;
  readonly date: string;
  readonly description: string;
  readonly debit: string | null;
  readonly credit: string | null;
  /** Running balance in the account's normal direction */
  readonly balance: string;
}

export interface LedgerReportAccount {
  readonly accountId: string;
  readonly accountNumber: number;
  readonly name: string;
  readonly accountType: AccountType;
  readonly normalBalance: BalanceType;
  readonly assetType: string;
  readonly startingBalance: string;
  readonly lines: readonly LedgerReportLine[];
  readonly endingBalance: string;
}

export interface LedgerReport {
  readonly start: string;
  readonly end: string;
  readonly accounts: readonly LedgerReportAccount[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger math. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "EMPTY_ENTRY"
  | "UNBALANCED_ENTRY"
  | "UNKNOWN_ACCOUNT";

/**
 * Structured error from the ledger math.
 * Always thrown; never returned as an error code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
