/**
 * @tallybook/ledger: Double-entry math and financial statements.
 *
 * A pure TypeScript library with no runtime dependencies beyond the
 * shared types. Enforces double-entry accounting invariants:
 * - Every journal entry balances (debits = credits per asset type)
 * - All monetary arithmetic uses bigint (no floating point)
 * - Balances are tracked per asset type, never converted
 */

// Balanced-entry rule
export { checkBalance, isBalanced, assertBalanced } from "./balance.js";

// Balance computation
export {
  computeAccountBalances,
  computeTrialBalance,
} from "./balance-calculator.js";

// Statements
export {
  buildBalanceSheet,
  buildProfitAndLoss,
  buildLedgerReport,
  RETAINED_EARNINGS,
  NET_INCOME,
} from "./reports.js";

// Decimal arithmetic
export {
  parseAmount,
  formatAmount,
  fractionDigits,
  normalizeAmount,
  isPositiveAmount,
} from "./money-math.js";

// Types
export type {
  ReportAccount,
  BalanceLine,
  Posting,
  DateRange,
  AssetTypeTotals,
  BalanceCheck,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  AssetTypeAmount,
  ReportLine,
  ReportSection,
  BalanceSheet,
  ProfitAndLoss,
  LedgerReportLine,
  LedgerReportAccount,
  LedgerReport,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
