/**
 * @tallybook/ledger: Financial statements.
 *
 * - Balance sheet: balances as of the range end, with earnings rolled
 *   into equity (Retained Earnings before the range, Net Income within it)
 * - Profit & loss: income and expenses within the range
 * - Ledger: every account's postings within the range with running balances
 *
 * Amounts are grouped per asset type; nothing is converted across units.
 * Dates compare as ISO 8601 strings.
 */

import type { AccountType, AssetType, BalanceType } from "@tallybook/types";
import type {
  AssetTypeAmount,
  BalanceSheet,
  DateRange,
  LedgerReport,
  LedgerReportAccount,
  LedgerReportLine,
  Posting,
  ProfitAndLoss,
  ReportAccount,
  ReportLine,
  ReportSection,
} from "./types.js";
import { LedgerError } from "./types.js";
import { buildAccumulators, indexAccounts, netBalance } from "./balance-calculator.js";
import type { BalanceAccumulator } from "./balance-calculator.js";
import { formatAmount, parseAmount } from "./money-math.js";

export const RETAINED_EARNINGS = "Retained Earnings";
export const NET_INCOME = "Net Income";

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Per-asset-type running totals.
 */
class AmountTotals {
  private readonly _totals = new Map<string, { decimals: number; amount: bigint }>();

  add(assetType: Pick<AssetType, "name" | "decimals">, amount: bigint): void {
    const current = this._totals.get(assetType.name);
    if (current === undefined) {
      this._totals.set(assetType.name, { decimals: assetType.decimals, amount });
    } else {
      current.amount += amount;
    }
  }

  addAll(other: AmountTotals, sign: 1n | -1n = 1n): void {
    for (const [name, { decimals, amount }] of other._totals) {
      this.add({ name, decimals }, amount * sign);
    }
  }

  get(name: string): bigint {
    return this._totals.get(name)?.amount ?? 0n;
  }

  names(): readonly string[] {
    return [...this._totals.keys()].sort();
  }

  toArray(): readonly AssetTypeAmount[] {
    return this.names().map((name) => {
      const { decimals, amount } = this._totals.get(name) ?? { decimals: 0, amount: 0n };
      return { assetType: name, decimals, amount: formatAmount(amount, decimals) };
    });
  }
}

function byAccountNumber(accounts: readonly ReportAccount[]): readonly ReportAccount[] {
  return [...accounts].sort((a, b) => a.accountNumber - b.accountNumber);
}

function comparePostings(a: Posting, b: Posting): number {
  if (a.effectiveDate !== b.effectiveDate) {
    return a.effectiveDate < b.effectiveDate ? -1 : 1;
  }
  return a.entryId - b.entryId;
}

function withinRange(range: DateRange): (p: Posting) => boolean {
  return (p) => p.effectiveDate >= range.start && p.effectiveDate <= range.end;
}

/**
 * One section of a statement: every account of the given type, signed in
 * the section's direction (a contra account shows negative).
 */
function buildSection(
  title: string,
  accumulators: ReadonlyMap<string, BalanceAccumulator>,
  accountType: AccountType,
  direction: BalanceType,
): { section: ReportSection; totals: AmountTotals } {
  const lines: ReportLine[] = [];
  const totals = new AmountTotals();

  for (const acc of accumulators.values()) {
    const { account } = acc;
    if (account.accountType !== accountType) continue;

    const amount = netBalance(acc, direction);
    totals.add(account.assetType, amount);
    lines.push({
      accountId: account.id,
      accountNumber: account.accountNumber,
      name: account.name,
      assetType: account.assetType.name,
      amount: formatAmount(amount, account.assetType.decimals),
    });
  }

  return { section: { title, lines, totals: totals.toArray() }, totals };
}

/**
 * Income minus expenses, per asset type.
 */
function earnings(accumulators: ReadonlyMap<string, BalanceAccumulator>): AmountTotals {
  const totals = new AmountTotals();
  for (const acc of accumulators.values()) {
    const { account } = acc;
    if (account.accountType === "income") {
      totals.add(account.assetType, netBalance(acc, "credit"));
    } else if (account.accountType === "expense") {
      totals.add(account.assetType, -netBalance(acc, "debit"));
    }
  }
  return totals;
}

function computedLines(name: string, totals: AmountTotals): readonly ReportLine[] {
  return totals.toArray().map((t) => ({
    accountId: null,
    accountNumber: null,
    name,
    assetType: t.assetType,
    amount: t.amount,
  }));
}

// ─── Balance Sheet ───────────────────────────────────────────────────────

export function buildBalanceSheet(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
  range: DateRange,
): BalanceSheet {
  const chart = byAccountNumber(accounts);
  const asOfEnd = buildAccumulators(chart, postings, (p) => p.effectiveDate <= range.end);
  const beforeStart = buildAccumulators(chart, postings, (p) => p.effectiveDate < range.start);
  const inRange = buildAccumulators(chart, postings, withinRange(range));

  const assets = buildSection("Assets", asOfEnd, "asset", "debit");
  const liabilities = buildSection("Liabilities", asOfEnd, "liability", "credit");
  const equityAccounts = buildSection("Equity", asOfEnd, "equity", "credit");

  const retainedEarnings = earnings(beforeStart);
  const netIncome = earnings(inRange);

  const equityTotals = new AmountTotals();
  equityTotals.addAll(equityAccounts.totals);
  equityTotals.addAll(retainedEarnings);
  equityTotals.addAll(netIncome);

  const equity: ReportSection = {
    title: "Equity",
    lines: [
      ...equityAccounts.section.lines,
      ...computedLines(RETAINED_EARNINGS, retainedEarnings),
      ...computedLines(NET_INCOME, netIncome),
    ],
    totals: equityTotals.toArray(),
  };

  const liabilitiesAndEquity = new AmountTotals();
  liabilitiesAndEquity.addAll(liabilities.totals);
  liabilitiesAndEquity.addAll(equityTotals);

  const names = new Set([...assets.totals.names(), ...liabilitiesAndEquity.names()]);
  const balanced = [...names].every(
    (name) => assets.totals.get(name) === liabilitiesAndEquity.get(name),
  );

  return {
    start: range.start,
    end: range.end,
    assets: assets.section,
    liabilities: liabilities.section,
    equity,
    totalLiabilitiesAndEquity: liabilitiesAndEquity.toArray(),
    balanced,
  };
}

// ─── Profit & Loss ───────────────────────────────────────────────────────

export function buildProfitAndLoss(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
  range: DateRange,
): ProfitAndLoss {
  const inRange = buildAccumulators(byAccountNumber(accounts), postings, withinRange(range));

  const income = buildSection("Income", inRange, "income", "credit");
  const expenses = buildSection("Expenses", inRange, "expense", "debit");

  return {
    start: range.start,
    end: range.end,
    income: income.section,
    expenses: expenses.section,
    netIncome: earnings(inRange).toArray(),
  };
}

// ─── Ledger ──────────────────────────────────────────────────────────────

export function buildLedgerReport(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
  range: DateRange,
): LedgerReport {
  const byId = indexAccounts(accounts);
  const grouped = new Map<string, Posting[]>();

  for (const posting of postings) {
    if (!byId.has(posting.accountId)) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${posting.accountId}"`);
    }
    if (posting.effectiveDate > range.end) continue;

    let group = grouped.get(posting.accountId);
    if (group === undefined) {
      group = [];
      grouped.set(posting.accountId, group);
    }
    group.push(posting);
  }

  const result: LedgerReportAccount[] = [];

  for (const account of byAccountNumber(accounts)) {
    const group = grouped.get(account.id);
    if (group === undefined) continue;

    const decimals = account.assetType.decimals;
    let starting = 0n;
    let running = 0n;
    const lines: LedgerReportLine[] = [];

    for (const posting of [...group].sort(comparePostings)) {
      const amount = parseAmount(posting.amount, decimals);
      const delta = posting.entryType === account.normalBalance ? amount : -amount;

      if (posting.effectiveDate < range.start) {
        starting += delta;
        running += delta;
        continue;
      }

      running += delta;
      const formatted = formatAmount(amount, decimals);
      lines.push({
        journalEntryId: posting.journalEntryId,
        entryId: posting.entryId,
        date: posting.effectiveDate,
        description: posting.description,
        debit: posting.entryType === "debit" ? formatted : null,
        credit: posting.entryType === "credit" ? formatted : null,
        balance: formatAmount(running, decimals),
      });
    }

    if (lines.length === 0 && starting === 0n) continue;

    result.push({
      accountId: account.id,
      accountNumber: account.accountNumber,
      name: account.name,
      accountType: account.accountType,
      normalBalance: account.normalBalance,
      assetType: account.assetType.name,
      startingBalance: formatAmount(starting, decimals),
      lines,
      endingBalance: formatAmount(running, decimals),
    });
  }

  return { start: range.start, end: range.end, accounts: result };
}
