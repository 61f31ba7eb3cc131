/**
 * Tests for the balance sheet, profit & loss and ledger report.
 */

import { describe, it, expect } from "vitest";
import {
  buildBalanceSheet,
  buildProfitAndLoss,
  buildLedgerReport,
} from "../src/reports.js";
import type { DateRange, Posting } from "../src/types.js";
import { CHART, posting, transfer } from "./fixtures.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const RANGE: DateRange = {
  start: "2024-02-01T00:00:00.000Z",
  end: "2024-03-31T23:59:59.999Z",
};

const POSTINGS: readonly Posting[] = [
  ...transfer(1, "2024-01-05T00:00:00.000Z", "cash", "capital", "1000"),
  ...transfer(5, "2024-01-20T00:00:00.000Z", "vault", "gold-capital", "2.5"),
  ...transfer(7, "2024-01-25T00:00:00.000Z", "cash", "sales", "80"),
  ...transfer(2, "2024-02-10T00:00:00.000Z", "cash", "sales", "500"),
  ...transfer(3, "2024-02-15T00:00:00.000Z", "rent", "cash", "200"),
  ...transfer(4, "2024-03-01T00:00:00.000Z", "rent", "ap", "50"),
  ...transfer(6, "2024-04-01T00:00:00.000Z", "cash", "sales", "100"),
];

// ─── Balance Sheet ───────────────────────────────────────────────────────

describe("buildBalanceSheet", () => {
  const sheet = buildBalanceSheet(CHART, POSTINGS, RANGE);

  it("echoes the range", () => {
    expect(sheet.start).toBe(RANGE.start);
    expect(sheet.end).toBe(RANGE.end);
  });

  it("lists assets as of the range end, ordered by account number", () => {
    expect(sheet.assets.title).toBe("Assets");
    expect(sheet.assets.lines).toEqual([
      { accountId: "cash", accountNumber: 1000, name: "Cash", assetType: "USD", amount: "1380.00" },
      { accountId: "vault", accountNumber: 1100, name: "Gold Vault", assetType: "Gold", amount: "2.500" },
    ]);
    expect(sheet.assets.totals).toEqual([
      { assetType: "Gold", decimals: 3, amount: "2.500" },
      { assetType: "USD", decimals: 2, amount: "1380.00" },
    ]);
  });

  it("lists liabilities", () => {
    expect(sheet.liabilities.lines).toEqual([
      { accountId: "ap", accountNumber: 2000, name: "Accounts Payable", assetType: "USD", amount: "50.00" },
    ]);
  });

  it("rolls earnings into equity", () => {
    expect(sheet.equity.lines).toEqual([
      { accountId: "capital", accountNumber: 3000, name: "Owner Capital", assetType: "USD", amount: "1000.00" },
      { accountId: "gold-capital", accountNumber: 3100, name: "Gold Capital", assetType: "Gold", amount: "2.500" },
      { accountId: null, accountNumber: null, name: "Retained Earnings", assetType: "USD", amount: "80.00" },
      { accountId: null, accountNumber: null, name: "Net Income", assetType: "USD", amount: "250.00" },
    ]);
    expect(sheet.equity.totals).toEqual([
      { assetType: "Gold", decimals: 3, amount: "2.500" },
      { assetType: "USD", decimals: 2, amount: "1330.00" },
    ]);
  });

  it("balances assets against liabilities and equity", () => {
    expect(sheet.totalLiabilitiesAndEquity).toEqual([
      { assetType: "Gold", decimals: 3, amount: "2.500" },
      { assetType: "USD", decimals: 2, amount: "1380.00" },
    ]);
    expect(sheet.balanced).toBe(true);
  });

  it("reports an imbalance from one-sided postings", () => {
    const broken = buildBalanceSheet(
      CHART,
      [posting(1, "2024-02-02T00:00:00.000Z", "cash", "debit", "10")],
      RANGE,
    );
    expect(broken.balanced).toBe(false);
  });
});

// ─── Profit & Loss ───────────────────────────────────────────────────────

describe("buildProfitAndLoss", () => {
  const pnl = buildProfitAndLoss(CHART, POSTINGS, RANGE);

  it("includes only activity within the range", () => {
    expect(pnl.income.lines).toEqual([
      { accountId: "sales", accountNumber: 4000, name: "Sales", assetType: "USD", amount: "500.00" },
    ]);
    expect(pnl.expenses.lines).toEqual([
      { accountId: "rent", accountNumber: 5000, name: "Rent", assetType: "USD", amount: "250.00" },
    ]);
  });

  it("computes net income per asset type", () => {
    expect(pnl.netIncome).toEqual([{ assetType: "USD", decimals: 2, amount: "250.00" }]);
  });

  it("reports a loss as negative net income", () => {
    const loss = buildProfitAndLoss(
      CHART,
      transfer(1, "2024-02-05T00:00:00.000Z", "rent", "cash", "75"),
      RANGE,
    );
    expect(loss.income.lines).toEqual([]);
    expect(loss.netIncome).toEqual([{ assetType: "USD", decimals: 2, amount: "-75.00" }]);
  });
});

// ─── Ledger ──────────────────────────────────────────────────────────────

describe("buildLedgerReport", () => {
  const report = buildLedgerReport(CHART, POSTINGS, RANGE);

  it("orders accounts by number and skips untouched ones", () => {
    expect(report.accounts.map((a) => a.accountId)).toEqual([
      "cash",
      "vault",
      "ap",
      "capital",
      "gold-capital",
      "sales",
      "rent",
    ]);
  });

  it("carries a starting balance and a running balance", () => {
    const cash = report.accounts[0];
    expect(cash?.startingBalance).toBe("1080.00");
    expect(cash?.lines).toEqual([
      {
        journalEntryId: "je-2",
        entryId: 2,
        date: "2024-02-10T00:00:00.000Z",
        description: "Entry 2",
        debit: "500.00",
        credit: null,
        balance: "1580.00",
      },
      {
        journalEntryId: "je-3",
        entryId: 3,
        date: "2024-02-15T00:00:00.000Z",
        description: "Entry 3",
        debit: null,
        credit: "200.00",
        balance: "1380.00",
      },
    ]);
    expect(cash?.endingBalance).toBe("1380.00");
  });

  it("runs credit-normal accounts in the credit direction", () => {
    const sales = report.accounts.find((a) => a.accountId === "sales");
    expect(sales?.normalBalance).toBe("credit");
    expect(sales?.startingBalance).toBe("80.00");
    expect(sales?.lines.map((l) => l.balance)).toEqual(["580.00"]);
    expect(sales?.endingBalance).toBe("580.00");
  });

  it("keeps accounts with only an opening balance", () => {
    const vault = report.accounts.find((a) => a.accountId === "vault");
    expect(vault?.lines).toEqual([]);
    expect(vault?.startingBalance).toBe("2.500");
    expect(vault?.endingBalance).toBe("2.500");
  });

  it("orders lines on the same date by entry number", () => {
    const sameDay = "2024-02-20T00:00:00.000Z";
    const result = buildLedgerReport(
      CHART,
      [...transfer(9, sameDay, "cash", "sales", "1"), ...transfer(8, sameDay, "cash", "sales", "2")],
      RANGE,
    );
    expect(result.accounts[0]?.lines.map((l) => [l.entryId, l.balance])).toEqual([
      [8, "2.00"],
      [9, "3.00"],
    ]);
  });

  it("rejects postings against unknown accounts", () => {
    expect(() =>
      buildLedgerReport(CHART, [posting(1, RANGE.start, "missing", "debit", "1")], RANGE),
    ).toThrow(/Unknown account/);
  });
});
