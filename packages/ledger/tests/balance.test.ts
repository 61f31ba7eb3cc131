/**
 * Tests for the balanced-entry rule.
 */

import { describe, it, expect } from "vitest";
import { checkBalance, isBalanced, assertBalanced } from "../src/balance.js";
import { LedgerError } from "../src/types.js";
import type { BalanceLine } from "../src/types.js";

function line(
  entryType: "debit" | "credit",
  amount: string,
  assetTypeId = "usd",
): BalanceLine {
  return { assetTypeId, entryType, amount };
}

describe("checkBalance", () => {
  it("balances a simple two-line entry", () => {
    const result = checkBalance([line("debit", "100.00"), line("credit", "100.00")]);
    expect(result.balanced).toBe(true);
    expect(result.totals).toEqual([
      { assetTypeId: "usd", debits: "100.00", credits: "100.00" },
    ]);
  });

  it("treats differently written equal amounts as equal", () => {
    const result = checkBalance([line("debit", "100"), line("credit", "100.00")]);
    expect(result.balanced).toBe(true);
    expect(result.totals[0]?.debits).toBe("100.00");
  });

  it("balances split lines", () => {
    expect(
      isBalanced([
        line("debit", "60"),
        line("debit", "40"),
        line("credit", "75.5"),
        line("credit", "24.5"),
      ]),
    ).toBe(true);
  });

  it("requires every asset type to balance on its own", () => {
    const result = checkBalance([
      line("debit", "10", "usd"),
      line("credit", "10", "gold"),
    ]);
    expect(result.balanced).toBe(false);
    expect(result.totals).toEqual([
      { assetTypeId: "usd", debits: "10", credits: "0" },
      { assetTypeId: "gold", debits: "0", credits: "10" },
    ]);
  });

  it("balances a multi-asset entry when each asset balances", () => {
    expect(
      isBalanced([
        line("debit", "10", "usd"),
        line("credit", "10", "usd"),
        line("debit", "1.250", "gold"),
        line("credit", "1.25", "gold"),
      ]),
    ).toBe(true);
  });

  it("does not consider an empty entry balanced", () => {
    expect(checkBalance([])).toEqual({ balanced: false, totals: [] });
  });

  it("rejects zero amounts", () => {
    expect(() => checkBalance([line("debit", "0"), line("credit", "0")])).toThrow(
      LedgerError,
    );
  });

  it("rejects negative amounts", () => {
    expect(() => checkBalance([line("debit", "-5"), line("credit", "-5")])).toThrow(
      /must be positive/,
    );
  });
});

describe("assertBalanced", () => {
  it("passes a balanced entry", () => {
    expect(() =>
      assertBalanced([line("debit", "5"), line("credit", "5")]),
    ).not.toThrow();
  });

  it("throws EMPTY_ENTRY with no lines", () => {
    try {
      assertBalanced([]);
      expect.unreachable("assertBalanced should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.code).toBe("EMPTY_ENTRY");
      }
    }
  });

  it("throws UNBALANCED_ENTRY naming the offending asset type", () => {
    expect(() =>
      assertBalanced([
        line("debit", "10.00"),
        line("credit", "9.99"),
        line("debit", "1", "gold"),
        line("credit", "1", "gold"),
      ]),
    ).toThrow("Journal entry is unbalanced (usd: debits=10.00, credits=9.99)");
  });
});
