/**
 * @tallybook/ledger: The balanced-entry rule.
 *
 * A journal entry is balanced when it has at least one line and, for
 * every asset type it uses, total debits equal total credits.
 * Amounts of one asset type are compared at the widest scale written
 * among them, so "100" and "100.00" are equal.
 */

import type { AssetTypeTotals, BalanceCheck, BalanceLine } from "./types.js";
import { LedgerError } from "./types.js";
import { formatAmount, fractionDigits, isPositiveAmount, parseAmount } from "./money-math.js";

/**
 * Sum debits and credits per asset type.
 *
 * Throws LedgerError("INVALID_AMOUNT") when a line's amount is malformed
 * or not strictly positive.
 */
export function checkBalance(lines: readonly BalanceLine[]): BalanceCheck {
  const groups = new Map<string, BalanceLine[]>();

  for (const line of lines) {
    let group = groups.get(line.assetTypeId);
    if (group === undefined) {
      group = [];
      groups.set(line.assetTypeId, group);
    }
    group.push(line);
  }

  const totals: AssetTypeTotals[] = [];
  let balanced = lines.length > 0;

  for (const [assetTypeId, group] of groups) {
    const scale = Math.max(...group.map((l) => fractionDigits(l.amount)));
    let debits = 0n;
    let credits = 0n;

    for (const line of group) {
      if (!isPositiveAmount(line.amount)) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Line amounts must be positive, got "${line.amount}"`,
        );
      }
      const amount = parseAmount(line.amount, scale);
      if (line.entryType === "debit") {
        debits += amount;
      } else {
        credits += amount;
      }
    }

    if (debits !== credits) {
      balanced = false;
    }

    totals.push({
      assetTypeId,
      debits: formatAmount(debits, scale),
      credits: formatAmount(credits, scale),
    });
  }

  return { balanced, totals };
}

/**
 * True when the lines form a balanced entry.
 */
export function isBalanced(lines: readonly BalanceLine[]): boolean {
  return checkBalance(lines).balanced;
}

/**
 * Throw unless the lines form a balanced entry.
 */
export function assertBalanced(lines: readonly BalanceLine[]): void {
  if (lines.length === 0) {
    throw new LedgerError("EMPTY_ENTRY", "A journal entry needs at least one line");
  }

  const check = checkBalance(lines);
  if (!check.balanced) {
    const detail = check.totals
      .filter((t) => t.debits !== t.credits)
      .map((t) => `${t.assetTypeId}: debits=${t.debits}, credits=${t.credits}`)
      .join("; ");
    throw new LedgerError("UNBALANCED_ENTRY", `Journal entry is unbalanced (${detail})`);
  }
}
