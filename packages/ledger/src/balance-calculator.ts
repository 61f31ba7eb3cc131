/**
 * @tallybook/ledger: Balance calculation engine.
 *
 * Computes account balances and the trial balance from postings.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - An account's balance is expressed in its own asset type
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (debits = credits per asset type)
 */

import type {
  AccountBalance,
  Posting,
  ReportAccount,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { LedgerError } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

/**
 * Running debit/credit totals of one account.
 */
export interface BalanceAccumulator {
  readonly account: ReportAccount;
  totalDebits: bigint;
  totalCredits: bigint;
}

/**
 * Index accounts by ID.
 */
export function indexAccounts(
  accounts: readonly ReportAccount[],
): Map<string, ReportAccount> {
  return new Map(accounts.map((a) => [a.id, a]));
}

/**
 * Build one accumulator per account that has postings matching `include`.
 * Accounts keep the order of `accounts`.
 */
export function buildAccumulators(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
  include: (posting: Posting) => boolean = () => true,
): Map<string, BalanceAccumulator> {
  const byId = indexAccounts(accounts);
  const found = new Map<string, BalanceAccumulator>();

  for (const posting of postings) {
    if (!include(posting)) continue;

    const account = byId.get(posting.accountId);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${posting.accountId}"`);
    }

    let acc = found.get(account.id);
    if (acc === undefined) {
      acc = { account, totalDebits: 0n, totalCredits: 0n };
      found.set(account.id, acc);
    }

    const amount = parseAmount(posting.amount, account.assetType.decimals);
    if (posting.entryType === "debit") {
      acc.totalDebits += amount;
    } else {
      acc.totalCredits += amount;
    }
  }

  const ordered = new Map<string, BalanceAccumulator>();
  for (const account of accounts) {
    const acc = found.get(account.id);
    if (acc !== undefined) {
      ordered.set(account.id, acc);
    }
  }
  return ordered;
}

/**
 * Net of an accumulator in the given direction.
 */
export function netBalance(
  acc: Pick<BalanceAccumulator, "totalDebits" | "totalCredits">,
  direction: "debit" | "credit",
): bigint {
  return direction === "debit"
    ? acc.totalDebits - acc.totalCredits
    : acc.totalCredits - acc.totalDebits;
}

/**
 * Compute the balance of every account that has postings.
 */
export function computeAccountBalances(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
): readonly AccountBalance[] {
  const balances: AccountBalance[] = [];

  for (const acc of buildAccumulators(accounts, postings).values()) {
    const { account } = acc;
    const decimals = account.assetType.decimals;

    balances.push({
      accountId: account.id,
      accountNumber: account.accountNumber,
      name: account.name,
      accountType: account.accountType,
      assetType: account.assetType.name,
      balance: formatAmount(netBalance(acc, account.normalBalance), decimals),
      totalDebits: formatAmount(acc.totalDebits, decimals),
      totalCredits: formatAmount(acc.totalCredits, decimals),
    });
  }

  return balances;
}

/**
 * Compute the trial balance from all postings.
 *
 * For each account:
 * - Debit-normal accounts: if net debit >= 0, show in debit column; else credit column
 * - Credit-normal accounts: if net credit >= 0, show in credit column; else debit column
 *
 * Total debits MUST equal total credits per asset type for the trial balance to be balanced.
 */
export function computeTrialBalance(
  accounts: readonly ReportAccount[],
  postings: readonly Posting[],
  generatedAt: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const assetTypeTotals = new Map<string, { debits: bigint; credits: bigint }>();

  for (const acc of buildAccumulators(accounts, postings).values()) {
    const { account } = acc;
    const netDebit = acc.totalDebits - acc.totalCredits;

    let debitBalance = 0n;
    let creditBalance = 0n;

    if (account.normalBalance === "debit") {
      if (netDebit >= 0n) {
        debitBalance = netDebit;
      } else {
        creditBalance = -netDebit;
      }
    } else {
      const netCredit = -netDebit;
      if (netCredit >= 0n) {
        creditBalance = netCredit;
      } else {
        debitBalance = -netCredit;
      }
    }

    const decimals = account.assetType.decimals;
    lines.push({
      accountId: account.id,
      accountNumber: account.accountNumber,
      name: account.name,
      accountType: account.accountType,
      assetType: account.assetType.name,
      decimals,
      debitBalance: formatAmount(debitBalance, decimals),
      creditBalance: formatAmount(creditBalance, decimals),
    });

    let totals = assetTypeTotals.get(account.assetType.name);
    if (totals === undefined) {
      totals = { debits: 0n, credits: 0n };
      assetTypeTotals.set(account.assetType.name, totals);
    }
    totals.debits += debitBalance;
    totals.credits += creditBalance;
  }

  let balanced = true;
  for (const totals of assetTypeTotals.values()) {
    if (totals.debits !== totals.credits) {
      balanced = false;
      break;
    }
  }

  return { lines, generatedAt, balanced };
}
