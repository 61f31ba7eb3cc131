/**
 * AccountingService: One tenant's view of the books.
 *
 * Route handlers delegate to this service; they never touch the
 * repositories directly. Every operation is scoped to the tenant the
 * service was created for: accounts, entries and postings of other
 * tenants are invisible through it.
 */

import {
  AccountRepository,
  AssetTypeRepository,
  JournalEntryRepository,
  PostingRepository,
  TenantRepository,
  UserRepository,
} from "@tallybook/data";
import type { DataContext, PagedResult, Pagination } from "@tallybook/data";
import {
  assertBalanced,
  buildBalanceSheet,
  buildLedgerReport,
  buildProfitAndLoss,
  computeTrialBalance,
  fractionDigits,
  normalizeAmount,
} from "@tallybook/ledger";
import type {
  BalanceSheet,
  DateRange,
  LedgerReport,
  ProfitAndLoss,
  ReportAccount,
  TrialBalance,
} from "@tallybook/ledger";
import type {
  Account,
  AssetType,
  JournalEntry,
  JournalEntryChanges,
  NewJournalEntryAccount,
  Tenant,
} from "@tallybook/types";
import type {
  CreateAccountDto,
  CreateAssetTypeDto,
  CreateJournalEntryDto,
  JournalLineDto,
  PostJournalEntryDto,
  UpdateJournalEntryDto,
} from "../types/dto.js";

// =============================================================================
// Errors
// =============================================================================

export type ServiceErrorCode =
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_AMOUNT"
  | "ASSET_TYPE_MISMATCH";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;

  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
  }
}

// =============================================================================
// Repositories
// =============================================================================

/**
 * The repositories every tenant's service shares.
 */
export interface Repositories {
  readonly tenants: TenantRepository;
  readonly users: UserRepository;
  readonly assetTypes: AssetTypeRepository;
  readonly accounts: AccountRepository;
  readonly journal: JournalEntryRepository;
  readonly postings: PostingRepository;
}

export function createRepositories(ctx: DataContext): Repositories {
  return {
    tenants: new TenantRepository(ctx),
    users: new UserRepository(ctx),
    assetTypes: new AssetTypeRepository(ctx),
    accounts: new AccountRepository(ctx),
    journal: new JournalEntryRepository(ctx),
    postings: new PostingRepository(ctx),
  };
}

function toReportAccount(account: Account): ReportAccount {
  const { assetType } = account;
  if (assetType === undefined) {
    throw new Error(`Account ${account.id} was loaded without its asset type`);
  }
  return { ...account, assetType };
}

// =============================================================================
// Service
// =============================================================================

export class AccountingService {
  readonly tenantId: string;
  private readonly repos: Repositories;

  constructor(tenantId: string, repos: Repositories) {
    this.tenantId = tenantId;
    this.repos = repos;
  }

  // ─── Tenant ────────────────────────────────────────────────────────

  async getTenant(): Promise<Tenant> {
    const tenant = await this.repos.tenants.getById(this.tenantId);
    if (tenant === undefined) {
      throw new ServiceError("NOT_FOUND", `Tenant '${this.tenantId}' not found`);
    }
    return tenant;
  }

  // ─── Asset Types ───────────────────────────────────────────────────

  async listAssetTypes(): Promise<readonly AssetType[]> {
    return this.repos.assetTypes.list();
  }

  async createAssetType(dto: CreateAssetTypeDto): Promise<AssetType> {
    return this.repos.assetTypes.create(dto);
  }

  // ─── Chart of Accounts ─────────────────────────────────────────────

  async listAccounts(): Promise<readonly Account[]> {
    return this.repos.accounts.getByTenant(this.tenantId);
  }

  async getAccount(accountNumber: number): Promise<Account> {
    const account = await this.repos.accounts.getByTenantAndNumber(this.tenantId, accountNumber);
    if (account === undefined) {
      throw new ServiceError("NOT_FOUND", `Account ${String(accountNumber)} not found`);
    }
    return account;
  }

  async createAccount(dto: CreateAccountDto, userId: string): Promise<Account> {
    await this.requireUser(userId);
    return this.repos.accounts.create({ ...dto, tenantId: this.tenantId, createdById: userId });
  }

  // ─── Journal Entries ───────────────────────────────────────────────

  /**
   * Create a pending entry with the tenant's next number.
   *
   * Each line's account must belong to this tenant; its asset type
   * defaults to the account's and its amount must fit that asset
   * type's precision.
   */
  async createJournalEntry(dto: CreateJournalEntryDto, userId: string): Promise<JournalEntry> {
    await this.requireUser(userId);
    const accounts = await this.resolveLines(dto.accounts);

    return this.repos.journal.createJournalEntry({
      tenantId: this.tenantId,
      entryDate: dto.entryDate,
      checkNumber: dto.checkNumber,
      description: dto.description,
      note: dto.note,
      createdById: userId,
      accounts,
    });
  }

  /** Detailed entry by its tenant-scoped number. */
  async getJournalEntry(entryId: number): Promise<JournalEntry> {
    const entry = await this.repos.journal.getDetailedByTenantAndEntryId(this.tenantId, entryId);
    if (entry === undefined) {
      throw new ServiceError("NOT_FOUND", `Journal entry ${String(entryId)} not found`);
    }
    return entry;
  }

  async listJournalEntries(
    range: DateRange,
    pagination: Pagination,
  ): Promise<PagedResult<JournalEntry>> {
    return this.repos.journal.getJournalEntries(this.tenantId, range.start, range.end, pagination);
  }

  async listPendingJournalEntries(pagination: Pagination): Promise<PagedResult<JournalEntry>> {
    return this.repos.journal.getPendingJournalEntries(this.tenantId, pagination);
  }

  async getNextEntryId(): Promise<number> {
    return this.repos.journal.getNextEntryId(this.tenantId);
  }

  async updateJournalEntry(
    entryId: number,
    dto: UpdateJournalEntryDto,
    userId: string,
  ): Promise<JournalEntry> {
    await this.requireUser(userId);
    const current = await this.getJournalEntry(entryId);

    const changes: JournalEntryChanges = {
      entryDate: dto.entryDate,
      checkNumber: dto.checkNumber,
      description: dto.description,
      note: dto.note,
      accounts: dto.accounts === undefined ? undefined : await this.resolveLines(dto.accounts),
    };

    return this.found(entryId, await this.repos.journal.updateJournalEntry(current.id, changes, userId));
  }

  async postJournalEntry(
    entryId: number,
    dto: PostJournalEntryDto,
    userId: string,
  ): Promise<JournalEntry> {
    await this.requireUser(userId);
    const current = await this.getJournalEntry(entryId);
    const postDate = dto.postDate ?? new Date().toISOString();

    return this.found(
      entryId,
      await this.repos.journal.postJournalEntry(current.id, postDate, userId, dto.note),
    );
  }

  async cancelJournalEntry(entryId: number, userId: string): Promise<JournalEntry> {
    await this.requireUser(userId);
    const current = await this.getJournalEntry(entryId);

    return this.found(entryId, await this.repos.journal.cancelJournalEntry(current.id, userId));
  }

  // ─── Reports ───────────────────────────────────────────────────────

  async getBalanceSheet(range: DateRange): Promise<BalanceSheet> {
    const [chart, postings] = await Promise.all([
      this.reportAccounts(),
      this.repos.postings.getPostedLines(this.tenantId, { to: range.end }),
    ]);
    return buildBalanceSheet(chart, postings, range);
  }

  async getProfitAndLoss(range: DateRange): Promise<ProfitAndLoss> {
    const [chart, postings] = await Promise.all([
      this.reportAccounts(),
      this.repos.postings.getPostedLines(this.tenantId, { from: range.start, to: range.end }),
    ]);
    return buildProfitAndLoss(chart, postings, range);
  }

  /**
   * Ledger of every account with activity, or of a single account
   * when `accountNumber` is given.
   */
  async getLedger(range: DateRange, accountNumber?: number): Promise<LedgerReport> {
    const [chart, postings] = await Promise.all([
      this.reportAccounts(),
      this.repos.postings.getPostedLines(this.tenantId, { to: range.end }),
    ]);

    if (accountNumber === undefined) {
      return buildLedgerReport(chart, postings, range);
    }

    const account = chart.find((a) => a.accountNumber === accountNumber);
    if (account === undefined) {
      throw new ServiceError("NOT_FOUND", `Account ${String(accountNumber)} not found`);
    }
    return buildLedgerReport(
      [account],
      postings.filter((p) => p.accountId === account.id),
      range,
    );
  }

  async getTrialBalance(asOf: string): Promise<TrialBalance> {
    const [chart, postings] = await Promise.all([
      this.reportAccounts(),
      this.repos.postings.getPostedLines(this.tenantId, { to: asOf }),
    ]);
    return computeTrialBalance(chart, postings, new Date().toISOString());
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async requireUser(userId: string): Promise<void> {
    if (userId === "" || (await this.repos.users.getById(userId)) === undefined) {
      throw new ServiceError("INVALID_ARGUMENT", `Unknown user '${userId}'`);
    }
  }

  private async reportAccounts(): Promise<readonly ReportAccount[]> {
    return (await this.repos.accounts.getByTenant(this.tenantId)).map(toReportAccount);
  }

  private found(entryId: number, entry: JournalEntry | undefined): JournalEntry {
    if (entry === undefined) {
      throw new ServiceError("NOT_FOUND", `Journal entry ${String(entryId)} not found`);
    }
    return entry;
  }

  /**
   * Check each line against the tenant's chart of accounts, normalize
   * its amount to the asset type's precision, then require the lines to
   * balance.
   */
  private async resolveLines(
    lines: readonly JournalLineDto[],
  ): Promise<readonly NewJournalEntryAccount[]> {
    const chart = new Map(
      (await this.reportAccounts()).map((a): [string, ReportAccount] => [a.id, a]),
    );

    const resolved = lines.map((line): NewJournalEntryAccount => {
      const account = chart.get(line.accountId);
      if (account === undefined) {
        throw new ServiceError("UNKNOWN_ACCOUNT", `Unknown account '${line.accountId}'`);
      }
      if (line.assetTypeId !== undefined && line.assetTypeId !== account.assetTypeId) {
        throw new ServiceError(
          "ASSET_TYPE_MISMATCH",
          `Account ${String(account.accountNumber)} holds ${account.assetType.name}, not '${line.assetTypeId}'`,
        );
      }

      const { decimals, name } = account.assetType;
      if (fractionDigits(line.amount) > decimals) {
        throw new ServiceError(
          "INVALID_AMOUNT",
          `Amount "${line.amount}" has more than ${String(decimals)} decimal places allowed for ${name}`,
        );
      }

      return {
        accountId: account.id,
        assetTypeId: account.assetTypeId,
        entryType: line.entryType,
        amount: normalizeAmount(line.amount, decimals),
      };
    });

    assertBalanced(resolved);
    return resolved;
  }
}
