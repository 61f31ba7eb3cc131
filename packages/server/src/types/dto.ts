/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import {
  ACCOUNT_TYPES,
  BALANCE_TYPES,
  isCalendarDate,
  isDecimalString,
  isIsoTimestamp,
} from "@tallybook/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * A calendar date or a timestamp carrying `Z` or a UTC offset,
 * normalized to an ISO 8601 UTC timestamp. A bare `YYYY-MM-DD`
 * becomes the start of that day, or its last millisecond when
 * `endOfDay` is set.
 */
function timestamp(endOfDay: boolean) {
  return z
    .string()
    .min(1)
    .refine((v) => isCalendarDate(v) || isIsoTimestamp(v), {
      message: "Expected a YYYY-MM-DD date or an ISO 8601 timestamp with Z or an offset",
    })
    .transform((v) => {
      if (isCalendarDate(v)) {
        return `${v}T${endOfDay ? "23:59:59.999" : "00:00:00.000"}Z`;
      }
      return new Date(v).toISOString();
    });
}

export const DateSchema = timestamp(false);

export const AmountSchema = z
  .string()
  .refine(isDecimalString, "Amount must be a non-negative decimal string");

export const PaginationQuerySchema = z.object({
  pageNumber: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).optional(),
});

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

const DateRangeFields = z.object({
  dateRangeStart: timestamp(false),
  dateRangeEnd: timestamp(true),
});

function startNotAfterEnd(v: { dateRangeStart: string; dateRangeEnd: string }): boolean {
  return v.dateRangeStart <= v.dateRangeEnd;
}

const RANGE_ORDER = {
  message: "dateRangeStart must not be after dateRangeEnd",
  path: ["dateRangeStart"],
};

export const DateRangeQuerySchema = DateRangeFields.refine(startNotAfterEnd, RANGE_ORDER);

export type DateRangeQuery = z.infer<typeof DateRangeQuerySchema>;

// =============================================================================
// Tenancy DTOs
// =============================================================================

export const CreateTenantSchema = z.object({
  name: z.string().trim().min(1).max(256),
});

export type CreateTenantDto = z.infer<typeof CreateTenantSchema>;

export const CreateUserSchema = z.object({
  email: z.string().email(),
  firstName: z.string().trim().min(1).max(128),
  lastName: z.string().trim().min(1).max(128),
});

export type CreateUserDto = z.infer<typeof CreateUserSchema>;

// =============================================================================
// Chart of Accounts DTOs
// =============================================================================

export const CreateAssetTypeSchema = z.object({
  name: z.string().trim().min(1).max(32),
  description: z.string().max(1024).optional(),
  symbol: z.string().max(8).optional(),
  decimals: z.number().int().min(0).max(18).optional(),
});

export type CreateAssetTypeDto = z.infer<typeof CreateAssetTypeSchema>;

export const CreateAccountSchema = z.object({
  accountNumber: z.number().int().min(1),
  name: z.string().trim().min(1).max(256),
  description: z.string().max(1024).optional(),
  accountType: z.enum(ACCOUNT_TYPES),
  normalBalance: z.enum(BALANCE_TYPES).optional(),
  assetTypeId: z.string().min(1),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

// =============================================================================
// Journal Entry DTOs
// =============================================================================

export const JournalLineSchema = z.object({
  accountId: z.string().min(1),
  /** Defaults to the account's asset type */
  assetTypeId: z.string().min(1).optional(),
  entryType: z.enum(BALANCE_TYPES),
  amount: AmountSchema,
});

export type JournalLineDto = z.infer<typeof JournalLineSchema>;

export const CreateJournalEntrySchema = z.object({
  entryDate: DateSchema,
  checkNumber: z.number().int().min(0).optional(),
  description: z.string().trim().min(1).max(1024),
  note: z.string().max(4096).optional(),
  accounts: z.array(JournalLineSchema).min(1),
});

export type CreateJournalEntryDto = z.infer<typeof CreateJournalEntrySchema>;

export const UpdateJournalEntrySchema = z.object({
  entryDate: DateSchema.optional(),
  checkNumber: z.number().int().min(0).nullable().optional(),
  description: z.string().trim().min(1).max(1024).optional(),
  note: z.string().max(4096).nullable().optional(),
  accounts: z.array(JournalLineSchema).min(1).optional(),
});

export type UpdateJournalEntryDto = z.infer<typeof UpdateJournalEntrySchema>;

export const PostJournalEntrySchema = z.object({
  /** Defaults to now */
  postDate: DateSchema.optional(),
  note: z.string().max(4096).optional(),
});

export type PostJournalEntryDto = z.infer<typeof PostJournalEntrySchema>;

export const ListJournalEntriesQuerySchema = DateRangeFields.merge(PaginationQuerySchema).refine(
  startNotAfterEnd,
  RANGE_ORDER,
);

export type ListJournalEntriesQuery = z.infer<typeof ListJournalEntriesQuerySchema>;

// =============================================================================
// Report & Export DTOs
// =============================================================================

export const LedgerQuerySchema = DateRangeFields.extend({
  accountNumber: z.coerce.number().int().min(1).optional(),
}).refine(startNotAfterEnd, RANGE_ORDER);

export type LedgerQuery = z.infer<typeof LedgerQuerySchema>;

export const TrialBalanceQuerySchema = z.object({
  /** Defaults to now */
  asOf: timestamp(true).optional(),
});

export type TrialBalanceQuery = z.infer<typeof TrialBalanceQuerySchema>;

export const EXPORT_REPORTS = [
  "balance-sheet",
  "profit-and-loss",
  "ledger",
  "journal-entries",
] as const;

export type ExportReport = (typeof EXPORT_REPORTS)[number];

export const EXPORT_FORMATS = ["csv", "xlsx", "pdf"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const ExportQuerySchema = DateRangeFields.extend({
  report: z.enum(EXPORT_REPORTS),
  format: z.enum(EXPORT_FORMATS).default("csv"),
}).refine(startNotAfterEnd, RANGE_ORDER);

export type ExportQuery = z.infer<typeof ExportQuerySchema>;
