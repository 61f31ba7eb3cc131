/**
 * Type barrel: re-exports all public types from @tallybook/server.
 */

// DTOs
export {
  DateSchema,
  AmountSchema,
  PaginationQuerySchema,
  DateRangeQuerySchema,
  CreateTenantSchema,
  CreateUserSchema,
  CreateAssetTypeSchema,
  CreateAccountSchema,
  JournalLineSchema,
  CreateJournalEntrySchema,
  UpdateJournalEntrySchema,
  PostJournalEntrySchema,
  ListJournalEntriesQuerySchema,
  LedgerQuerySchema,
  TrialBalanceQuerySchema,
  ExportQuerySchema,
  EXPORT_REPORTS,
  EXPORT_FORMATS,
} from "./dto.js";
export type {
  PaginationQuery,
  DateRangeQuery,
  CreateTenantDto,
  CreateUserDto,
  CreateAssetTypeDto,
  CreateAccountDto,
  JournalLineDto,
  CreateJournalEntryDto,
  UpdateJournalEntryDto,
  PostJournalEntryDto,
  ListJournalEntriesQuery,
  LedgerQuery,
  TrialBalanceQuery,
  ExportReport,
  ExportFormat,
  ExportQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { toPaginatedResponse } from "./pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
