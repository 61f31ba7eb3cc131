/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAdminRoutes, createCurrentTenantRoutes } from "./tenants.js";
export { createAccountRoutes, createAssetTypeRoutes } from "./accounts.js";
export { createJournalEntryRoutes } from "./journal-entries.js";
export type { PagingConfig } from "./journal-entries.js";
export { createReportRoutes } from "./reports.js";
export { createExportRoutes } from "./export.js";
