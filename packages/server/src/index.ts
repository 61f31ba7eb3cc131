/**
 * @tallybook/server: HTTP API for Tallybook.
 *
 * Public surface for embedding the app; main.ts starts a server.
 */

export { AccountingService, ServiceError, createRepositories } from "./services/accounting-service.js";
export type { Repositories, ServiceErrorCode } from "./services/accounting-service.js";
export { TenantRegistry } from "./services/tenant-registry.js";
export {
  exportReport,
  buildReportTable,
  renderCsv,
  renderXlsx,
  renderPdf,
  exportFileName,
  CONTENT_TYPES,
} from "./services/export-service.js";
export type { ReportTable, ExportFile } from "./services/export-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
