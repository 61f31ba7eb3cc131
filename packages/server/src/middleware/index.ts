/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export type { ErrorHandlerOptions } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery, formatZodIssues } from "./validate.js";
export { computeETag, checkIfMatch, isNotModified, setETag } from "./etag.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  verifyJwt,
  signJwt,
  TENANT_HEADER,
  USER_HEADER,
} from "./auth.js";
export type { AuthConfig, UnsecuredDefaults } from "./auth.js";
export { tenantMiddleware } from "./tenant.js";
