/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountingService } from "../services/accounting-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Tallybook API.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** AccountingService for the selected tenant (set by tenant middleware) */
    service: AccountingService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}
