/**
 * Request logging middleware.
 *
 * Hands one entry per request to a log function; main.ts wires it to
 * pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Set once auth has run; absent for health checks */
  readonly tenantId?: string | undefined;
  readonly userId?: string | undefined;
}

/**
 * Creates a request logging middleware.
 *
 * Logs method, path, status, duration and the caller's tenant after the
 * response is produced.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Unset on routes outside /api
    const auth: AuthContext | undefined = c.get("auth");
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      tenantId: auth?.tenantId || undefined,
      userId: auth?.userId || undefined,
    });
  };
}
