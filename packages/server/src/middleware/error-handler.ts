/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps coded domain errors (RepositoryError, LedgerError, ServiceError)
 * to HTTP status codes. Anything unrecognized is a 500 whose details are
 * handed to the `onInternalError` hook and never sent to the client.
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";
import { formatZodIssues } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Repository errors
  INVALID_ARGUMENT: 400,
  INVALID_TRANSITION: 409,
  DUPLICATE_KEY: 409,

  // Ledger errors
  UNBALANCED_ENTRY: 400,
  INVALID_AMOUNT: 400,
  EMPTY_ENTRY: 400,
  UNKNOWN_ACCOUNT: 400,

  // Service errors
  NOT_FOUND: 404,
  ASSET_TYPE_MISMATCH: 400,
};

function errorCode(err: Error): string | undefined {
  const code: unknown = "code" in err ? err.code : undefined;
  return typeof code === "string" ? code : undefined;
}

function toErrorStatus(status: number): ErrorStatus {
  switch (status) {
    case 400:
    case 401:
    case 403:
    case 404:
    case 409:
    case 412:
      return status;
    default:
      return 500;
  }
}

// =============================================================================
// Handler
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called with every error answered with a 500 */
  readonly onInternalError?: ((err: Error, c: Context<AppEnv>) => void) | undefined;
}

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodIssues(err),
        }),
        400,
      );
    }

    if (err instanceof HTTPException) {
      const status = toErrorStatus(err.status);
      if (status !== 500) {
        return c.json(createErrorEnvelope(httpErrorCode(status), err.message), status);
      }
    }

    const code = errorCode(err);
    const status = code === undefined ? undefined : STATUS_MAP[code];

    if (code === undefined || status === undefined) {
      options.onInternalError?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}

function httpErrorCode(status: ErrorStatus): string {
  switch (status) {
    case 400:
      return "VALIDATION_ERROR";
    case 401:
      return "UNAUTHORIZED";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    case 412:
      return "PRECONDITION_FAILED";
    default:
      return "CONFLICT";
  }
}
