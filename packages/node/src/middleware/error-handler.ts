/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a
 * consistent error envelope response. Engine rejections are mapped by
 * kind; HTTP-level ApiErrors carry their own status. Anything else is
 * a 500 whose message is never sent to the client.
 */

import type { Context, ErrorHandler } from "hono";
import type { Logger } from "pino";
import { TrustLineError } from "@trustnet/trust-lines";
import type { TrustLineErrorKind } from "@trustnet/trust-lines";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_BY_KIND: Readonly<Record<TrustLineErrorKind, 400 | 403 | 404 | 409 | 422>> = {
  validation: 400,
  insufficient_credit: 422,
  authorization: 403,
  not_found: 404,
  already_exists: 409,
  rippling_disabled: 422,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 * Unexpected errors are logged with the request id when a logger is given.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof TrustLineError) {
      return c.json(createErrorEnvelope(err.code, err.message), STATUS_BY_KIND[err.kind]);
    }

    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    logger?.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
