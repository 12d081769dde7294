/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_BY_KIND } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseQuery } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  headerIdentityMiddleware,
  verifyJwt,
  signJwt,
  CO_SIGNER_KEY_HEADER,
  CO_SIGNER_TOKEN_HEADER,
  PARTICIPANT_HEADER,
  CO_SIGNER_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { metricsMiddleware, MetricsCollector, normalizePath, UNMATCHED_PATH } from "./metrics.js";
