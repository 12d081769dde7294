/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { ParticipantId } from "@trustnet/types";
import type { AppEnv } from "./types/api-contract.js";
import { NetworkService } from "./services/network-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { authMiddleware, headerIdentityMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes, createMetricsRoute } from "./routes/health.js";
import { createTrustLineRoutes } from "./routes/trust-lines.js";
import { createPaymentRoutes } from "./routes/payments.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** The network admin participant */
  readonly admin: ParticipantId;
  readonly maxHops?: number | undefined;
  /** ISO-8601 clock for line timestamps and audit entries */
  readonly clock?: (() => string) | undefined;
  readonly logger?: Logger | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Auth configuration. When omitted, identity comes from X-Participant-Id. */
  readonly auth?: AuthConfig | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
  /** Snapshot to restore the network from (validated in full) */
  readonly snapshot?: unknown;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: NetworkService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const enableMetrics = options.enableMetrics !== false;
  const metricsCollector = new MetricsCollector();
  const service = new NetworkService({
    admin: options.admin,
    maxHops: options.maxHops,
    clock: options.clock,
    logger: options.logger,
    metrics: enableMetrics ? metricsCollector : undefined,
    snapshot: options.snapshot,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── Metrics Route (no auth for Prometheus scraping) ────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): identity from X-Participant-Id
    app.use("/api/*", headerIdentityMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Idempotency for POST /api/* requests, scoped per caller
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1/trust-lines", createTrustLineRoutes());
  app.route("/api/v1/payments", createPaymentRoutes());
  app.route("/api/v1/admin", createAdminRoutes());

  return { app, service, idempotencyStore, metricsCollector };
}
