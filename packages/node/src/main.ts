/**
 * @trustnet/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, restores the last snapshot,
 * starts the HTTP server, and saves a snapshot on graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { SnapshotFile } from "./services/snapshot-file.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured; identity is taken from X-Participant-Id");
  }

  const snapshotFile =
    config.SNAPSHOT_PATH !== undefined ? new SnapshotFile(config.SNAPSHOT_PATH) : undefined;
  const snapshot = snapshotFile?.load();
  if (snapshotFile !== undefined) {
    logger.info(
      { path: snapshotFile.path, restored: snapshot !== undefined },
      "Snapshot file configured",
    );
  }

  const { app, service } = createApp({
    admin: config.ADMIN_ID,
    maxHops: config.MAX_HOPS,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth: authConfig,
    snapshot,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, admin: config.ADMIN_ID, lines: service.lineCount },
    "trustnet node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    if (snapshotFile !== undefined) {
      const stateHash = snapshotFile.save(service.snapshot());
      logger.info({ path: snapshotFile.path, stateHash }, "Snapshot saved");
    }
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Fatal startup errors exit non-zero
main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
