/**
 * Operational routes. No auth.
 *
 * GET /health  — Liveness probe (always 200 while the process serves)
 * GET /ready   — Readiness probe (network loaded, line count)
 * GET /metrics — Prometheus text exposition format
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { NetworkService } from "../services/network-service.js";

export function createHealthRoutes(service: NetworkService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    return c.json({
      status: "ready",
      lines: service.lineCount,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

export function createMetricsRoute(collector: MetricsCollector): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) => {
    return c.text(collector.render(), 200, {
      "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
    });
  });

  return routes;
}
