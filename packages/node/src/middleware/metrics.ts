/**
 * Prometheus metrics middleware + collector.
 *
 * Text exposition format, no prom-client. Collects:
 * - http_requests_total (counter, by method + status + path)
 * - http_request_duration_seconds (histogram, by method + path)
 * - named counters recorded by the service (trustnet_commands_total)
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

interface RequestCounter {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  count: number;
}

interface DurationHistogram {
  readonly method: string;
  readonly path: string;
  sum: number;
  count: number;
  /** le → cumulative count */
  readonly buckets: Map<number, number>;
}

interface NamedCounter {
  readonly labels: Readonly<Record<string, string>>;
  count: number;
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];

export class MetricsCollector {
  private readonly _requests = new Map<string, RequestCounter>();
  private readonly _durations = new Map<string, DurationHistogram>();
  private readonly _named = new Map<string, Map<string, NamedCounter>>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = [...buckets].sort((a, b) => a - b);
  }

  recordRequest(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ): void {
    const counterKey = `${method} ${path} ${status}`;
    const counter = this._requests.get(counterKey);
    if (counter !== undefined) {
      counter.count++;
    } else {
      this._requests.set(counterKey, { method, path, status, count: 1 });
    }

    const histKey = `${method} ${path}`;
    let hist = this._durations.get(histKey);
    if (hist === undefined) {
      hist = {
        method,
        path,
        sum: 0,
        count: 0,
        buckets: new Map(this._buckets.map((le) => [le, 0])),
      };
      this._durations.set(histKey, hist);
    }
    const seconds = durationMs / 1000;
    hist.sum += seconds;
    hist.count++;
    for (const le of this._buckets) {
      if (seconds <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  /**
   * Increment a named counter, e.g.
   * trustnet_commands_total{command="send",outcome="committed"}.
   */
  incrementCounter(name: string, labels: Record<string, string> = {}): void {
    let metric = this._named.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._named.set(name, metric);
    }

    const key = formatLabels(labels);
    const entry = metric.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      metric.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /** Current value of a named counter; 0 when never incremented. */
  counterValue(name: string, labels: Record<string, string> = {}): number {
    return this._named.get(name)?.get(formatLabels(labels))?.count ?? 0;
  }

  /**
   * Render all metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests");
    lines.push("# TYPE http_requests_total counter");
    for (const c of this._requests.values()) {
      const labels = formatLabels({
        method: c.method,
        path: c.path,
        status: String(c.status),
      });
      lines.push(`http_requests_total{${labels}} ${c.count}`);
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const h of this._durations.values()) {
      const base = formatLabels({ method: h.method, path: h.path });
      for (const [le, count] of h.buckets) {
        lines.push(`http_request_duration_seconds_bucket{${base},le="${le}"} ${count}`);
      }
      lines.push(`http_request_duration_seconds_bucket{${base},le="+Inf"} ${h.count}`);
      lines.push(`http_request_duration_seconds_sum{${base}} ${h.sum}`);
      lines.push(`http_request_duration_seconds_count{${base}} ${h.count}`);
    }

    for (const [name, entries] of this._named) {
      lines.push(`# HELP ${name} Counter`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of entries.values()) {
        const labelStr = formatLabels(labels);
        lines.push(labelStr.length > 0 ? `${name}{${labelStr}} ${count}` : `${name} ${count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    this._named.clear();
  }
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/** Labels sorted by name: `a="1",b="2"`. */
function formatLabels(labels: Readonly<Record<string, string>>): string {
  return Object.entries(labels)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${k}="${escapeLabel(v)}"`)
    .join(",");
}

// =============================================================================
// Path Normalization
// =============================================================================

/** Label for any path that matches no route. */
export const UNMATCHED_PATH = "/unmatched";

const KNOWN_ROUTES: readonly RegExp[] = [
  /^\/(health|ready|metrics)$/,
  /^\/api\/v1\/trust-lines(\/:counterparty(\/(balance|credit|quality|rippling|limits|settle))?)?$/,
  /^\/api\/v1\/payments(\/ripple)?$/,
  /^\/api\/v1\/admin\/(freeze|audit)$/,
];

/**
 * Collapse participant ids in URL paths so each route is one series:
 * `/api/v1/trust-lines/bob/credit` → `/api/v1/trust-lines/:counterparty/credit`.
 * Paths outside the route table all share {@link UNMATCHED_PATH}.
 */
export function normalizePath(path: string): string {
  const normalized = path.replace(/^(\/api\/v1\/trust-lines)\/[^/]+/, "$1/:counterparty");
  return KNOWN_ROUTES.some((route) => route.test(normalized)) ? normalized : UNMATCHED_PATH;
}

// =============================================================================
// Middleware
// =============================================================================

export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(
      c.req.method,
      normalizePath(c.req.path),
      c.res.status,
      durationMs,
    );
  };
}
