/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key, scoped to the
 * calling participant, method and path: two participants may use the
 * same key without seeing each other's responses, and one key never
 * replays another route's response. A repeated key within the TTL
 * replays the cached response instead of running the command again.
 * The same key with a different body is rejected with 422.
 *
 * A duplicate that arrives while the first request is still running
 * waits for it, then replays its response (or runs itself if the first
 * one failed).
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";
import { REQUEST_ID_HEADER } from "./request-id.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  /** SHA-256 of the request body that produced this response. */
  readonly fingerprint: string;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(scope: string, key: string): CachedResponse | undefined;
  set(scope: string, key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  /** scope → key → response */
  private readonly _cache = new Map<string, Map<string, CachedResponse>>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(scope: string, key: string): CachedResponse | undefined {
    const entries = this._cache.get(scope);
    const entry = entries?.get(key);
    if (entries === undefined || entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      entries.delete(key);
      return undefined;
    }

    return entry;
  }

  set(scope: string, key: string, response: CachedResponse): void {
    let entries = this._cache.get(scope);
    if (entries === undefined) {
      entries = new Map();
      this._cache.set(scope, entries);
    }
    entries.set(key, response);
  }

  get size(): number {
    let total = 0;
    for (const entries of this._cache.values()) {
      total += entries.size;
    }
    return total;
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

function fingerprintOf(body: string): string {
  return createHash("sha256").update(body).digest("hex");
}

/**
 * Must run after the identity middleware, which sets `caller`.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  /** `scope\nkey` → settles when the request holding the key finishes */
  const inFlight = new Map<string, Promise<void>>();

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const scope = `${c.get("caller")} ${c.req.method} ${c.req.path}`;
    const slot = `${scope}\n${idempotencyKey}`;
    const fingerprint = fingerprintOf(await c.req.text());

    let pending = inFlight.get(slot);
    while (pending !== undefined) {
      await pending;
      pending = inFlight.get(slot);
    }

    // From here to inFlight.set nothing awaits: the slot is claimed atomically.
    const cached = store.get(scope, idempotencyKey);
    if (cached !== undefined) {
      if (cached.fingerprint !== fingerprint) {
        throw new ApiError(
          422,
          "IDEMPOTENCY_KEY_REUSED",
          `Idempotency-Key "${idempotencyKey}" was already used with a different request body`,
        );
      }
      for (const [key, value] of Object.entries(cached.headers)) {
        if (key.toLowerCase() !== REQUEST_ID_HEADER.toLowerCase()) {
          c.header(key, value);
        }
      }
      c.header(REPLAY_HEADER, "true");
      return c.body(cached.body, cached.status === 201 ? 201 : 200);
    }

    let release: () => void = () => undefined;
    inFlight.set(
      slot,
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );

    try {
      await next();

      if (c.res.status < 400) {
        const clonedRes = c.res.clone();
        const body = await clonedRes.text();
        const headers: Record<string, string> = {};
        clonedRes.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(scope, idempotencyKey, {
          status: clonedRes.status,
          fingerprint,
          body,
          headers,
          cachedAt: now(),
        });
      }
    } finally {
      inFlight.delete(slot);
      release();
    }
  };
}
