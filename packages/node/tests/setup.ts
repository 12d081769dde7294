/**
 * Test helpers for @trustnet/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const TS = "2025-01-01T00:00:00.000Z";
export const ADMIN = "admin";

/**
 * Create a test app in unsecured mode: identity comes from
 * X-Participant-Id, the clock is fixed at TS.
 */
export function createTestApp(overrides: Partial<CreateAppOptions> = {}): AppInstance {
  return createApp({
    admin: ADMIN,
    clock: () => TS,
    ...overrides,
  });
}

/**
 * JSON request helper. `caller` becomes the X-Participant-Id header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Headers that make a request act as `participant` in unsecured mode. */
export function identity(participant: string, extra?: Record<string, string>): Record<string, string> {
  return { "X-Participant-Id": participant, ...extra };
}

/**
 * Open a line from `caller` to `counterparty` through the API.
 * Limits are in canonical roles (lo = the smaller id).
 */
export async function openLine(
  instance: AppInstance,
  caller: string,
  counterparty: string,
  limitLo: string,
  limitHi: string,
  allowRippling: boolean = false,
): Promise<Response> {
  return instance.app.request(
    jsonRequest(
      "/api/v1/trust-lines",
      "POST",
      { counterparty, limitLo, limitHi, allowRippling },
      identity(caller),
    ),
  );
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
