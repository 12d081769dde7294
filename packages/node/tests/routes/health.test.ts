/**
 * Tests for operational routes: /health, /ready, /metrics.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { identity, createTestApp, jsonRequest, openLine } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

describe("GET /health", () => {
  it("returns 200 without authentication", async () => {
    const res = await instance.app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("ok");
  });

  it("echoes a well-formed X-Request-Id", async () => {
    const res = await instance.app.request("/health", {
      headers: { "X-Request-Id": "req-42" },
    });

    expect(res.headers.get("X-Request-Id")).toBe("req-42");
  });

  it("replaces a malformed X-Request-Id with a UUID", async () => {
    const res = await instance.app.request("/health", {
      headers: { "X-Request-Id": "has spaces" },
    });

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});

describe("GET /ready", () => {
  it("reports the number of lines", async () => {
    const empty = await instance.app.request("/ready");
    expect(((await empty.json()) as { lines: number }).lines).toBe(0);

    await openLine(instance, "alice", "bob", "10", "10");

    const res = await instance.app.request("/ready");
    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; lines: number };
    expect(body.status).toBe("ready");
    expect(body.lines).toBe(1);
  });
});

describe("GET /metrics", () => {
  it("exposes request counters with participant ids collapsed", async () => {
    await instance.app.request(jsonRequest("/api/v1/trust-lines/bob", "GET", undefined, identity("alice")));

    const res = await instance.app.request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    const text = await res.text();
    expect(text).toContain(
      'http_requests_total{method="GET",path="/api/v1/trust-lines/:counterparty",status="404"} 1',
    );
  });

  it("counts committed and rejected commands", async () => {
    await openLine(instance, "alice", "bob", "10", "10");
    await instance.app.request(
      jsonRequest("/api/v1/payments", "POST", { recipient: "carol", amount: "1" }, identity("alice")),
    );

    const text = await (await instance.app.request("/metrics")).text();

    expect(text).toContain('trustnet_commands_total{command="create",outcome="committed"} 1');
    expect(text).toContain(
      'trustnet_commands_total{code="TRUST_LINE_NOT_FOUND",command="send",outcome="rejected"} 1',
    );
  });

  it("is absent when metrics are disabled", async () => {
    instance = createTestApp({ enableMetrics: false });

    const res = await instance.app.request("/metrics");

    expect(res.status).toBe(404);
  });
});
