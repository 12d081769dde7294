/**
 * Tests for admin routes.
 *
 * Covers: freeze (admin-only, terminal), audit log access and filters.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ADMIN, TS, identity, createTestApp, jsonRequest, openLine } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import type { AppInstance } from "../../src/app.js";
import type { TrustLineDto } from "../../src/types/dto.js";

let instance: AppInstance;

beforeEach(async () => {
  instance = createTestApp();
  await openLine(instance, "alice", "bob", "1000", "500", true);
});

function freeze(caller: string): Response | Promise<Response> {
  return instance.app.request(
    jsonRequest("/api/v1/admin/freeze", "POST", { account: "bob", counterparty: "alice" }, identity(caller)),
  );
}

// =============================================================================
// POST /api/v1/admin/freeze
// =============================================================================

describe("POST /api/v1/admin/freeze", () => {
  it("zeroes both limits and disables rippling", async () => {
    const res = await freeze(ADMIN);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: TrustLineDto };
    expect(body.data).toMatchObject({
      lo: "alice",
      hi: "bob",
      limitLo: "0",
      limitHi: "0",
      allowRippling: false,
      frozen: true,
    });
  });

  it("returns 403 for anyone but the admin", async () => {
    const res = await freeze("alice");

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_ADMIN");
  });

  it("leaves the line unable to carry payments or regain limits", async () => {
    await freeze(ADMIN);

    const payment = await instance.app.request(
      jsonRequest("/api/v1/payments", "POST", { recipient: "bob", amount: "1" }, identity("alice")),
    );
    expect(payment.status).toBe(400);
    expect(((await payment.json()) as ErrorBody).error.code).toBe("TRUST_LINE_FROZEN");

    const limits = await instance.app.request(
      jsonRequest(
        "/api/v1/trust-lines/bob/limits",
        "POST",
        { limitLo: "1000", limitHi: "500" },
        identity("alice", { "X-Co-Signer-Id": "bob" }),
      ),
    );
    expect(limits.status).toBe(400);
    expect(((await limits.json()) as ErrorBody).error.code).toBe("TRUST_LINE_FROZEN");
  });

  it("returns 404 for a pair with no line", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/freeze", "POST", { account: "alice", counterparty: "carol" }, identity(ADMIN)),
    );

    expect(res.status).toBe(404);
  });
});

// =============================================================================
// GET /api/v1/admin/audit
// =============================================================================

interface AuditBody {
  data: {
    timestamp: string;
    action: string;
    actor: string;
    participants: string[];
    detail?: string;
  }[];
}

describe("GET /api/v1/admin/audit", () => {
  beforeEach(async () => {
    await instance.app.request(
      jsonRequest("/api/v1/payments", "POST", { recipient: "bob", amount: "100" }, identity("alice")),
    );
  });

  it("returns committed commands newest first", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/audit", "GET", undefined, identity(ADMIN)),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as AuditBody;
    expect(body.data).toEqual([
      {
        timestamp: TS,
        action: "send",
        actor: "alice",
        participants: ["alice", "bob"],
        detail: "amount=100",
      },
      {
        timestamp: TS,
        action: "create",
        actor: "alice",
        participants: ["alice", "bob"],
        detail: "limitLo=1000 limitHi=500",
      },
    ]);
  });

  it("omits rejected commands and reads", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/payments", "POST", { recipient: "bob", amount: "5000" }, identity("alice")),
    );
    await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/balance", "GET", undefined, identity("alice")),
    );

    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/audit", "GET", undefined, identity(ADMIN)),
    );
    const body = (await res.json()) as AuditBody;
    expect(body.data.map((e) => e.action)).toEqual(["send", "create"]);
  });

  it("filters by action and limits the result", async () => {
    const byAction = await instance.app.request(
      jsonRequest("/api/v1/admin/audit?action=create", "GET", undefined, identity(ADMIN)),
    );
    expect(((await byAction.json()) as AuditBody).data.map((e) => e.action)).toEqual(["create"]);

    const limited = await instance.app.request(
      jsonRequest("/api/v1/admin/audit?limit=1", "GET", undefined, identity(ADMIN)),
    );
    expect(((await limited.json()) as AuditBody).data.map((e) => e.action)).toEqual(["send"]);
  });

  it("filters by participant", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/audit?participant=carol", "GET", undefined, identity(ADMIN)),
    );

    expect(((await res.json()) as AuditBody).data).toEqual([]);
  });

  it("returns 403 for non-admin callers", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/audit", "GET", undefined, identity("alice")),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("FORBIDDEN");
  });
});
