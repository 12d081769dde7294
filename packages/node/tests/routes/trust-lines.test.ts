/**
 * Tests for trust line routes.
 *
 * Covers: create, list (pagination), get, balance, credit, quality,
 * rippling, limits (co-signing), settle.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TS, identity, createTestApp, jsonRequest, openLine } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import type { AppInstance } from "../../src/app.js";
import type { TrustLineDto } from "../../src/types/dto.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function pay(from: string, to: string, amount: string): Promise<Response> {
  return instance.app.request(
    jsonRequest("/api/v1/payments", "POST", { recipient: to, amount }, identity(from)),
  );
}

// =============================================================================
// POST /api/v1/trust-lines — Create
// =============================================================================

describe("POST /api/v1/trust-lines", () => {
  it("opens a line and returns 201 with canonical roles", async () => {
    const res = await openLine(instance, "bob", "alice", "1000", "500");

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: TrustLineDto };
    expect(body.data).toEqual({
      lo: "alice",
      hi: "bob",
      assetId: 0,
      limitLo: "1000",
      limitHi: "500",
      balance: "0",
      qualityIn: 1000000,
      qualityOut: 1000000,
      allowRippling: false,
      frozen: false,
      sequence: 1,
      createdAt: TS,
      updatedAt: TS,
    });
  });

  it("returns 409 when the pair already has a line", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");
    const res = await openLine(instance, "bob", "alice", "10", "10");

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("TRUST_LINE_EXISTS");
  });

  it("returns 400 for a line with oneself", async () => {
    const res = await openLine(instance, "alice", "alice", "1000", "500");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("SELF_PAIR");
  });

  it("returns 400 VALIDATION_ERROR for a malformed limit", async () => {
    const res = await openLine(instance, "alice", "bob", "-5", "500");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.["issues"]).toEqual([
      { path: "limitLo", message: "must be a decimal integer string" },
    ]);
  });

  it("returns 400 INVALID_LIMIT for a zero limit", async () => {
    const res = await openLine(instance, "alice", "bob", "0", "500");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_LIMIT");
  });

  it("returns 400 for invalid JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/trust-lines", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Participant-Id": "alice" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid JSON in request body");
  });

  it("returns 401 without a participant header", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines", "POST", {
        counterparty: "bob",
        limitLo: "1",
        limitHi: "1",
      }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNAUTHORIZED");
  });
});

// =============================================================================
// GET /api/v1/trust-lines — List
// =============================================================================

describe("GET /api/v1/trust-lines", () => {
  it("returns an empty page when the caller has no lines", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/trust-lines", "GET", undefined, identity("alice")));

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: TrustLineDto[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(body.data).toEqual([]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("lists only the caller's lines, ordered by counterparty", async () => {
    await openLine(instance, "carol", "dave", "10", "10");
    await openLine(instance, "carol", "alice", "10", "10");
    await openLine(instance, "alice", "bob", "10", "10");

    const res = await instance.app.request(jsonRequest("/api/v1/trust-lines", "GET", undefined, identity("carol")));
    const body = (await res.json()) as { data: TrustLineDto[] };

    expect(body.data.map((l) => [l.lo, l.hi])).toEqual([
      ["alice", "carol"],
      ["carol", "dave"],
    ]);
  });

  it("pages with a cursor", async () => {
    await openLine(instance, "alice", "dave", "10", "10");
    await openLine(instance, "alice", "bob", "10", "10");
    await openLine(instance, "alice", "carol", "10", "10");

    const first = await instance.app.request(
      jsonRequest("/api/v1/trust-lines?limit=2", "GET", undefined, identity("alice")),
    );
    const page1 = (await first.json()) as {
      data: TrustLineDto[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page1.data.map((l) => l.hi)).toEqual(["bob", "carol"]);
    expect(page1.pagination.hasMore).toBe(true);

    const cursor = page1.pagination.cursor;
    expect(cursor).not.toBeNull();

    const second = await instance.app.request(
      jsonRequest(`/api/v1/trust-lines?limit=2&cursor=${String(cursor)}`, "GET", undefined, identity("alice")),
    );
    const page2 = (await second.json()) as {
      data: TrustLineDto[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(page2.data.map((l) => l.hi)).toEqual(["dave"]);
    expect(page2.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("returns 400 for a malformed cursor", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines?cursor=garbage", "GET", undefined, identity("alice")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid pagination cursor");
  });

  it("returns 400 for an out-of-range limit", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines?limit=0", "GET", undefined, identity("alice")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

// =============================================================================
// GET /api/v1/trust-lines/:counterparty
// =============================================================================

describe("GET /api/v1/trust-lines/:counterparty", () => {
  it("returns the same line to either party", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");

    const fromBob = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice", "GET", undefined, identity("bob")),
    );
    const fromAlice = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob", "GET", undefined, identity("alice")),
    );

    expect(fromBob.status).toBe(200);
    expect(await fromBob.json()).toEqual(await fromAlice.json());
  });

  it("returns 404 when no line exists", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob", "GET", undefined, identity("alice")),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("TRUST_LINE_NOT_FOUND");
  });

  it("returns 400 for an invalid counterparty id", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bad*id", "GET", undefined, identity("alice")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: 'Invalid counterparty: "bad*id"',
    });
  });
});

// =============================================================================
// Balance and credit
// =============================================================================

describe("GET /api/v1/trust-lines/:counterparty/balance", () => {
  it("reports the balance from each side", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");
    await pay("alice", "bob", "300");

    const alice = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/balance", "GET", undefined, identity("alice")),
    );
    const bob = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/balance", "GET", undefined, identity("bob")),
    );

    expect(await alice.json()).toEqual({
      data: { lo: "alice", hi: "bob", balance: "300", net: "300" },
    });
    expect(await bob.json()).toEqual({
      data: { lo: "alice", hi: "bob", balance: "300", net: "-300" },
    });
  });
});

describe("GET /api/v1/trust-lines/:counterparty/credit", () => {
  it("reports remaining capacity in both directions", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");
    await pay("alice", "bob", "300");

    const alice = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/credit", "GET", undefined, identity("alice")),
    );
    const bob = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/credit", "GET", undefined, identity("bob")),
    );

    expect(await alice.json()).toEqual({
      data: { lo: "alice", hi: "bob", canSend: "700", canReceive: "800" },
    });
    expect(await bob.json()).toEqual({
      data: { lo: "alice", hi: "bob", canSend: "800", canReceive: "700" },
    });
  });
});

// =============================================================================
// Quality and rippling
// =============================================================================

describe("POST /api/v1/trust-lines/:counterparty/quality", () => {
  it("stores new quality factors", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");

    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/quality", "POST", { qualityIn: 990000, qualityOut: 1000000 }, identity("alice")),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: TrustLineDto };
    expect(body.data.qualityIn).toBe(990000);
    expect(body.data.qualityOut).toBe(1000000);
  });

  it("returns 400 for a quality outside (0, 1000000]", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");

    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/quality", "POST", { qualityIn: 0, qualityOut: 1000000 }, identity("alice")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_QUALITY");
  });
});

describe("POST /api/v1/trust-lines/:counterparty/rippling", () => {
  it("toggles rippling", async () => {
    await openLine(instance, "alice", "bob", "1000", "500");

    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/rippling", "POST", { allowRippling: true }, identity("bob")),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: TrustLineDto };
    expect(body.data.allowRippling).toBe(true);
  });
});

// =============================================================================
// Limits
// =============================================================================

describe("POST /api/v1/trust-lines/:counterparty/limits", () => {
  beforeEach(async () => {
    await openLine(instance, "alice", "bob", "1000", "500");
  });

  it("updates both limits when the counterparty co-signs", async () => {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/trust-lines/bob/limits",
        "POST",
        { limitLo: "2000", limitHi: "800" },
        identity("alice", { "X-Co-Signer-Id": "bob" }),
      ),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: TrustLineDto };
    expect(body.data.limitLo).toBe("2000");
    expect(body.data.limitHi).toBe("800");
  });

  it("returns 403 without the counterparty's signature", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/limits", "POST", { limitLo: "2000", limitHi: "800" }, identity("alice")),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "MISSING_CO_SIGNATURE",
      message: "Limit changes need approval from both parties; missing: bob",
    });
  });

  it("returns 400 when the new limit is below the current exposure", async () => {
    await pay("alice", "bob", "300");

    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/trust-lines/bob/limits",
        "POST",
        { limitLo: "200", limitHi: "500" },
        identity("alice", { "X-Co-Signer-Id": "bob" }),
      ),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("LIMIT_BELOW_EXPOSURE");
  });
});

// =============================================================================
// Settle
// =============================================================================

describe("POST /api/v1/trust-lines/:counterparty/settle", () => {
  beforeEach(async () => {
    await openLine(instance, "alice", "bob", "1000", "500");
    await pay("alice", "bob", "300");
  });

  it("moves the balance toward zero and echoes the reference", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/settle", "POST", { amount: "100", reference: "wire-1" }, identity("bob")),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { line: TrustLineDto; reference: string | null } };
    expect(body.data.line.balance).toBe("200");
    expect(body.data.reference).toBe("wire-1");
  });

  it("returns a null reference when none is given", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/settle", "POST", { amount: "300" }, identity("bob")),
    );

    const body = (await res.json()) as { data: { line: TrustLineDto; reference: string | null } };
    expect(body.data.line.balance).toBe("0");
    expect(body.data.reference).toBeNull();
  });

  it("rejects a settlement from the party that is owed", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/bob/settle", "POST", { amount: "100" }, identity("alice")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_OBLIGOR");
  });

  it("rejects a settlement larger than the outstanding balance", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/trust-lines/alice/settle", "POST", { amount: "301" }, identity("bob")),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("SETTLEMENT_EXCEEDS_BALANCE");
  });
});
