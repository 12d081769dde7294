/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses entries, splitting on the first colon only", () => {
    expect(parseApiKeys("k1:alice, k2:svc:payroll")).toEqual([
      { key: "k1", participantId: "alice" },
      { key: "k2", participantId: "svc:payroll" },
    ]);
  });

  it("rejects an entry without a participant", () => {
    expect(() => parseApiKeys("k1")).toThrow(
      'Invalid API_KEYS entry: "k1". Expected format: key:participantId',
    );
  });

  it("rejects an empty key", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
  });

  it("rejects an invalid participant id", () => {
    expect(() => parseApiKeys("k1:not valid")).toThrow('Invalid participant id "not valid" in API_KEYS');
  });

  it("rejects duplicate keys", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow("Duplicate API key in API_KEYS");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ ADMIN_ID: "admin" })).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      ADMIN_ID: "admin",
      MAX_HOPS: 6,
      API_KEYS: "",
      JWT_ISSUER: "trustnet",
      IDEMPOTENCY_TTL_MS: 86400000,
    });
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ ADMIN_ID: "admin", PORT: "8080", MAX_HOPS: "3" });

    expect(config.PORT).toBe(8080);
    expect(config.MAX_HOPS).toBe(3);
  });

  it("requires ADMIN_ID", () => {
    expect(() => loadConfig({})).toThrow();
  });

  it("rejects an invalid ADMIN_ID", () => {
    expect(() => loadConfig({ ADMIN_ID: "has space" })).toThrow();
  });

  it("rejects MAX_HOPS above six", () => {
    expect(() => loadConfig({ ADMIN_ID: "admin", MAX_HOPS: "7" })).toThrow();
  });

  it("reads optional secrets and paths", () => {
    const config = loadConfig({
      ADMIN_ID: "admin",
      JWT_SECRET: "test-secret",
      SNAPSHOT_PATH: "/var/lib/trustnet/snapshot.json",
    });

    expect(config.JWT_SECRET).toBe("test-secret");
    expect(config.SNAPSHOT_PATH).toBe("/var/lib/trustnet/snapshot.json");
  });
});
