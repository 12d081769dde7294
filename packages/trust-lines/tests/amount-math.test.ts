/**
 * Tests for checked amount arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  absAmount,
  assertAmount,
  assertLimit,
  assertQuality,
  checkedAdd,
  checkedMul,
  decay,
  decaySchedule,
  parseInteger,
} from "../src/amount-math.js";
import { codeOf } from "./helpers.js";
import { MAX_AMOUNT, MAX_BALANCE, MIN_BALANCE } from "../src/types.js";

describe("validation", () => {
  it("accepts amounts in [1, 2^63 - 1]", () => {
    expect(() => assertAmount(1n)).not.toThrow();
    expect(() => assertAmount(MAX_AMOUNT)).not.toThrow();
  });

  it("rejects zero and negative amounts", () => {
    expect(() => assertAmount(0n)).toThrow(/Amount must be positive/);
    expect(() => assertAmount(-5n)).toThrow(/Amount must be positive/);
  });

  it("rejects amounts above 2^63 - 1 as overflow", () => {
    expect(() => assertAmount(MAX_AMOUNT + 1n)).toThrow(/exceeds/);
  });

  it("rejects non-positive limits", () => {
    expect(() => assertLimit(0n, "limitLo")).toThrow(/limitLo must be a positive integer/);
  });

  it("accepts qualities in (0, 1_000_000]", () => {
    expect(() => assertQuality(1, "qualityIn")).not.toThrow();
    expect(() => assertQuality(1_000_000, "qualityIn")).not.toThrow();
    expect(() => assertQuality(0, "qualityIn")).toThrow(/qualityIn/);
    expect(() => assertQuality(1_000_001, "qualityOut")).toThrow(/qualityOut/);
    expect(() => assertQuality(0.5, "qualityIn")).toThrow(/qualityIn/);
  });
});

describe("checkedAdd / checkedMul", () => {
  it("adds within range", () => {
    expect(checkedAdd(40n, -80n)).toBe(-40n);
  });

  it("throws outside the signed 64-bit range", () => {
    expect(() => checkedAdd(MAX_BALANCE, 1n)).toThrow(/Balance overflow/);
    expect(() => checkedAdd(MIN_BALANCE, -1n)).toThrow(/Balance overflow/);
  });

  it("throws when the product exceeds 2^64 - 1", () => {
    expect(checkedMul(2n ** 32n, 2n ** 31n)).toBe(2n ** 63n);
    expect(() => checkedMul(2n ** 32n, 2n ** 32n)).toThrow(/Product overflow/);
  });
});

describe("decay", () => {
  it("takes 0.1% per hop, rounded down", () => {
    expect(decay(1000n)).toBe(999n);
    expect(decay(999n)).toBe(998n);
    expect(decay(1n)).toBe(0n);
  });

  it("builds one value per leg", () => {
    expect(decaySchedule(1000n, 3)).toEqual([1000n, 999n, 998n, 997n]);
    expect(decaySchedule(5n, 1)).toEqual([5n, 4n]);
  });

  it("overflows on amounts too large to multiply", () => {
    expect(() => decay(MAX_AMOUNT)).toThrow(/Product overflow/);
  });
});

describe("absAmount / parseInteger", () => {
  it("returns magnitudes", () => {
    expect(absAmount(-7n)).toBe(7n);
    expect(absAmount(7n)).toBe(7n);
  });

  it("parses signed decimal strings", () => {
    expect(parseInteger("1000")).toBe(1000n);
    expect(parseInteger(" -25 ")).toBe(-25n);
  });

  it("rejects anything else with the given code", () => {
    expect(() => parseInteger("1.5")).toThrow(/Invalid integer/);
    expect(codeOf(() => parseInteger("1e3", "INVALID_SNAPSHOT"))).toBe("INVALID_SNAPSHOT");
  });
});
