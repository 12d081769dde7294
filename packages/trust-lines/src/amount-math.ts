/**
 * @trustnet/trust-lines — Checked integer arithmetic.
 *
 * Amounts, limits and balances are bigint. The engine still treats them
 * as fixed-width values: balances are signed 64-bit and the decay
 * product is unsigned 64-bit, and leaving either range is an error
 * rather than a silent wrap.
 *
 * Rules:
 * - No floating-point operations
 * - Overflow throws ARITHMETIC_OVERFLOW
 * - Decay rounds down (floor division), nothing else truncates
 */

import {
  HOP_RATE_PPM,
  MAX_AMOUNT,
  MAX_BALANCE,
  MAX_PRODUCT,
  MIN_BALANCE,
  QUALITY_PARITY,
  TrustLineError,
} from "./types.js";
import type { TrustLineErrorCode } from "./types.js";

const PPM = 1_000_000n;

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert a transfer amount is a positive bigint within range.
 */
export function assertAmount(amount: bigint, label: string = "Amount"): void {
  if (typeof amount !== "bigint") {
    throw new TrustLineError("INVALID_AMOUNT", `${label} must be an integer, got: ${String(amount)}`);
  }
  if (amount <= 0n) {
    throw new TrustLineError("INVALID_AMOUNT", `${label} must be positive, got: ${amount.toString()}`);
  }
  if (amount > MAX_AMOUNT) {
    throw new TrustLineError("ARITHMETIC_OVERFLOW", `${label} exceeds ${MAX_AMOUNT.toString()}`);
  }
}

/**
 * Assert a credit limit is a positive bigint within range.
 */
export function assertLimit(limit: bigint, label: string): void {
  if (typeof limit !== "bigint" || limit <= 0n) {
    throw new TrustLineError("INVALID_LIMIT", `${label} must be a positive integer, got: ${String(limit)}`);
  }
  if (limit > MAX_AMOUNT) {
    throw new TrustLineError("ARITHMETIC_OVERFLOW", `${label} exceeds ${MAX_AMOUNT.toString()}`);
  }
}

/**
 * Assert a quality factor is an integer in (0, 1_000_000].
 */
export function assertQuality(quality: number, label: string): void {
  if (!Number.isInteger(quality) || quality <= 0 || quality > QUALITY_PARITY) {
    throw new TrustLineError(
      "INVALID_QUALITY",
      `${label} must be an integer in (0, ${String(QUALITY_PARITY)}], got: ${String(quality)}`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Add two balance-range values. Throws if the sum leaves the signed 64-bit range.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum < MIN_BALANCE || sum > MAX_BALANCE) {
    throw new TrustLineError(
      "ARITHMETIC_OVERFLOW",
      `Balance overflow: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

/**
 * Multiply two non-negative values. Throws if the product exceeds 2^64 - 1.
 */
export function checkedMul(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product < 0n || product > MAX_PRODUCT) {
    throw new TrustLineError(
      "ARITHMETIC_OVERFLOW",
      `Product overflow: ${a.toString()} * ${b.toString()}`,
    );
  }
  return product;
}

/**
 * Amount forwarded past one hop boundary.
 *
 * 1000n → 999n, 999n → 998n, 1n → 0n
 */
export function decay(amount: bigint): bigint {
  return checkedMul(amount, HOP_RATE_PPM) / PPM;
}

/**
 * Amount carried by each leg of a path with `hopCount` intermediates.
 *
 * Returns `hopCount + 1` values: `[amount, decay(amount), ...]`.
 * decaySchedule(1000n, 3) → [1000n, 999n, 998n, 997n]
 */
export function decaySchedule(amount: bigint, hopCount: number): readonly bigint[] {
  const schedule: bigint[] = [amount];
  let current = amount;
  for (let i = 0; i < hopCount; i++) {
    current = decay(current);
    schedule.push(current);
  }
  return schedule;
}

/**
 * Absolute value of a bigint.
 */
export function absAmount(value: bigint): bigint {
  return value < 0n ? -value : value;
}

// ─── Parsing ─────────────────────────────────────────────────────────────

/**
 * Parse a base-10 integer string into a bigint.
 *
 * "1000" → 1000n, "-25" → -25n
 */
export function parseInteger(
  value: string,
  code: TrustLineErrorCode = "INVALID_AMOUNT",
): bigint {
  if (typeof value !== "string" || !/^-?\d+$/.test(value.trim())) {
    throw new TrustLineError(code, `Invalid integer: "${String(value)}"`);
  }
  return BigInt(value.trim());
}
