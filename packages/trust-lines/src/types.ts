/**
 * @trustnet/trust-lines — Internal types for the credit-line engine.
 *
 * These extend the shared @trustnet/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid requests throw, never silently succeed
 * - A failed request leaves every trust line untouched
 */

import type { ParticipantId } from "@trustnet/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Quality parity: rate factors are scaled by one million. */
export const QUALITY_PARITY = 1_000_000;

/** Fixed per-hop forwarding rate, parts per million (0.1% cost per hop). */
export const HOP_RATE_PPM = 999_000n;

/** Upper bound on intermediate participants in one rippled payment. */
export const MAX_HOPS = 6;

/** Largest amount or limit a request may carry (signed 64-bit maximum). */
export const MAX_AMOUNT = 2n ** 63n - 1n;

/** Balance range (signed 64-bit). */
export const MIN_BALANCE = -(2n ** 63n);
export const MAX_BALANCE = 2n ** 63n - 1n;

/** Largest intermediate product of the decay multiplication (unsigned 64-bit). */
export const MAX_PRODUCT = 2n ** 64n - 1n;

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Settings captured when a network is initialized.
 * Frozen at construction and passed by reference to every handler.
 */
export interface NetworkConfig {
  /** The only identity allowed to freeze trust lines */
  readonly admin: ParticipantId;
  /** Maximum intermediate hops per rippled payment (1–6, default 6) */
  readonly maxHops?: number | undefined;
  /** Source of ISO 8601 timestamps (defaults to the wall clock) */
  readonly clock?: (() => string) | undefined;
}

export interface ResolvedNetworkConfig {
  readonly admin: ParticipantId;
  readonly maxHops: number;
  readonly clock: () => string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for trust-line operations. */
export type TrustLineErrorCode =
  | "INVALID_PARTICIPANT"
  | "SELF_PAIR"
  | "INVALID_AMOUNT"
  | "INVALID_LIMIT"
  | "INVALID_QUALITY"
  | "INVALID_HOPS"
  | "INVALID_ASSET"
  | "INVALID_CONFIG"
  | "INVALID_SNAPSHOT"
  | "ARITHMETIC_OVERFLOW"
  | "LIMIT_BELOW_EXPOSURE"
  | "TRUST_LINE_FROZEN"
  | "NOTHING_TO_SETTLE"
  | "SETTLEMENT_EXCEEDS_BALANCE"
  | "NOT_OBLIGOR"
  | "REENTRANT_CALL"
  | "STORAGE_CORRUPTED"
  | "INSUFFICIENT_CREDIT"
  | "NOT_ADMIN"
  | "MISSING_CO_SIGNATURE"
  | "TRUST_LINE_NOT_FOUND"
  | "TRUST_LINE_EXISTS"
  | "RIPPLING_DISABLED";

/** Broad failure categories. Hosts map these to their own status codes. */
export type TrustLineErrorKind =
  | "validation"
  | "insufficient_credit"
  | "authorization"
  | "not_found"
  | "already_exists"
  | "rippling_disabled";

export const ERROR_KIND: Readonly<Record<TrustLineErrorCode, TrustLineErrorKind>> = {
  INVALID_PARTICIPANT: "validation",
  SELF_PAIR: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_LIMIT: "validation",
  INVALID_QUALITY: "validation",
  INVALID_HOPS: "validation",
  INVALID_ASSET: "validation",
  INVALID_CONFIG: "validation",
  INVALID_SNAPSHOT: "validation",
  ARITHMETIC_OVERFLOW: "validation",
  LIMIT_BELOW_EXPOSURE: "validation",
  TRUST_LINE_FROZEN: "validation",
  NOTHING_TO_SETTLE: "validation",
  SETTLEMENT_EXCEEDS_BALANCE: "validation",
  NOT_OBLIGOR: "validation",
  REENTRANT_CALL: "validation",
  STORAGE_CORRUPTED: "validation",
  INSUFFICIENT_CREDIT: "insufficient_credit",
  NOT_ADMIN: "authorization",
  MISSING_CO_SIGNATURE: "authorization",
  TRUST_LINE_NOT_FOUND: "not_found",
  TRUST_LINE_EXISTS: "already_exists",
  RIPPLING_DISABLED: "rippling_disabled",
} as const;

/**
 * Structured error from the credit-line engine.
 * Always thrown — never returns error codes silently.
 */
export class TrustLineError extends Error {
  public readonly code: TrustLineErrorCode;
  public readonly kind: TrustLineErrorKind;

  constructor(code: TrustLineErrorCode, message: string) {
    super(message);
    this.name = "TrustLineError";
    this.code = code;
    this.kind = ERROR_KIND[code];
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * JSON-safe form of a trust line. Amounts are decimal strings.
 */
export interface SerializedTrustLine {
  readonly lo: ParticipantId;
  readonly hi: ParticipantId;
  readonly assetId: number;
  readonly limitLo: string;
  readonly limitHi: string;
  readonly balance: string;
  readonly qualityIn: number;
  readonly qualityOut: number;
  readonly allowRippling: boolean;
  readonly sequence: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Serializable snapshot of every trust line and the creation counter.
 * Used for persistence and rehydration.
 */
export interface NetworkSnapshot {
  readonly version: 1;
  readonly lineCount: number;
  readonly lines: readonly SerializedTrustLine[];
  readonly createdAt: string;
}
