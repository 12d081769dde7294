/**
 * Command Types
 *
 * The operation catalog of the credit network. Every request from a
 * host arrives as one of these commands together with the identity of
 * the calling participant, and is processed as one atomic transaction.
 *
 * Rules:
 * - Commands are plain data (no methods, no bigint coercion)
 * - Parties are named relative to the caller; roles are canonicalized later
 * - Read commands (`balance`, `credit`) never mutate state
 */

import type { CanonicalPair, ParticipantId } from "./participant.js";
import type { TrustLine } from "./trust-line.js";

// =============================================================================
// Commands
// =============================================================================

export interface CreateCommand {
  readonly type: "create";
  readonly counterparty: ParticipantId;
  readonly assetId: number;
  readonly limitLo: bigint;
  readonly limitHi: bigint;
  readonly allowRippling: boolean;
}

export interface SendCommand {
  readonly type: "send";
  readonly recipient: ParticipantId;
  readonly amount: bigint;
}

export interface RippleCommand {
  readonly type: "ripple";
  readonly recipient: ParticipantId;
  /** Intermediate participants, in forwarding order (1–6) */
  readonly hops: readonly ParticipantId[];
  readonly amount: bigint;
}

export interface QualityCommand {
  readonly type: "quality";
  readonly counterparty: ParticipantId;
  readonly qualityIn: number;
  readonly qualityOut: number;
}

export interface RippleSetCommand {
  readonly type: "ripple_set";
  readonly counterparty: ParticipantId;
  readonly allowRippling: boolean;
}

export interface LimitsCommand {
  readonly type: "limits";
  readonly counterparty: ParticipantId;
  readonly limitLo: bigint;
  readonly limitHi: bigint;
  /** Participants other than the caller that co-signed this request */
  readonly coSigners: readonly ParticipantId[];
}

export interface FreezeCommand {
  readonly type: "freeze";
  readonly account: ParticipantId;
  readonly counterparty: ParticipantId;
}

export interface SettleCommand {
  readonly type: "settle";
  readonly counterparty: ParticipantId;
  readonly amount: bigint;
  /** External settlement reference (e.g. a transfer id on the asset layer) */
  readonly reference?: string | undefined;
}

export interface BalanceCommand {
  readonly type: "balance";
  readonly counterparty: ParticipantId;
}

export interface CreditCommand {
  readonly type: "credit";
  readonly counterparty: ParticipantId;
}

export type Command =
  | CreateCommand
  | SendCommand
  | RippleCommand
  | QualityCommand
  | RippleSetCommand
  | LimitsCommand
  | FreezeCommand
  | SettleCommand
  | BalanceCommand
  | CreditCommand;

export type CommandType = Command["type"];

// =============================================================================
// Results
// =============================================================================

/**
 * Result of a command that changed (or created) exactly one trust line.
 */
export interface LineResult {
  readonly type: "create" | "send" | "quality" | "ripple_set" | "limits" | "freeze";
  readonly line: TrustLine;
}

/**
 * Result of a settlement: the updated line plus the external reference
 * the payer attached, if any.
 */
export interface SettleResult {
  readonly type: "settle";
  readonly line: TrustLine;
  readonly reference: string | undefined;
}

/**
 * One leg of a rippled payment, as committed.
 */
export interface RippleHop {
  readonly from: ParticipantId;
  readonly to: ParticipantId;
  readonly pair: CanonicalPair;
  /** Amount carried by this leg after decay */
  readonly amount: bigint;
  /** Line balance after this leg was applied */
  readonly balance: bigint;
}

export interface RippleResult {
  readonly type: "ripple";
  readonly hops: readonly RippleHop[];
  /** Amount that reached the recipient */
  readonly delivered: bigint;
}

export interface BalanceResult {
  readonly type: "balance";
  readonly pair: CanonicalPair;
  /** Canonical balance (positive = `hi` owes `lo`) */
  readonly balance: bigint;
  /** Balance from the caller's side (positive = counterparty owes caller) */
  readonly net: bigint;
}

export interface CreditResult {
  readonly type: "credit";
  readonly pair: CanonicalPair;
  /** How much more the caller can pay the counterparty right now */
  readonly canSend: bigint;
  /** How much more the counterparty can pay the caller right now */
  readonly canReceive: bigint;
}

export type CommandResult =
  | LineResult
  | SettleResult
  | RippleResult
  | BalanceResult
  | CreditResult;
