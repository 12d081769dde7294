/**
 * @trustnet/trust-lines — Read-only views of a trust line.
 *
 * Both views are computed from the caller's side of the line and never
 * touch storage.
 */

import type { BalanceResult, CreditResult, ParticipantId, TrustLine } from "@trustnet/types";
import { directionOf } from "./canonical.js";

function nonNegative(value: bigint): bigint {
  return value < 0n ? 0n : value;
}

/**
 * The line balance, plus the same balance from the caller's side
 * (positive = the counterparty owes the caller).
 */
export function readBalance(line: TrustLine, caller: ParticipantId): BalanceResult {
  const direction = directionOf(line.pair, caller);
  return {
    type: "balance",
    pair: line.pair,
    balance: line.balance,
    net: direction === 1 ? line.balance : -line.balance,
  };
}

/**
 * Remaining payment capacity in each direction, clamped at zero.
 */
export function readCredit(line: TrustLine, caller: ParticipantId): CreditResult {
  const upward = nonNegative(line.limitLo - line.balance);
  const downward = nonNegative(line.limitHi + line.balance);
  const direction = directionOf(line.pair, caller);
  return {
    type: "credit",
    pair: line.pair,
    canSend: direction === 1 ? upward : downward,
    canReceive: direction === 1 ? downward : upward,
  };
}
