/**
 * Narrow a CommandResult to the shape a route expects.
 *
 * The engine's dispatch returns the union; each command type maps to
 * exactly one result shape, so a mismatch here is a programming error.
 */

import type {
  BalanceResult,
  CommandResult,
  CreditResult,
  RippleResult,
  SettleResult,
  TrustLine,
} from "@trustnet/types";

function unexpected(result: CommandResult, expected: string): Error {
  return new Error(`Expected a ${expected} result, got "${result.type}"`);
}

export function lineOf(result: CommandResult): TrustLine {
  if (!("line" in result)) {
    throw unexpected(result, "line");
  }
  return result.line;
}

export function settleOf(result: CommandResult): SettleResult {
  if (result.type !== "settle") {
    throw unexpected(result, "settle");
  }
  return result;
}

export function rippleOf(result: CommandResult): RippleResult {
  if (result.type !== "ripple") {
    throw unexpected(result, "ripple");
  }
  return result;
}

export function balanceOf(result: CommandResult): BalanceResult {
  if (result.type !== "balance") {
    throw unexpected(result, "balance");
  }
  return result;
}

export function creditOf(result: CommandResult): CreditResult {
  if (result.type !== "credit") {
    throw unexpected(result, "credit");
  }
  return result;
}
