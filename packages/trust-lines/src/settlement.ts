/**
 * @trustnet/trust-lines — Settlement of outstanding obligations.
 *
 * Records that the owing party paid part of its debt on the external
 * asset layer. The core never moves assets itself; it only moves the
 * balance toward zero once the host says the transfer happened.
 *
 * Rules:
 * - Only the party that currently owes may settle
 * - A settlement never crosses zero
 * - Frozen lines may still be settled, so their exposure can be wound down
 */

import type { ParticipantId, SettleResult, TrustLine } from "@trustnet/types";
import { absAmount, assertAmount } from "./amount-math.js";
import { canonicalize, directionOf } from "./canonical.js";
import type { TrustLineStore } from "./store.js";
import { TrustLineError } from "./types.js";

/**
 * Compute the balance after `payer` settles `amount`, without mutating anything.
 */
export function checkSettlement(line: TrustLine, payer: ParticipantId, amount: bigint): bigint {
  const direction = directionOf(line.pair, payer);

  if (line.balance === 0n) {
    throw new TrustLineError(
      "NOTHING_TO_SETTLE",
      `Trust line ${line.pair.lo}/${line.pair.hi} has no outstanding balance`,
    );
  }

  // balance > 0: hi owes lo, so hi (direction -1) settles; and the reverse.
  const obligor = line.balance > 0n ? line.pair.hi : line.pair.lo;
  if (payer !== obligor) {
    throw new TrustLineError(
      "NOT_OBLIGOR",
      `"${payer}" owes nothing on ${line.pair.lo}/${line.pair.hi}; "${obligor}" does`,
    );
  }

  const outstanding = absAmount(line.balance);
  if (amount > outstanding) {
    throw new TrustLineError(
      "SETTLEMENT_EXCEEDS_BALANCE",
      `Settlement of ${amount.toString()} exceeds the outstanding ${outstanding.toString()}`,
    );
  }

  return direction === 1 ? line.balance + amount : line.balance - amount;
}

export class SettlementEngine {
  private readonly _store: TrustLineStore;

  constructor(store: TrustLineStore) {
    this._store = store;
  }

  settle(
    payer: ParticipantId,
    counterparty: ParticipantId,
    amount: bigint,
    reference?: string,
  ): SettleResult {
    assertAmount(amount);
    const pair = canonicalize(payer, counterparty);
    const line = this._store.require(pair);
    const balance = checkSettlement(line, payer, amount);
    return {
      type: "settle",
      line: this._store.writeBalance(pair, balance),
      reference,
    };
  }
}
