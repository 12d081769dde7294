/**
 * @trustnet/trust-lines — Single-hop payments.
 *
 * A payment from `sender` to `recipient` moves the line balance by
 * `amount` in the sender's direction: up when the sender is `lo`,
 * down when the sender is `hi`. It is admissible only if the new
 * balance stays within [-limitHi, limitLo]. A frozen line accepts no
 * payments at all; its balance can only be settled.
 */

import type { ParticipantId, TrustLine } from "@trustnet/types";
import { assertAmount, checkedAdd } from "./amount-math.js";
import { canonicalize, directionOf } from "./canonical.js";
import { isFrozen } from "./store.js";
import type { TrustLineStore } from "./store.js";
import { TrustLineError } from "./types.js";

/**
 * Compute the balance a payment would leave on `line`, without mutating anything.
 * Throws INSUFFICIENT_CREDIT if the result would leave the line's bounds.
 */
export function checkPayment(line: TrustLine, sender: ParticipantId, amount: bigint): bigint {
  const direction = directionOf(line.pair, sender);
  if (isFrozen(line)) {
    throw new TrustLineError(
      "TRUST_LINE_FROZEN",
      `Trust line ${line.pair.lo}/${line.pair.hi} is frozen`,
    );
  }
  const next = checkedAdd(line.balance, direction === 1 ? amount : -amount);

  if (next > line.limitLo || next < -line.limitHi) {
    throw new TrustLineError(
      "INSUFFICIENT_CREDIT",
      `Payment of ${amount.toString()} from "${sender}" would move ${line.pair.lo}/${line.pair.hi} ` +
        `to ${next.toString()}, outside [-${line.limitHi.toString()}, ${line.limitLo.toString()}]`,
    );
  }
  return next;
}

export class PaymentEngine {
  private readonly _store: TrustLineStore;

  constructor(store: TrustLineStore) {
    this._store = store;
  }

  /**
   * Pay `amount` from `sender` to `recipient` over their direct line.
   * Either the balance moves by exactly `amount`, or nothing changes.
   */
  pay(sender: ParticipantId, recipient: ParticipantId, amount: bigint): TrustLine {
    assertAmount(amount);
    const pair = canonicalize(sender, recipient);
    const line = this._store.require(pair);
    const balance = checkPayment(line, sender, amount);
    return this._store.writeBalance(pair, balance);
  }
}
