/**
 * @trustnet/trust-lines — Multi-hop payment rippling.
 *
 * Forwards a payment along `sender → hop1 → … → hopN → recipient`
 * (1 ≤ N ≤ maxHops). Each leg carries the previous leg's amount less
 * 0.1%, rounded down.
 *
 * Two phases:
 * 1. plan() checks every leg against committed state and computes the
 *    resulting balances. Nothing is written.
 * 2. ripple() writes the planned balances, only once every leg passed.
 *
 * The sender's own first line is a direct payment. Every later leg
 * carries value through an intermediate participant and needs
 * `allowRippling` on its line. The flag guards the line an intermediate
 * pays out on, so the last line (last hop → recipient) is checked and
 * the first one (sender → first hop) is not: there the payer is the
 * sender, who asked for the payment.
 */

import type { ParticipantId, RippleHop, RippleResult } from "@trustnet/types";
import { assertAmount, decaySchedule } from "./amount-math.js";
import { assertParticipantId, canonicalize } from "./canonical.js";
import { PairMap } from "./pair-map.js";
import { checkPayment } from "./payment.js";
import type { TrustLineStore } from "./store.js";
import { MAX_HOPS, TrustLineError } from "./types.js";

export class RipplingEngine {
  private readonly _store: TrustLineStore;
  private readonly _maxHops: number;

  constructor(store: TrustLineStore, maxHops: number = MAX_HOPS) {
    this._store = store;
    this._maxHops = maxHops;
  }

  /**
   * Validate every leg and compute its resulting balance. Never mutates.
   *
   * A path that uses the same line more than once is checked against
   * the cumulative effect of its earlier legs.
   */
  plan(
    sender: ParticipantId,
    recipient: ParticipantId,
    hops: readonly ParticipantId[],
    amount: bigint,
  ): readonly RippleHop[] {
    assertAmount(amount);
    assertParticipantId(sender, "Sender");
    assertParticipantId(recipient, "Recipient");
    if (!Array.isArray(hops) || hops.length < 1 || hops.length > this._maxHops) {
      throw new TrustLineError(
        "INVALID_HOPS",
        `A rippled payment needs 1 to ${String(this._maxHops)} intermediate hops, got ${String(hops.length)}`,
      );
    }
    hops.forEach((hop, i) => assertParticipantId(hop, `Hop ${String(i + 1)}`));

    const schedule = decaySchedule(amount, hops.length);
    const pending = new PairMap<bigint>();
    const legs: RippleHop[] = [];

    let from = sender;
    for (const [k, to] of [...hops, recipient].entries()) {
      const legAmount = schedule[k] ?? 0n;
      if (legAmount <= 0n) {
        throw new TrustLineError(
          "INVALID_AMOUNT",
          `Amount ${amount.toString()} decays to zero before leg ${String(k + 1)}`,
        );
      }

      const pair = canonicalize(from, to);
      const line = this._store.require(pair);

      if (k > 0 && !line.allowRippling) {
        throw new TrustLineError(
          "RIPPLING_DISABLED",
          `Trust line ${pair.lo}/${pair.hi} does not allow rippling through "${from}"`,
        );
      }

      const current = pending.get(pair) ?? line.balance;
      const balance = checkPayment({ ...line, balance: current }, from, legAmount);
      pending.set(pair, balance);
      legs.push({ from, to, pair, amount: legAmount, balance });

      from = to;
    }

    return legs;
  }

  /**
   * Plan the payment, then commit every leg. If planning throws, no
   * line has been touched.
   */
  ripple(
    sender: ParticipantId,
    recipient: ParticipantId,
    hops: readonly ParticipantId[],
    amount: bigint,
  ): RippleResult {
    const legs = this.plan(sender, recipient, hops, amount);

    // Later legs on a repeated pair carry the cumulative balance, so
    // writing in order leaves each line at its final planned value.
    for (const leg of legs) {
      this._store.writeBalance(leg.pair, leg.balance);
    }

    const last = legs[legs.length - 1];
    return {
      type: "ripple",
      hops: legs,
      delivered: last !== undefined ? last.amount : 0n,
    };
  }
}
