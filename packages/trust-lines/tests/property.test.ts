/**
 * Property-Based Tests for @trustnet/trust-lines
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. canonicalize(p, q) equals canonicalize(q, p)
 * 2. After any sequence of operations, -limitHi <= balance <= limitLo
 * 3. Reads never change state
 * 4. A failed ripple leaves every line unchanged
 * 5. Decay never increases an amount and loses at most 0.1% + 1 per hop
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { canonicalize } from "../src/canonical.js";
import { decaySchedule } from "../src/amount-math.js";
import { TrustLineNetwork } from "../src/network.js";
import { assertLineInvariants } from "../src/snapshot.js";
import { TrustLineError } from "../src/types.js";
import { ADMIN, fixedClock } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const PARTICIPANTS = ["alice", "bob", "carol", "dave"] as const;

const arbParticipantId = fc.stringMatching(/^[A-Za-z0-9._:-]{1,64}$/);

const arbParticipant = fc.constantFrom(...PARTICIPANTS);

const arbAmount = fc.bigInt({ min: 1n, max: 2_000n });

type Op =
  | { readonly kind: "send"; readonly from: string; readonly to: string; readonly amount: bigint }
  | {
      readonly kind: "ripple";
      readonly from: string;
      readonly hops: readonly string[];
      readonly to: string;
      readonly amount: bigint;
    }
  | { readonly kind: "settle"; readonly from: string; readonly to: string; readonly amount: bigint }
  | { readonly kind: "freeze"; readonly from: string; readonly to: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("send" as const), from: arbParticipant, to: arbParticipant, amount: arbAmount }),
  fc.record({
    kind: fc.constant("ripple" as const),
    from: arbParticipant,
    hops: fc.array(arbParticipant, { minLength: 1, maxLength: 3 }),
    to: arbParticipant,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("settle" as const), from: arbParticipant, to: arbParticipant, amount: arbAmount }),
  fc.record({ kind: fc.constant("freeze" as const), from: arbParticipant, to: arbParticipant }),
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * A fully connected four-party network with varied limits.
 */
function buildNetwork(): TrustLineNetwork {
  const network = new TrustLineNetwork({ admin: ADMIN, clock: fixedClock });
  let limit = 500n;
  for (const [i, p] of PARTICIPANTS.entries()) {
    for (const q of PARTICIPANTS.slice(i + 1)) {
      network.create(p, q, 1, limit, 1500n - limit, true);
      limit += 150n;
    }
  }
  return network;
}

/**
 * Apply an operation. Engine rejections are expected; anything else is a bug.
 */
function apply(network: TrustLineNetwork, op: Op): boolean {
  try {
    switch (op.kind) {
      case "send":
        network.send(op.from, op.to, op.amount);
        break;
      case "ripple":
        network.ripple(op.from, op.to, op.hops, op.amount);
        break;
      case "settle":
        network.settle(op.from, op.to, op.amount);
        break;
      case "freeze":
        network.freeze(ADMIN, op.from, op.to);
        break;
    }
    return true;
  } catch (error) {
    if (error instanceof TrustLineError) return false;
    throw error;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("canonicalization", () => {
  it("is symmetric for every pair of distinct identities", () => {
    fc.assert(
      fc.property(arbParticipantId, arbParticipantId, (p, q) => {
        fc.pre(p !== q);
        const pair = canonicalize(p, q);
        expect(canonicalize(q, p)).toEqual(pair);
        expect(pair.lo < pair.hi).toBe(true);
      }),
    );
  });
});

describe("balance invariant", () => {
  it("holds after any sequence of operations", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const network = buildNetwork();
        for (const op of ops) {
          apply(network, op);
          for (const line of network.allLines()) {
            assertLineInvariants(line);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("reads", () => {
  it("never change state", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 20 }), arbParticipant, arbParticipant, (ops, p, q) => {
        fc.pre(p !== q);
        const network = buildNetwork();
        ops.forEach((op) => apply(network, op));
        const before = network.snapshot();
        network.balance(p, q);
        network.credit(q, p);
        expect(network.snapshot()).toEqual(before);
      }),
      { numRuns: 100 },
    );
  });
});

describe("ripple atomicity", () => {
  it("leaves every line unchanged when a ripple fails", () => {
    fc.assert(
      fc.property(
        fc.array(arbOp, { maxLength: 20 }),
        arbParticipant,
        fc.array(arbParticipant, { minLength: 1, maxLength: 4 }),
        arbParticipant,
        arbAmount,
        (ops, from, hops, to, amount) => {
          const network = buildNetwork();
          ops.forEach((op) => apply(network, op));
          const before = network.snapshot();
          if (!apply(network, { kind: "ripple", from, hops, to, amount })) {
            expect(network.snapshot()).toEqual(before);
          }
        },
      ),
      { numRuns: 200 },
    );
  });
});

describe("decay", () => {
  it("is monotone and loses at most 0.1% + 1 per hop", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: 10n ** 12n }), fc.integer({ min: 1, max: 6 }), (amount, hops) => {
        const schedule = decaySchedule(amount, hops);
        expect(schedule).toHaveLength(hops + 1);
        for (let k = 1; k < schedule.length; k++) {
          const prev = schedule[k - 1] ?? 0n;
          const next = schedule[k] ?? 0n;
          expect(next <= prev).toBe(true);
          expect(prev - next <= prev / 1000n + 1n).toBe(true);
        }
      }),
    );
  });
});
