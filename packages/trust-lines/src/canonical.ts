/**
 * @trustnet/trust-lines — Canonical pair addressing.
 *
 * Every component consults the canonicalizer before touching a trust
 * line, so a relationship is addressed by the same (lo, hi) record
 * whichever side a request comes from.
 *
 * Identifiers are restricted to ASCII, so comparing strings by UTF-16
 * code unit is the same as comparing their bytes.
 */

import { isParticipantId } from "@trustnet/types";
import type { CanonicalPair, Direction, ParticipantId } from "@trustnet/types";
import { TrustLineError } from "./types.js";

/**
 * Assert a participant identifier is well-formed.
 */
export function assertParticipantId(id: ParticipantId, label: string = "Participant"): void {
  if (!isParticipantId(id)) {
    throw new TrustLineError(
      "INVALID_PARTICIPANT",
      `${label} must be 1-64 characters of [A-Za-z0-9._:-], got: "${String(id)}"`,
    );
  }
}

/**
 * Map an unordered pair of identities to fixed (lo, hi) roles.
 * Throws SELF_PAIR if both sides are the same participant.
 */
export function canonicalize(p: ParticipantId, q: ParticipantId): CanonicalPair {
  assertParticipantId(p);
  assertParticipantId(q);
  if (p === q) {
    throw new TrustLineError("SELF_PAIR", `A trust line needs two distinct participants, got "${p}" twice`);
  }
  return p < q ? { lo: p, hi: q } : { lo: q, hi: p };
}

/**
 * +1 when `sender` is the low side of the pair, -1 when it is the high side.
 */
export function directionOf(pair: CanonicalPair, sender: ParticipantId): Direction {
  if (sender === pair.lo) return 1;
  if (sender === pair.hi) return -1;
  throw new TrustLineError(
    "INVALID_PARTICIPANT",
    `"${sender}" is not a party to the trust line ${pair.lo}/${pair.hi}`,
  );
}

/**
 * Order pairs by `lo`, then `hi`. Returns -1, 0, or 1.
 */
export function comparePairs(a: CanonicalPair, b: CanonicalPair): -1 | 0 | 1 {
  if (a.lo !== b.lo) return a.lo < b.lo ? -1 : 1;
  if (a.hi !== b.hi) return a.hi < b.hi ? -1 : 1;
  return 0;
}

/**
 * The other side of a pair, seen from `participant`.
 */
export function counterpartyOf(pair: CanonicalPair, participant: ParticipantId): ParticipantId {
  return directionOf(pair, participant) === 1 ? pair.hi : pair.lo;
}
