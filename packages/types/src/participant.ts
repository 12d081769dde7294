/**
 * Participant Types
 *
 * Identities of the parties that hold trust lines.
 *
 * Rules:
 * - An identifier is opaque to every consumer except the canonicalizer
 * - Pairs are always stored in canonical (lo, hi) order
 */

/**
 * Identity of a participant in the credit network.
 * 1–64 ASCII characters from `[A-Za-z0-9._:-]`.
 */
export type ParticipantId = string;

/**
 * An unordered pair of participants, fixed to low/high roles.
 *
 * `lo < hi` under byte-wise lexicographic order. One record addresses
 * the relationship regardless of which side a request comes from.
 */
export interface CanonicalPair {
  readonly lo: ParticipantId;
  readonly hi: ParticipantId;
}

/** +1 when value flows from `lo` to `hi`, -1 when it flows from `hi` to `lo`. */
export type Direction = 1 | -1;
