/**
 * Runtime Type Guards
 *
 * Narrowing functions for trustnet domain types, used at system
 * boundaries (request bodies, restored snapshots, host integrations).
 */

import type { CanonicalPair, ParticipantId } from "./participant.js";
import type { CommandType } from "./command.js";

const PARTICIPANT_PATTERN = /^[A-Za-z0-9._:-]{1,64}$/;

const COMMAND_TYPES = new Set<string>([
  "create",
  "send",
  "ripple",
  "quality",
  "ripple_set",
  "limits",
  "freeze",
  "settle",
  "balance",
  "credit",
]);

export function isParticipantId(value: unknown): value is ParticipantId {
  return typeof value === "string" && PARTICIPANT_PATTERN.test(value);
}

/**
 * A pair is canonical when both sides are valid identifiers and `lo < hi`.
 */
export function isCanonicalPair(value: unknown): value is CanonicalPair {
  if (value === null || typeof value !== "object") return false;
  const { lo, hi } = value as Record<string, unknown>;
  return isParticipantId(lo) && isParticipantId(hi) && lo < hi;
}

export function isCommandType(value: unknown): value is CommandType {
  return typeof value === "string" && COMMAND_TYPES.has(value);
}
