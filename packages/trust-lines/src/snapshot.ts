/**
 * @trustnet/trust-lines — Snapshot serialization.
 *
 * Snapshots are plain JSON: bigints travel as decimal strings. Anything
 * read back is treated as untrusted and checked field by field before a
 * single line is restored.
 */

import { isParticipantId } from "@trustnet/types";
import type { TrustLine } from "@trustnet/types";
import { parseInteger } from "./amount-math.js";
import { isFrozen } from "./store.js";
import {
  MAX_AMOUNT,
  MAX_BALANCE,
  MIN_BALANCE,
  QUALITY_PARITY,
  TrustLineError,
} from "./types.js";
import type { NetworkSnapshot, SerializedTrustLine } from "./types.js";

function invalid(message: string): TrustLineError {
  return new TrustLineError("INVALID_SNAPSHOT", message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Serialization ───────────────────────────────────────────────────────

export function serializeTrustLine(line: TrustLine): SerializedTrustLine {
  return {
    lo: line.pair.lo,
    hi: line.pair.hi,
    assetId: line.assetId,
    limitLo: line.limitLo.toString(),
    limitHi: line.limitHi.toString(),
    balance: line.balance.toString(),
    qualityIn: line.qualityIn,
    qualityOut: line.qualityOut,
    allowRippling: line.allowRippling,
    sequence: line.sequence,
    createdAt: line.createdAt,
    updatedAt: line.updatedAt,
  };
}

export function deserializeTrustLine(serialized: SerializedTrustLine): TrustLine {
  const line: TrustLine = {
    pair: { lo: serialized.lo, hi: serialized.hi },
    assetId: serialized.assetId,
    limitLo: parseInteger(serialized.limitLo, "INVALID_SNAPSHOT"),
    limitHi: parseInteger(serialized.limitHi, "INVALID_SNAPSHOT"),
    balance: parseInteger(serialized.balance, "INVALID_SNAPSHOT"),
    qualityIn: serialized.qualityIn,
    qualityOut: serialized.qualityOut,
    allowRippling: serialized.allowRippling,
    sequence: serialized.sequence,
    createdAt: serialized.createdAt,
    updatedAt: serialized.updatedAt,
  };
  assertLineInvariants(line);
  return line;
}

// ─── Invariants ──────────────────────────────────────────────────────────

/**
 * Check everything that must hold for a stored trust line.
 *
 * Limits are either both zero (frozen) or both in [1, 2^63 - 1]. An
 * open line keeps its balance within [-limitHi, limitLo]; a frozen line
 * may still carry the balance it had when frozen.
 */
export function assertLineInvariants(line: TrustLine): void {
  const { lo, hi } = line.pair;
  const name = `${String(lo)}/${String(hi)}`;

  if (!isParticipantId(lo) || !isParticipantId(hi) || !(lo < hi)) {
    throw invalid(`Trust line ${name} is not a canonical pair`);
  }
  if (!Number.isSafeInteger(line.assetId) || line.assetId < 0) {
    throw invalid(`Trust line ${name} has an invalid asset id`);
  }

  const frozen = isFrozen(line);
  for (const [label, limit] of [["limitLo", line.limitLo], ["limitHi", line.limitHi]] as const) {
    if (!frozen && (limit <= 0n || limit > MAX_AMOUNT)) {
      throw invalid(`Trust line ${name} has ${label} out of range: ${limit.toString()}`);
    }
  }
  if (frozen && line.allowRippling) {
    throw invalid(`Frozen trust line ${name} allows rippling`);
  }

  if (line.balance < MIN_BALANCE || line.balance > MAX_BALANCE) {
    throw invalid(`Trust line ${name} balance is outside the 64-bit range`);
  }
  if (!frozen && (line.balance > line.limitLo || line.balance < -line.limitHi)) {
    throw invalid(
      `Trust line ${name} balance ${line.balance.toString()} exceeds its limits`,
    );
  }

  for (const [label, quality] of [["qualityIn", line.qualityIn], ["qualityOut", line.qualityOut]] as const) {
    if (!Number.isInteger(quality) || quality <= 0 || quality > QUALITY_PARITY) {
      throw invalid(`Trust line ${name} has ${label} out of range: ${String(quality)}`);
    }
  }

  if (typeof line.allowRippling !== "boolean") {
    throw invalid(`Trust line ${name} has a non-boolean rippling flag`);
  }
  if (!Number.isSafeInteger(line.sequence) || line.sequence < 1) {
    throw invalid(`Trust line ${name} has an invalid sequence`);
  }
  if (typeof line.createdAt !== "string" || typeof line.updatedAt !== "string") {
    throw invalid(`Trust line ${name} has invalid timestamps`);
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────

function parseSerializedLine(value: unknown, index: number): SerializedTrustLine {
  if (!isRecord(value)) {
    throw invalid(`Line ${String(index)} is not an object`);
  }
  const {
    lo, hi, assetId, limitLo, limitHi, balance,
    qualityIn, qualityOut, allowRippling, sequence, createdAt, updatedAt,
  } = value;

  if (
    typeof lo !== "string" || typeof hi !== "string" ||
    typeof limitLo !== "string" || typeof limitHi !== "string" || typeof balance !== "string" ||
    typeof createdAt !== "string" || typeof updatedAt !== "string"
  ) {
    throw invalid(`Line ${String(index)} is missing a string field`);
  }
  if (
    typeof assetId !== "number" || typeof qualityIn !== "number" ||
    typeof qualityOut !== "number" || typeof sequence !== "number"
  ) {
    throw invalid(`Line ${String(index)} is missing a numeric field`);
  }
  if (typeof allowRippling !== "boolean") {
    throw invalid(`Line ${String(index)} is missing allowRippling`);
  }

  return {
    lo, hi, assetId, limitLo, limitHi, balance,
    qualityIn, qualityOut, allowRippling, sequence, createdAt, updatedAt,
  };
}

/**
 * Validate the shape of a snapshot read from an untrusted source.
 * Line invariants are checked again when the lines are restored.
 */
export function parseSnapshot(value: unknown): NetworkSnapshot {
  if (!isRecord(value)) {
    throw invalid("Snapshot must be an object");
  }
  const { version, lineCount, lines, createdAt } = value;

  if (version !== 1) {
    throw invalid(`Unsupported snapshot version: ${String(version)}`);
  }
  if (typeof lineCount !== "number" || !Number.isSafeInteger(lineCount) || lineCount < 0) {
    throw invalid("Snapshot lineCount must be a non-negative integer");
  }
  if (!Array.isArray(lines)) {
    throw invalid("Snapshot lines must be an array");
  }
  if (typeof createdAt !== "string") {
    throw invalid("Snapshot createdAt must be a string");
  }

  const parsed = lines.map((line: unknown, i) => parseSerializedLine(line, i));
  if (parsed.length > lineCount) {
    throw invalid(
      `Snapshot holds ${String(parsed.length)} lines but lineCount is ${String(lineCount)}`,
    );
  }
  for (const line of parsed) {
    if (line.sequence > lineCount) {
      throw invalid(`Line ${line.lo}/${line.hi} has a sequence above lineCount`);
    }
  }

  return { version: 1, lineCount, lines: parsed, createdAt };
}
