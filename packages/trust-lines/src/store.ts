/**
 * @trustnet/trust-lines — Trust line store.
 *
 * Durable per-pair records on top of the host storage. Every method
 * canonicalizes its participants first, so callers may name the two
 * sides in either order.
 *
 * Rules:
 * - One record per canonical pair; creating it twice is rejected
 * - Records are never deleted, only frozen
 * - A frozen line has both limits at zero and rippling disabled
 * - Limits never shrink below the current exposure
 */

import type { CanonicalPair, ParticipantId, TrustLine } from "@trustnet/types";
import { assertLimit, assertQuality } from "./amount-math.js";
import { assertParticipantId, canonicalize } from "./canonical.js";
import type { LedgerStorage, LineField, LineFields } from "./storage.js";
import { QUALITY_PARITY, TrustLineError } from "./types.js";

/**
 * Whether a line has been frozen. Only freeze() sets both limits to zero.
 */
export function isFrozen(line: TrustLine): boolean {
  return line.limitLo === 0n && line.limitHi === 0n;
}

export class TrustLineStore {
  private readonly _storage: LedgerStorage;
  private readonly _clock: () => string;

  constructor(storage: LedgerStorage, clock: () => string) {
    this._storage = storage;
    this._clock = clock;
  }

  // ─── Creation ────────────────────────────────────────────────────────

  /**
   * Open a trust line between `p` and `q`.
   *
   * `limitLo` and `limitHi` refer to canonical roles, not to argument
   * order. Starts at zero balance and parity quality.
   */
  create(
    p: ParticipantId,
    q: ParticipantId,
    assetId: number,
    limitLo: bigint,
    limitHi: bigint,
    allowRippling: boolean,
  ): TrustLine {
    const pair = canonicalize(p, q);
    if (!Number.isSafeInteger(assetId) || assetId < 0) {
      throw new TrustLineError("INVALID_ASSET", `Asset id must be a non-negative integer, got: ${String(assetId)}`);
    }
    assertLimit(limitLo, "limitLo");
    assertLimit(limitHi, "limitHi");
    if (typeof allowRippling !== "boolean") {
      throw new TrustLineError("INVALID_CONFIG", "allowRippling must be a boolean");
    }

    if (this._storage.hasLine(pair)) {
      throw new TrustLineError(
        "TRUST_LINE_EXISTS",
        `Trust line already exists: ${pair.lo}/${pair.hi}`,
      );
    }

    const sequence = this.count + 1;
    const now = this._clock();

    this._write(pair, {
      assetId,
      limitLo,
      limitHi,
      balance: 0n,
      qualityIn: QUALITY_PARITY,
      qualityOut: QUALITY_PARITY,
      allowRippling,
      sequence,
      createdAt: now,
      updatedAt: now,
    });
    this._storage.writeGlobal("lineCount", sequence);

    return this.require(pair);
  }

  /**
   * Write a line exactly as given, without touching the creation counter.
   * Used when rehydrating from a snapshot.
   */
  restore(line: TrustLine): void {
    if (this._storage.hasLine(line.pair)) {
      throw new TrustLineError(
        "TRUST_LINE_EXISTS",
        `Trust line already exists: ${line.pair.lo}/${line.pair.hi}`,
      );
    }
    const { pair, ...fields } = line;
    this._write(pair, fields);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Get the line between `p` and `q`. Throws if there is none.
   */
  get(p: ParticipantId, q: ParticipantId): TrustLine {
    return this.require(canonicalize(p, q));
  }

  /**
   * Get the line between `p` and `q`, or undefined.
   */
  find(p: ParticipantId, q: ParticipantId): TrustLine | undefined {
    return this._read(canonicalize(p, q));
  }

  /**
   * Get a line by canonical pair. Throws if there is none.
   */
  require(pair: CanonicalPair): TrustLine {
    const line = this._read(pair);
    if (line === undefined) {
      throw new TrustLineError(
        "TRUST_LINE_NOT_FOUND",
        `No trust line between "${pair.lo}" and "${pair.hi}"`,
      );
    }
    return line;
  }

  /**
   * Every line the participant is a party to, in canonical order.
   */
  listFor(participant: ParticipantId): readonly TrustLine[] {
    assertParticipantId(participant);
    return this._storage
      .linePairs()
      .filter((pair) => pair.lo === participant || pair.hi === participant)
      .map((pair) => this.require(pair));
  }

  /**
   * Every line, in canonical order.
   */
  all(): readonly TrustLine[] {
    return this._storage.linePairs().map((pair) => this.require(pair));
  }

  /**
   * Number of lines ever created (the global creation counter).
   */
  get count(): number {
    return this._storage.readGlobal("lineCount") ?? 0;
  }

  set count(value: number) {
    this._storage.writeGlobal("lineCount", value);
  }

  // ─── Updates ─────────────────────────────────────────────────────────

  /**
   * Overwrite the balance of an existing line.
   * Admissibility is the caller's responsibility (see checkPayment).
   */
  writeBalance(pair: CanonicalPair, balance: bigint): TrustLine {
    this.require(pair);
    this._write(pair, { balance, updatedAt: this._clock() });
    return this.require(pair);
  }

  /**
   * Replace both quality factors. Each must be in (0, 1_000_000].
   */
  updateQuality(
    p: ParticipantId,
    q: ParticipantId,
    qualityIn: number,
    qualityOut: number,
  ): TrustLine {
    const pair = canonicalize(p, q);
    assertQuality(qualityIn, "qualityIn");
    assertQuality(qualityOut, "qualityOut");
    this.require(pair);

    this._write(pair, { qualityIn, qualityOut, updatedAt: this._clock() });
    return this.require(pair);
  }

  /**
   * Toggle whether the line may carry rippled value.
   * A frozen line cannot be re-enabled.
   */
  setRippling(p: ParticipantId, q: ParticipantId, allowRippling: boolean): TrustLine {
    const pair = canonicalize(p, q);
    if (typeof allowRippling !== "boolean") {
      throw new TrustLineError("INVALID_CONFIG", "allowRippling must be a boolean");
    }
    const line = this.require(pair);
    if (allowRippling && isFrozen(line)) {
      throw new TrustLineError(
        "TRUST_LINE_FROZEN",
        `Trust line ${pair.lo}/${pair.hi} is frozen; rippling cannot be enabled`,
      );
    }

    this._write(pair, { allowRippling, updatedAt: this._clock() });
    return this.require(pair);
  }

  /**
   * Replace both limits. Requires approval from both parties.
   *
   * Validation order (fail-closed):
   * 1. Both new limits positive and in range
   * 2. The line exists
   * 3. Both `lo` and `hi` are among `approvals`
   * 4. The line is not frozen
   * 5. The new limit on the owing side covers the current exposure
   */
  updateLimits(
    p: ParticipantId,
    q: ParticipantId,
    limitLo: bigint,
    limitHi: bigint,
    approvals: ReadonlySet<ParticipantId>,
  ): TrustLine {
    const pair = canonicalize(p, q);
    assertLimit(limitLo, "limitLo");
    assertLimit(limitHi, "limitHi");
    const line = this.require(pair);

    const missing = [pair.lo, pair.hi].filter((party) => !approvals.has(party));
    if (missing.length > 0) {
      throw new TrustLineError(
        "MISSING_CO_SIGNATURE",
        `Limit changes need approval from both parties; missing: ${missing.join(", ")}`,
      );
    }

    if (isFrozen(line)) {
      throw new TrustLineError(
        "TRUST_LINE_FROZEN",
        `Trust line ${pair.lo}/${pair.hi} is frozen; limits cannot be raised`,
      );
    }

    if (line.balance >= 0n && limitLo < line.balance) {
      throw new TrustLineError(
        "LIMIT_BELOW_EXPOSURE",
        `limitLo ${limitLo.toString()} is below the current balance ${line.balance.toString()}`,
      );
    }
    if (line.balance < 0n && limitHi < -line.balance) {
      throw new TrustLineError(
        "LIMIT_BELOW_EXPOSURE",
        `limitHi ${limitHi.toString()} is below the current exposure ${(-line.balance).toString()}`,
      );
    }

    this._write(pair, { limitLo, limitHi, updatedAt: this._clock() });
    return this.require(pair);
  }

  /**
   * Pin both limits at zero and disable rippling. There is no way back.
   * Authorization is enforced by AdminGovernor.
   */
  freeze(p: ParticipantId, q: ParticipantId): TrustLine {
    const pair = canonicalize(p, q);
    this.require(pair);

    this._write(pair, {
      limitLo: 0n,
      limitHi: 0n,
      allowRippling: false,
      updatedAt: this._clock(),
    });
    return this.require(pair);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _read(pair: CanonicalPair): TrustLine | undefined {
    if (!this._storage.hasLine(pair)) {
      return undefined;
    }
    return {
      pair: { lo: pair.lo, hi: pair.hi },
      assetId: this._field(pair, "assetId"),
      limitLo: this._field(pair, "limitLo"),
      limitHi: this._field(pair, "limitHi"),
      balance: this._field(pair, "balance"),
      qualityIn: this._field(pair, "qualityIn"),
      qualityOut: this._field(pair, "qualityOut"),
      allowRippling: this._field(pair, "allowRippling"),
      sequence: this._field(pair, "sequence"),
      createdAt: this._field(pair, "createdAt"),
      updatedAt: this._field(pair, "updatedAt"),
    };
  }

  private _field<F extends LineField>(pair: CanonicalPair, field: F): LineFields[F] {
    const value = this._storage.readLine(pair, field);
    if (value === undefined) {
      throw new TrustLineError(
        "STORAGE_CORRUPTED",
        `Trust line ${pair.lo}/${pair.hi} has no stored "${field}"`,
      );
    }
    return value;
  }

  private _write(pair: CanonicalPair, fields: Partial<LineFields>): void {
    if (fields.assetId !== undefined) this._storage.writeLine(pair, "assetId", fields.assetId);
    if (fields.limitLo !== undefined) this._storage.writeLine(pair, "limitLo", fields.limitLo);
    if (fields.limitHi !== undefined) this._storage.writeLine(pair, "limitHi", fields.limitHi);
    if (fields.balance !== undefined) this._storage.writeLine(pair, "balance", fields.balance);
    if (fields.qualityIn !== undefined) this._storage.writeLine(pair, "qualityIn", fields.qualityIn);
    if (fields.qualityOut !== undefined) this._storage.writeLine(pair, "qualityOut", fields.qualityOut);
    if (fields.allowRippling !== undefined) {
      this._storage.writeLine(pair, "allowRippling", fields.allowRippling);
    }
    if (fields.sequence !== undefined) this._storage.writeLine(pair, "sequence", fields.sequence);
    if (fields.createdAt !== undefined) this._storage.writeLine(pair, "createdAt", fields.createdAt);
    if (fields.updatedAt !== undefined) this._storage.writeLine(pair, "updatedAt", fields.updatedAt);
  }
}
