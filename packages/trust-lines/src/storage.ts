/**
 * @trustnet/trust-lines — Host key-value storage.
 *
 * The host ledger addresses durable state by structured keys:
 * `(canonical pair, line field)` for per-line values and
 * `(global field)` for network-wide counters. Field names are a typed
 * union, and each field carries its own value type.
 *
 * Two implementations:
 * - InMemoryLedgerStorage: committed state
 * - StagedStorage: a write buffer over another storage, committed at once
 */

import type { CanonicalPair } from "@trustnet/types";
import { comparePairs } from "./canonical.js";
import { PairMap } from "./pair-map.js";

// ─── Keys ────────────────────────────────────────────────────────────────

/** Per-line stored fields and their value types. */
export interface LineFields {
  readonly assetId: number;
  readonly limitLo: bigint;
  readonly limitHi: bigint;
  readonly balance: bigint;
  readonly qualityIn: number;
  readonly qualityOut: number;
  readonly allowRippling: boolean;
  readonly sequence: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export type LineField = keyof LineFields;

export const LINE_FIELDS: readonly LineField[] = [
  "assetId",
  "limitLo",
  "limitHi",
  "balance",
  "qualityIn",
  "qualityOut",
  "allowRippling",
  "sequence",
  "createdAt",
  "updatedAt",
];

/** Network-wide stored fields. */
export interface GlobalFields {
  /** Number of trust lines ever created */
  readonly lineCount: number;
}

export type GlobalField = keyof GlobalFields;

type LineRecord = { -readonly [F in LineField]?: LineFields[F] };
type GlobalRecord = { -readonly [F in GlobalField]?: GlobalFields[F] };

// ─── Interface ───────────────────────────────────────────────────────────

/**
 * Synchronous key-value storage supplied by the host.
 * A line exists once any of its fields has been written.
 */
export interface LedgerStorage {
  readLine<F extends LineField>(pair: CanonicalPair, field: F): LineFields[F] | undefined;
  writeLine<F extends LineField>(pair: CanonicalPair, field: F, value: LineFields[F]): void;
  hasLine(pair: CanonicalPair): boolean;
  /** Every stored pair, in canonical order */
  linePairs(): readonly CanonicalPair[];
  readGlobal<F extends GlobalField>(field: F): GlobalFields[F] | undefined;
  writeGlobal<F extends GlobalField>(field: F, value: GlobalFields[F]): void;
}

// ─── In-Memory Implementation ────────────────────────────────────────────

export class InMemoryLedgerStorage implements LedgerStorage {
  private readonly _lines = new PairMap<LineRecord>();
  private readonly _globals: GlobalRecord = {};

  readLine<F extends LineField>(pair: CanonicalPair, field: F): LineFields[F] | undefined {
    return this._lines.get(pair)?.[field];
  }

  writeLine<F extends LineField>(pair: CanonicalPair, field: F, value: LineFields[F]): void {
    let record = this._lines.get(pair);
    if (record === undefined) {
      record = {};
      this._lines.set(pair, record);
    }
    record[field] = value;
  }

  hasLine(pair: CanonicalPair): boolean {
    return this._lines.has(pair);
  }

  linePairs(): readonly CanonicalPair[] {
    return this._lines.entries().map(([pair]) => pair);
  }

  readGlobal<F extends GlobalField>(field: F): GlobalFields[F] | undefined {
    return this._globals[field];
  }

  writeGlobal<F extends GlobalField>(field: F, value: GlobalFields[F]): void {
    this._globals[field] = value;
  }
}

// ─── Staged Writes ───────────────────────────────────────────────────────

/**
 * Buffers every write until commit(). Reads see staged values first,
 * then the base storage. Dropping an uncommitted StagedStorage leaves
 * the base exactly as it was.
 */
export class StagedStorage implements LedgerStorage {
  private readonly _base: LedgerStorage;
  private readonly _lines = new PairMap<LineRecord>();
  private readonly _globals: GlobalRecord = {};
  private _committed = false;

  constructor(base: LedgerStorage) {
    this._base = base;
  }

  readLine<F extends LineField>(pair: CanonicalPair, field: F): LineFields[F] | undefined {
    const staged: LineFields[F] | undefined = this._lines.get(pair)?.[field];
    return staged !== undefined ? staged : this._base.readLine(pair, field);
  }

  writeLine<F extends LineField>(pair: CanonicalPair, field: F, value: LineFields[F]): void {
    let record = this._lines.get(pair);
    if (record === undefined) {
      record = {};
      this._lines.set(pair, record);
    }
    record[field] = value;
  }

  hasLine(pair: CanonicalPair): boolean {
    return this._lines.has(pair) || this._base.hasLine(pair);
  }

  linePairs(): readonly CanonicalPair[] {
    const pairs = [...this._base.linePairs()];
    for (const [pair] of this._lines.entries()) {
      if (!this._base.hasLine(pair)) {
        pairs.push(pair);
      }
    }
    return pairs.sort(comparePairs);
  }

  readGlobal<F extends GlobalField>(field: F): GlobalFields[F] | undefined {
    const staged: GlobalFields[F] | undefined = this._globals[field];
    return staged !== undefined ? staged : this._base.readGlobal(field);
  }

  writeGlobal<F extends GlobalField>(field: F, value: GlobalFields[F]): void {
    this._globals[field] = value;
  }

  /** Number of lines with staged writes. */
  get pendingLines(): number {
    return this._lines.size;
  }

  /**
   * Apply every staged write to the base storage. May be called once.
   */
  commit(): void {
    if (this._committed) {
      throw new Error("StagedStorage has already been committed");
    }
    this._committed = true;

    for (const [pair, record] of this._lines.entries()) {
      for (const field of LINE_FIELDS) {
        copyLineField(record, pair, field, this._base);
      }
    }
    if (this._globals.lineCount !== undefined) {
      this._base.writeGlobal("lineCount", this._globals.lineCount);
    }
  }
}

function copyLineField<F extends LineField>(
  record: LineRecord,
  pair: CanonicalPair,
  field: F,
  target: LedgerStorage,
): void {
  const value: LineFields[F] | undefined = record[field];
  if (value !== undefined) {
    target.writeLine(pair, field, value);
  }
}
