/**
 * @trustnet/trust-lines — Map keyed by canonical pair.
 *
 * Two-level map (lo → hi → value). Keys stay structured; nothing is
 * ever addressed through a concatenated string.
 */

import type { CanonicalPair } from "@trustnet/types";
import { comparePairs } from "./canonical.js";

export class PairMap<V> {
  private readonly _byLo = new Map<string, Map<string, V>>();
  private _size = 0;

  get(pair: CanonicalPair): V | undefined {
    return this._byLo.get(pair.lo)?.get(pair.hi);
  }

  has(pair: CanonicalPair): boolean {
    return this._byLo.get(pair.lo)?.has(pair.hi) ?? false;
  }

  set(pair: CanonicalPair, value: V): void {
    let inner = this._byLo.get(pair.lo);
    if (inner === undefined) {
      inner = new Map();
      this._byLo.set(pair.lo, inner);
    }
    if (!inner.has(pair.hi)) {
      this._size++;
    }
    inner.set(pair.hi, value);
  }

  /**
   * All entries, ordered by canonical pair.
   */
  entries(): readonly (readonly [CanonicalPair, V])[] {
    const out: (readonly [CanonicalPair, V])[] = [];
    for (const [lo, inner] of this._byLo) {
      for (const [hi, value] of inner) {
        out.push([{ lo, hi }, value]);
      }
    }
    return out.sort(([a], [b]) => comparePairs(a, b));
  }

  get size(): number {
    return this._size;
  }
}
