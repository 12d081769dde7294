/**
 * @trustnet/trust-lines — Administrative operations.
 *
 * The administrator identity is fixed when the network is initialized.
 * Freezing is the only restricted operation, and it cannot be undone.
 */

import type { ParticipantId, TrustLine } from "@trustnet/types";
import type { TrustLineStore } from "./store.js";
import { TrustLineError } from "./types.js";

export class AdminGovernor {
  private readonly _store: TrustLineStore;
  private readonly _admin: ParticipantId;

  constructor(store: TrustLineStore, admin: ParticipantId) {
    this._store = store;
    this._admin = admin;
  }

  isAdmin(caller: ParticipantId): boolean {
    return caller === this._admin;
  }

  /**
   * Throws NOT_ADMIN unless `caller` is the administrator.
   */
  assertAdmin(caller: ParticipantId): void {
    if (!this.isAdmin(caller)) {
      throw new TrustLineError("NOT_ADMIN", `"${String(caller)}" is not the network administrator`);
    }
  }

  /**
   * Freeze the line between `p` and `q`: limits to zero, rippling off.
   */
  freeze(caller: ParticipantId, p: ParticipantId, q: ParticipantId): TrustLine {
    this.assertAdmin(caller);
    return this._store.freeze(p, q);
  }
}
