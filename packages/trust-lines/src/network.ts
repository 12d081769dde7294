/**
 * @trustnet/trust-lines — Network command processor.
 *
 * The single entry point a host talks to. Every request names the
 * calling participant and runs as one transaction:
 *
 * 1. Writes go to a StagedStorage layered over committed state
 * 2. The operation validates everything before its first write
 * 3. On success the staged writes are committed together; on any
 *    throw they are dropped and committed state is untouched
 *
 * Operations are synchronous and the processor refuses to be entered
 * again while a request is running, so two requests never interleave.
 *
 * API surface:
 * - execute() — Dispatch a Command from the catalog
 * - create(), send(), ripple(), updateQuality(), setRippling(),
 *   updateLimits(), freeze(), settle() — Mutating operations
 * - balance(), credit(), getLine(), findLine(), listLines() — Reads
 * - snapshot() / fromSnapshot() — Persistence
 */

import type {
  BalanceResult,
  Command,
  CommandResult,
  CreditResult,
  ParticipantId,
  RippleResult,
  SettleResult,
  TrustLine,
} from "@trustnet/types";
import { isParticipantId } from "@trustnet/types";
import { comparePairs } from "./canonical.js";
import { AdminGovernor } from "./governor.js";
import { PairMap } from "./pair-map.js";
import { PaymentEngine } from "./payment.js";
import { readBalance, readCredit } from "./queries.js";
import { RipplingEngine } from "./rippling.js";
import { SettlementEngine } from "./settlement.js";
import { deserializeTrustLine, parseSnapshot, serializeTrustLine } from "./snapshot.js";
import { InMemoryLedgerStorage, StagedStorage } from "./storage.js";
import type { LedgerStorage } from "./storage.js";
import { TrustLineStore } from "./store.js";
import { MAX_HOPS, TrustLineError } from "./types.js";
import type { NetworkConfig, NetworkSnapshot, ResolvedNetworkConfig } from "./types.js";

/**
 * Components bound to one transaction's storage view.
 */
interface Handlers {
  readonly store: TrustLineStore;
  readonly payments: PaymentEngine;
  readonly rippling: RipplingEngine;
  readonly governor: AdminGovernor;
  readonly settlement: SettlementEngine;
}

function resolveConfig(config: NetworkConfig): ResolvedNetworkConfig {
  if (!isParticipantId(config.admin)) {
    throw new TrustLineError("INVALID_CONFIG", `Invalid admin identity: "${String(config.admin)}"`);
  }
  const maxHops = config.maxHops ?? MAX_HOPS;
  if (!Number.isInteger(maxHops) || maxHops < 1 || maxHops > MAX_HOPS) {
    throw new TrustLineError(
      "INVALID_CONFIG",
      `maxHops must be an integer from 1 to ${String(MAX_HOPS)}, got: ${String(maxHops)}`,
    );
  }
  return Object.freeze({
    admin: config.admin,
    maxHops,
    clock: config.clock ?? (() => new Date().toISOString()),
  });
}

export class TrustLineNetwork {
  private readonly _config: ResolvedNetworkConfig;
  private readonly _storage: LedgerStorage;
  private _busy = false;

  constructor(config: NetworkConfig, storage: LedgerStorage = new InMemoryLedgerStorage()) {
    this._config = resolveConfig(config);
    this._storage = storage;
  }

  get config(): ResolvedNetworkConfig {
    return this._config;
  }

  // ─── Command Dispatch ────────────────────────────────────────────────

  /**
   * Run one command from the catalog on behalf of `caller`.
   */
  execute(caller: ParticipantId, command: Command): CommandResult {
    switch (command.type) {
      case "create":
        return {
          type: "create",
          line: this.create(
            caller,
            command.counterparty,
            command.assetId,
            command.limitLo,
            command.limitHi,
            command.allowRippling,
          ),
        };
      case "send":
        return { type: "send", line: this.send(caller, command.recipient, command.amount) };
      case "ripple":
        return this.ripple(caller, command.recipient, command.hops, command.amount);
      case "quality":
        return {
          type: "quality",
          line: this.updateQuality(caller, command.counterparty, command.qualityIn, command.qualityOut),
        };
      case "ripple_set":
        return {
          type: "ripple_set",
          line: this.setRippling(caller, command.counterparty, command.allowRippling),
        };
      case "limits":
        return {
          type: "limits",
          line: this.updateLimits(
            caller,
            command.counterparty,
            command.limitLo,
            command.limitHi,
            command.coSigners,
          ),
        };
      case "freeze":
        return { type: "freeze", line: this.freeze(caller, command.account, command.counterparty) };
      case "settle":
        return this.settle(caller, command.counterparty, command.amount, command.reference);
      case "balance":
        return this.balance(caller, command.counterparty);
      case "credit":
        return this.credit(caller, command.counterparty);
    }
  }

  // ─── Mutating Operations ─────────────────────────────────────────────

  /**
   * Open a line between `caller` and `counterparty`.
   * `limitLo` / `limitHi` are given in canonical roles.
   */
  create(
    caller: ParticipantId,
    counterparty: ParticipantId,
    assetId: number,
    limitLo: bigint,
    limitHi: bigint,
    allowRippling: boolean,
  ): TrustLine {
    return this._transact((h) =>
      h.store.create(caller, counterparty, assetId, limitLo, limitHi, allowRippling),
    );
  }

  send(caller: ParticipantId, recipient: ParticipantId, amount: bigint): TrustLine {
    return this._transact((h) => h.payments.pay(caller, recipient, amount));
  }

  ripple(
    caller: ParticipantId,
    recipient: ParticipantId,
    hops: readonly ParticipantId[],
    amount: bigint,
  ): RippleResult {
    return this._transact((h) => h.rippling.ripple(caller, recipient, hops, amount));
  }

  updateQuality(
    caller: ParticipantId,
    counterparty: ParticipantId,
    qualityIn: number,
    qualityOut: number,
  ): TrustLine {
    return this._transact((h) => h.store.updateQuality(caller, counterparty, qualityIn, qualityOut));
  }

  setRippling(caller: ParticipantId, counterparty: ParticipantId, allowRippling: boolean): TrustLine {
    return this._transact((h) => h.store.setRippling(caller, counterparty, allowRippling));
  }

  /**
   * Replace both limits. The caller approves implicitly; the other
   * party must appear in `coSigners`.
   */
  updateLimits(
    caller: ParticipantId,
    counterparty: ParticipantId,
    limitLo: bigint,
    limitHi: bigint,
    coSigners: readonly ParticipantId[],
  ): TrustLine {
    const approvals = new Set<ParticipantId>([caller, ...coSigners]);
    return this._transact((h) =>
      h.store.updateLimits(caller, counterparty, limitLo, limitHi, approvals),
    );
  }

  freeze(caller: ParticipantId, account: ParticipantId, counterparty: ParticipantId): TrustLine {
    return this._transact((h) => h.governor.freeze(caller, account, counterparty));
  }

  settle(
    caller: ParticipantId,
    counterparty: ParticipantId,
    amount: bigint,
    reference?: string,
  ): SettleResult {
    return this._transact((h) => h.settlement.settle(caller, counterparty, amount, reference));
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balance(caller: ParticipantId, counterparty: ParticipantId): BalanceResult {
    return this._read((store) => readBalance(store.get(caller, counterparty), caller));
  }

  credit(caller: ParticipantId, counterparty: ParticipantId): CreditResult {
    return this._read((store) => readCredit(store.get(caller, counterparty), caller));
  }

  getLine(p: ParticipantId, q: ParticipantId): TrustLine {
    return this._read((store) => store.get(p, q));
  }

  findLine(p: ParticipantId, q: ParticipantId): TrustLine | undefined {
    return this._read((store) => store.find(p, q));
  }

  listLines(participant: ParticipantId): readonly TrustLine[] {
    return this._read((store) => store.listFor(participant));
  }

  allLines(): readonly TrustLine[] {
    return this._read((store) => store.all());
  }

  /**
   * Number of lines ever created.
   */
  get lineCount(): number {
    return this._read((store) => store.count);
  }

  isAdmin(caller: ParticipantId): boolean {
    return caller === this._config.admin;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Serializable snapshot of every line and the creation counter.
   * Can be restored with TrustLineNetwork.fromSnapshot().
   */
  snapshot(): NetworkSnapshot {
    return this._read((store) => ({
      version: 1,
      lineCount: store.count,
      lines: store.all().map(serializeTrustLine),
      createdAt: this._config.clock(),
    }));
  }

  /**
   * Restore a network from a snapshot. The snapshot is validated in full
   * before any line is written; a bad snapshot throws INVALID_SNAPSHOT.
   */
  static fromSnapshot(
    config: NetworkConfig,
    snapshot: unknown,
    storage: LedgerStorage = new InMemoryLedgerStorage(),
  ): TrustLineNetwork {
    const parsed = parseSnapshot(snapshot);
    const lines = parsed.lines.map(deserializeTrustLine);

    const seen = new PairMap<true>();
    const sequences = new Set<number>();
    for (const line of lines) {
      if (seen.has(line.pair)) {
        throw new TrustLineError(
          "INVALID_SNAPSHOT",
          `Duplicate trust line ${line.pair.lo}/${line.pair.hi} in snapshot`,
        );
      }
      if (sequences.has(line.sequence)) {
        throw new TrustLineError(
          "INVALID_SNAPSHOT",
          `Duplicate sequence ${String(line.sequence)} in snapshot`,
        );
      }
      seen.set(line.pair, true);
      sequences.add(line.sequence);
    }

    const network = new TrustLineNetwork(config, storage);
    network._transact((h) => {
      if (h.store.all().length > 0) {
        throw new TrustLineError("INVALID_SNAPSHOT", "Snapshots can only be restored into empty storage");
      }
      for (const line of [...lines].sort((a, b) => comparePairs(a.pair, b.pair))) {
        h.store.restore(line);
      }
      h.store.count = parsed.lineCount;
    });
    return network;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run `operation` against staged storage and commit only if it returns.
   */
  private _transact<T>(operation: (handlers: Handlers) => T): T {
    return this._enter(() => {
      const staged = new StagedStorage(this._storage);
      const result = operation(this._handlers(staged));
      staged.commit();
      return result;
    });
  }

  private _read<T>(query: (store: TrustLineStore) => T): T {
    return this._enter(() => query(new TrustLineStore(this._storage, this._config.clock)));
  }

  private _enter<T>(body: () => T): T {
    if (this._busy) {
      throw new TrustLineError(
        "REENTRANT_CALL",
        "The network is already processing a request",
      );
    }
    this._busy = true;
    try {
      return body();
    } finally {
      this._busy = false;
    }
  }

  private _handlers(storage: LedgerStorage): Handlers {
    const store = new TrustLineStore(storage, this._config.clock);
    return {
      store,
      payments: new PaymentEngine(store),
      rippling: new RipplingEngine(store, this._config.maxHops),
      governor: new AdminGovernor(store, this._config.admin),
      settlement: new SettlementEngine(store),
    };
  }
}
