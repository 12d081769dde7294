/**
 * @trustnet/trust-lines — Bilateral credit lines with payment rippling.
 *
 * A pure TypeScript engine with zero runtime dependencies:
 * - One trust line per unordered pair of participants
 * - Direct payments within each side's credit limit
 * - Multi-hop rippled payments with a fixed per-hop cost, all-or-nothing
 * - Administrative freeze, co-signed limit changes, settlement
 *
 * Design rules:
 * - All amounts are bigint (no floating point)
 * - Fail-closed: invalid requests throw, never silently succeed
 * - A failed request leaves every trust line untouched
 */

// Command processor
export { TrustLineNetwork } from "./network.js";

// Components
export { TrustLineStore, isFrozen } from "./store.js";
export { PaymentEngine, checkPayment } from "./payment.js";
export { RipplingEngine } from "./rippling.js";
export { AdminGovernor } from "./governor.js";
export { SettlementEngine, checkSettlement } from "./settlement.js";
export { readBalance, readCredit } from "./queries.js";

// Addressing
export {
  assertParticipantId,
  canonicalize,
  directionOf,
  comparePairs,
  counterpartyOf,
} from "./canonical.js";
export { PairMap } from "./pair-map.js";

// Storage
export { InMemoryLedgerStorage, StagedStorage, LINE_FIELDS } from "./storage.js";
export type {
  LedgerStorage,
  LineFields,
  LineField,
  GlobalFields,
  GlobalField,
} from "./storage.js";

// Arithmetic
export {
  assertAmount,
  assertLimit,
  assertQuality,
  checkedAdd,
  checkedMul,
  decay,
  decaySchedule,
  absAmount,
  parseInteger,
} from "./amount-math.js";

// Snapshots
export {
  serializeTrustLine,
  deserializeTrustLine,
  assertLineInvariants,
  parseSnapshot,
} from "./snapshot.js";

// Types
export type {
  NetworkConfig,
  ResolvedNetworkConfig,
  TrustLineErrorCode,
  TrustLineErrorKind,
  SerializedTrustLine,
  NetworkSnapshot,
} from "./types.js";

export {
  TrustLineError,
  ERROR_KIND,
  QUALITY_PARITY,
  HOP_RATE_PPM,
  MAX_HOPS,
  MAX_AMOUNT,
  MIN_BALANCE,
  MAX_BALANCE,
} from "./types.js";
