/**
 * @trustnet/types — Shared domain types for the trustnet stack.
 *
 * These types are used across all trustnet packages:
 * - Participant identities and canonical pairs
 * - Trust lines
 * - The command catalog and its results
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Participant types
export type { ParticipantId, CanonicalPair, Direction } from "./participant.js";

// Trust line types
export type { TrustLine } from "./trust-line.js";

// Command catalog
export type {
  Command,
  CommandType,
  CreateCommand,
  SendCommand,
  RippleCommand,
  QualityCommand,
  RippleSetCommand,
  LimitsCommand,
  FreezeCommand,
  SettleCommand,
  BalanceCommand,
  CreditCommand,
  CommandResult,
  LineResult,
  SettleResult,
  RippleHop,
  RippleResult,
  BalanceResult,
  CreditResult,
} from "./command.js";

// Runtime type guards
export { isParticipantId, isCanonicalPair, isCommandType } from "./guards.js";
