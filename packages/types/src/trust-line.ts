/**
 * Trust Line Types
 *
 * A bilateral credit relationship between two participants.
 *
 * Rules:
 * - All amounts are bigint (no floating point)
 * - `balance > 0` means `hi` owes `lo`; `balance < 0` means `lo` owes `hi`
 * - `-limitHi <= balance <= limitLo` for every line that is not frozen
 * - Lines are never deleted; freezing pins both limits at zero
 */

import type { CanonicalPair } from "./participant.js";

export interface TrustLine {
  /** The two parties, in canonical order */
  readonly pair: CanonicalPair;

  /** The fungible unit this line is denominated in */
  readonly assetId: number;

  /** How far `balance` may rise: credit `lo` extends to `hi` */
  readonly limitLo: bigint;

  /** How far `balance` may fall below zero: credit `hi` extends to `lo` */
  readonly limitHi: bigint;

  /** Signed net obligation; positive = `hi` owes `lo` */
  readonly balance: bigint;

  /** Rate factor scaled by 1,000,000 (parity = 1,000,000) */
  readonly qualityIn: number;

  /** Rate factor scaled by 1,000,000 (parity = 1,000,000) */
  readonly qualityOut: number;

  /** Whether the line may carry value through an intermediate participant */
  readonly allowRippling: boolean;

  /** Value of the global creation counter when this line was created (1-based) */
  readonly sequence: number;

  /** ISO 8601 timestamp */
  readonly createdAt: string;

  /** ISO 8601 timestamp of the last committed change */
  readonly updatedAt: string;
}
