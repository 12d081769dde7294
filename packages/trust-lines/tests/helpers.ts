/**
 * Shared fixtures for trust-line tests.
 */

import { TrustLineError } from "../src/types.js";
import type { TrustLineErrorCode } from "../src/types.js";

export const TS = "2025-01-01T00:00:00.000Z";
export const ADMIN = "admin";

/** A clock that always reads TS. */
export const fixedClock = (): string => TS;

/**
 * Run `fn` and return the code of the TrustLineError it throws,
 * or undefined if it returns normally.
 */
export function codeOf(fn: () => unknown): TrustLineErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TrustLineError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}
