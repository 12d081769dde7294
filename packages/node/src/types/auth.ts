/**
 * Authentication types.
 *
 * Every API request acts on behalf of exactly one participant. The
 * caller is identified by one of:
 * 1. API key via X-Api-Key header (mapped to a participant)
 * 2. JWT bearer token via Authorization header (`sub` is the participant)
 * 3. X-Participant-Id header, only when the node runs unsecured
 *
 * Requests that need a second party's approval (limit changes) carry
 * the co-signer's credential in X-Co-Signer-Key or X-Co-Signer-Token.
 */

import type { ParticipantId } from "@trustnet/types";

export type AuthMethod = "api-key" | "jwt" | "header";

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: AuthMethod;
  readonly participantId: ParticipantId;
  /** Participants other than the caller that approved this request */
  readonly coSigners: readonly ParticipantId[];
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly participantId: ParticipantId;
}

export interface JwtClaims {
  readonly sub: ParticipantId;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
