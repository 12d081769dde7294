/**
 * Authentication middleware.
 *
 * Resolves the calling participant, plus any co-signers, from:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * Co-signers present their own credential in X-Co-Signer-Key (an API
 * key) or X-Co-Signer-Token (a JWT). A co-signer credential that does
 * not verify fails the whole request.
 *
 * On success, sets `auth` and `caller` in the context.
 * On failure, returns 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { isParticipantId } from "@trustnet/types";
import type { ParticipantId } from "@trustnet/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

export const CO_SIGNER_KEY_HEADER = "X-Co-Signer-Key";
export const CO_SIGNER_TOKEN_HEADER = "X-Co-Signer-Token";

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const resolveKey = (key: string): ParticipantId | undefined =>
    config.apiKeys.get(key)?.participantId;

  const resolveToken = (token: string): ParticipantId | undefined =>
    config.jwtSecret !== undefined
      ? verifyJwt(token, config.jwtSecret, config.jwtIssuer)?.sub
      : undefined;

  return async (c, next) => {
    let auth: Omit<AuthContext, "coSigners"> | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const participantId = resolveKey(apiKey);
      if (participantId === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = { type: "api-key", participantId };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const participantId = resolveToken(authHeader.slice(7));
        if (participantId === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        auth = { type: "jwt", participantId };
      }
    }

    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    // Co-signers
    const coSigners: ParticipantId[] = [];
    const coSignerKey = c.req.header(CO_SIGNER_KEY_HEADER);
    if (coSignerKey !== undefined) {
      const participantId = resolveKey(coSignerKey);
      if (participantId === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid co-signer API key"), 401);
      }
      coSigners.push(participantId);
    }
    const coSignerToken = c.req.header(CO_SIGNER_TOKEN_HEADER);
    if (coSignerToken !== undefined) {
      const participantId = resolveToken(coSignerToken);
      if (participantId === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid co-signer JWT"), 401);
      }
      coSigners.push(participantId);
    }

    c.set("auth", { ...auth, coSigners });
    c.set("caller", auth.participantId);
    return next();
  };
}

// =============================================================================
// Unsecured Mode
// =============================================================================

export const PARTICIPANT_HEADER = "X-Participant-Id";
export const CO_SIGNER_ID_HEADER = "X-Co-Signer-Id";

/**
 * Trust the caller's identity from headers. For tests and local
 * development only; main.ts warns whenever the node runs this way.
 */
export function headerIdentityMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const participantId = c.req.header(PARTICIPANT_HEADER);
    if (participantId === undefined || participantId === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${PARTICIPANT_HEADER} header required`),
        401,
      );
    }

    const coSigners = (c.req.header(CO_SIGNER_ID_HEADER) ?? "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id !== "");

    c.set("auth", { type: "header", participantId, coSigners });
    c.set("caller", participantId);
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return undefined;
    }
    return value as Record<string, unknown>;
  } catch {
    return undefined;
  }
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256. `sub` must be a valid participant id.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = Buffer.from(
    createHmac("sha256", secret).update(`${headerB64}.${payloadB64}`).digest("base64url"),
  );
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (header === undefined || header["alg"] !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return undefined;
  }

  const { sub, iss, exp, iat } = payload;
  if (!isParticipantId(sub) || typeof exp !== "number" || typeof iat !== "number") {
    return undefined;
  }
  if (exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return { sub, iss: typeof iss === "string" ? iss : "", exp, iat };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  const signature = createHmac("sha256", secret)
    .update(`${header}.${payload}`)
    .digest("base64url");

  return `${header}.${payload}.${signature}`;
}
