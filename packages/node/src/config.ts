/**
 * @trustnet/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isParticipantId } from "@trustnet/types";
import type { ParticipantId } from "@trustnet/types";
import { MAX_HOPS } from "@trustnet/trust-lines";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Network
  ADMIN_ID: z.string().refine(isParticipantId, "ADMIN_ID must be a valid participant id"),
  MAX_HOPS: z.coerce.number().int().min(1).max(MAX_HOPS).default(MAX_HOPS),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("trustnet"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),

  // Persistence
  SNAPSHOT_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly participantId: ParticipantId;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:participant1,key2:participant2". Participant ids may
 * themselves contain ':', so only the first ':' separates.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(":");
    if (separator < 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${trimmed}". Expected format: key:participantId`,
      );
    }

    const key = trimmed.slice(0, separator);
    const participantId = trimmed.slice(separator + 1);

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isParticipantId(participantId)) {
      throw new Error(`Invalid participant id "${participantId}" in API_KEYS`);
    }
    if (seen.has(key)) {
      throw new Error("Duplicate API key in API_KEYS");
    }
    seen.add(key);

    keys.push({ key, participantId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
