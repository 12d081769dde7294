/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts and limits travel as decimal strings and are parsed to
 * bigint here; range and sign are enforced by the engine.
 */

import { z } from "zod";
import { isParticipantId } from "@trustnet/types";
import type {
  BalanceResult,
  CreditResult,
  RippleResult,
  SettleResult,
  TrustLine,
} from "@trustnet/types";
import { MAX_HOPS, isFrozen } from "@trustnet/trust-lines";

// =============================================================================
// Shared Schemas
// =============================================================================

export const ParticipantIdSchema = z
  .string()
  .refine(isParticipantId, "must be 1-64 characters of [A-Za-z0-9._:-]");

/** "1000" → 1000n. At most 20 digits; the engine rejects anything above 2^63 - 1. */
export const AmountSchema = z
  .string()
  .regex(/^\d{1,20}$/, "must be a decimal integer string")
  .transform((value) => BigInt(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Trust Line DTOs
// =============================================================================

export const CreateTrustLineSchema = z.object({
  counterparty: ParticipantIdSchema,
  assetId: z.number().int().min(0).default(0),
  /** Limit on the canonical low side (the lexicographically smaller id) */
  limitLo: AmountSchema,
  /** Limit on the canonical high side */
  limitHi: AmountSchema,
  allowRippling: z.boolean().default(false),
});

export type CreateTrustLineDto = z.infer<typeof CreateTrustLineSchema>;

export const UpdateQualitySchema = z.object({
  qualityIn: z.number().int(),
  qualityOut: z.number().int(),
});

export type UpdateQualityDto = z.infer<typeof UpdateQualitySchema>;

export const SetRipplingSchema = z.object({
  allowRippling: z.boolean(),
});

export type SetRipplingDto = z.infer<typeof SetRipplingSchema>;

export const UpdateLimitsSchema = z.object({
  limitLo: AmountSchema,
  limitHi: AmountSchema,
});

export type UpdateLimitsDto = z.infer<typeof UpdateLimitsSchema>;

export const SettleSchema = z.object({
  amount: AmountSchema,
  reference: z.string().min(1).max(256).optional(),
});

export type SettleDto = z.infer<typeof SettleSchema>;

export const ListTrustLinesQuerySchema = PaginationQuerySchema;

export type ListTrustLinesQuery = z.infer<typeof ListTrustLinesQuerySchema>;

// =============================================================================
// Payment DTOs
// =============================================================================

export const SendPaymentSchema = z.object({
  recipient: ParticipantIdSchema,
  amount: AmountSchema,
});

export type SendPaymentDto = z.infer<typeof SendPaymentSchema>;

export const RipplePaymentSchema = z.object({
  recipient: ParticipantIdSchema,
  hops: z.array(ParticipantIdSchema).min(1).max(MAX_HOPS),
  amount: AmountSchema,
});

export type RipplePaymentDto = z.infer<typeof RipplePaymentSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const FreezeSchema = z.object({
  account: ParticipantIdSchema,
  counterparty: ParticipantIdSchema,
});

export type FreezeDto = z.infer<typeof FreezeSchema>;

export const AuditQuerySchema = z.object({
  action: z.string().optional(),
  participant: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface TrustLineDto {
  readonly lo: string;
  readonly hi: string;
  readonly assetId: number;
  readonly limitLo: string;
  readonly limitHi: string;
  readonly balance: string;
  readonly qualityIn: number;
  readonly qualityOut: number;
  readonly allowRippling: boolean;
  readonly frozen: boolean;
  readonly sequence: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function toTrustLineDto(line: TrustLine): TrustLineDto {
  return {
    lo: line.pair.lo,
    hi: line.pair.hi,
    assetId: line.assetId,
    limitLo: line.limitLo.toString(),
    limitHi: line.limitHi.toString(),
    balance: line.balance.toString(),
    qualityIn: line.qualityIn,
    qualityOut: line.qualityOut,
    allowRippling: line.allowRippling,
    frozen: isFrozen(line),
    sequence: line.sequence,
    createdAt: line.createdAt,
    updatedAt: line.updatedAt,
  };
}

export function toSettlementDto(result: SettleResult) {
  return {
    line: toTrustLineDto(result.line),
    reference: result.reference ?? null,
  };
}

export function toRippleDto(result: RippleResult) {
  return {
    delivered: result.delivered.toString(),
    hops: result.hops.map((hop) => ({
      from: hop.from,
      to: hop.to,
      lo: hop.pair.lo,
      hi: hop.pair.hi,
      amount: hop.amount.toString(),
      balance: hop.balance.toString(),
    })),
  };
}

export function toBalanceDto(result: BalanceResult) {
  return {
    lo: result.pair.lo,
    hi: result.pair.hi,
    balance: result.balance.toString(),
    net: result.net.toString(),
  };
}

export function toCreditDto(result: CreditResult) {
  return {
    lo: result.pair.lo,
    hi: result.pair.hi,
    canSend: result.canSend.toString(),
    canReceive: result.canReceive.toString(),
  };
}
