/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts arrive as base-unit decimal strings and leave the schema as
 * bigint.
 */

import { z } from "zod";
import { MAX_AMOUNT, normalizeAddress } from "@amoca/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Addresses are lower-cased so each owner has one spelling. */
export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{1,64}$/, "Must be a 0x-prefixed hex address")
  .transform(normalizeAddress);

export const AmountSchema = z
  .string()
  .regex(/^\d{1,20}$/, "Must be a base-unit integer string")
  .transform((v, ctx) => {
    const amount = BigInt(v);
    if (amount > MAX_AMOUNT) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Exceeds the maximum token amount" });
      return z.NEVER;
    }
    return amount;
  });

const Seconds = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Token DTOs
// =============================================================================

export const MintSchema = z.object({
  amount: AmountSchema,
  recipient: AddressSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

export const TransferSchema = z.object({
  recipient: AddressSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const SplitSchema = z.object({
  amount: AmountSchema,
});

export type SplitDto = z.infer<typeof SplitSchema>;

export const MergeSchema = z.object({
  sourceId: z.string().min(1),
});

export type MergeDto = z.infer<typeof MergeSchema>;

// =============================================================================
// Staking DTOs
// =============================================================================

export const StakeSchema = z.object({
  coinId: z.string().min(1),
  duration: Seconds,
});

export type StakeDto = z.infer<typeof StakeSchema>;

// =============================================================================
// Governance DTOs
// =============================================================================

export const CreateProposalSchema = z.object({
  title: z.string().min(1).max(256),
  description: z.string().max(4096).default(""),
  duration: Seconds,
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const VoteSchema = z.object({
  choice: z.enum(["yes", "no"]),
  weight: AmountSchema,
});

export type VoteDto = z.infer<typeof VoteSchema>;

// =============================================================================
// Access DTOs
// =============================================================================

export const GrantAccessSchema = z.object({
  dataId: z.string().min(1).max(256),
  recipient: AddressSchema,
  accessLevel: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
  expiration: Seconds,
});

export type GrantAccessDto = z.infer<typeof GrantAccessSchema>;

export const VerifyAccessSchema = z.object({
  requiredLevel: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
});

export type VerifyAccessDto = z.infer<typeof VerifyAccessSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const EventQuerySchema = PaginationQuerySchema.extend({
  type: z.string().min(1).optional(),
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type EventQueryDto = z.infer<typeof EventQuerySchema>;

export const StreamEventQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type StreamEventQueryDto = z.infer<typeof StreamEventQuerySchema>;
