/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings of base units and are parsed to bigint.
 */

import { z } from "zod";
import { LedgerError, parseBaseUnits } from "@collegium/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountSchema = z.string().trim().min(1).max(256);

export const AmountSchema = z.string().transform((value, ctx) => {
  try {
    return parseBaseUnits(value);
  } catch (error) {
    if (!(error instanceof LedgerError)) {
      throw error;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Amount must be a decimal string of base units",
    });
    return z.NEVER;
  }
});

export const IdParamSchema = z
  .string()
  .regex(/^[1-9]\d*$/, "Id must be a positive integer")
  .transform(Number);

export const MemberRoleSchema = z.enum(["board", "teacher", "student"]);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Governance DTOs
// =============================================================================

export const CreateProposalSchema = z.object({
  candidate: z.string(),
  /** Checked by the academy so unknown roles answer INVALID_ROLE */
  role: z.string(),
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const CastVoteSchema = z.object({
  support: z.boolean(),
});

export type CastVoteDto = z.infer<typeof CastVoteSchema>;

// =============================================================================
// Course DTOs
// =============================================================================

export const CreateCourseSchema = z.object({
  title: z.string().min(1).max(256),
  price: AmountSchema,
  teachers: z.array(AccountSchema),
  shares: z.array(z.number().int()),
});

export type CreateCourseDto = z.infer<typeof CreateCourseSchema>;

export const ListCoursesQuerySchema = PaginationQuerySchema.extend({
  includeRemoved: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export type ListCoursesQuery = z.infer<typeof ListCoursesQuerySchema>;

// =============================================================================
// Enrollment & Rating DTOs
// =============================================================================

export const EnrollmentVoteSchema = z.object({
  accept: z.boolean(),
});

export type EnrollmentVoteDto = z.infer<typeof EnrollmentVoteSchema>;

export const GiveRatingSchema = z.object({
  teacher: AccountSchema,
  value: z.number(),
});

export type GiveRatingDto = z.infer<typeof GiveRatingSchema>;

export const BonusSchema = z.object({
  amount: AmountSchema,
});

export type BonusDto = z.infer<typeof BonusSchema>;

// =============================================================================
// Treasury & Admin DTOs
// =============================================================================

export const PayoutSchema = z.object({
  to: z.string(),
  amount: AmountSchema,
});

export type PayoutDto = z.infer<typeof PayoutSchema>;

export const ProposalDurationSchema = z.object({
  seconds: z.number(),
});

export type ProposalDurationDto = z.infer<typeof ProposalDurationSchema>;

export const RescueSchema = z.object({
  asset: z.string().min(1),
  to: z.string(),
  amount: AmountSchema,
});

export type RescueDto = z.infer<typeof RescueSchema>;

// =============================================================================
// Ledger DTOs
// =============================================================================

export const ApproveSchema = z.object({
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const MintSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  /** Comma-separated event types */
  type: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
