/**
 * Response schemas. Mirrors the server's JSON views; amounts arrive as
 * decimal strings and leave as bigint.
 */

import { z } from "zod";

const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string")
  .transform((v) => BigInt(v));

export const MemberRoleSchema = z.enum(["board", "teacher", "student"]);
export type MemberRole = z.infer<typeof MemberRoleSchema>;

export const RoleSchema = z.enum(["none", "board", "teacher", "student"]);
export type Role = z.infer<typeof RoleSchema>;

// =============================================================================
// Pagination
// =============================================================================

export const PaginationSchema = z.object({
  cursor: z.string().nullable(),
  hasMore: z.boolean(),
});

export function pageOf<S extends z.ZodTypeAny>(item: S) {
  return z.object({
    data: z.array(item),
    pagination: PaginationSchema,
  });
}

export interface Page<T> {
  readonly data: readonly T[];
  readonly pagination: z.infer<typeof PaginationSchema>;
}

// =============================================================================
// Membership & Proposals
// =============================================================================

export const AccountRoleSchema = z.object({
  account: z.string(),
  role: RoleSchema,
});
export type AccountRole = z.infer<typeof AccountRoleSchema>;

export const RoleMembersSchema = z.object({
  role: MemberRoleSchema,
  members: z.array(z.string()),
});
export type RoleMembers = z.infer<typeof RoleMembersSchema>;

export const ProposalStatusSchema = z.enum(["voting", "closed", "executed"]);
export type ProposalStatus = z.infer<typeof ProposalStatusSchema>;

export const ProposalSchema = z.object({
  id: z.number().int(),
  candidate: z.string(),
  role: MemberRoleSchema,
  proposer: z.string(),
  votesFor: z.number().int(),
  votesAgainst: z.number().int(),
  voters: z.array(z.string()),
  start: z.number(),
  end: z.number(),
  executed: z.boolean(),
  approved: z.boolean().nullable(),
});
export type Proposal = z.infer<typeof ProposalSchema>;

export const ProposalWithStatusSchema = ProposalSchema.extend({
  status: ProposalStatusSchema,
});
export type ProposalWithStatus = z.infer<typeof ProposalWithStatusSchema>;

export const ExecutionResultSchema = z.object({
  proposal: ProposalSchema,
  approved: z.boolean(),
});
export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

// =============================================================================
// Courses & Enrollment
// =============================================================================

export const CourseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  price: AmountSchema,
  teachers: z.array(z.string()),
  shares: z.array(z.number().int()),
  creator: z.string(),
  exists: z.boolean(),
});
export type Course = z.infer<typeof CourseSchema>;

export const EnrollmentStatusSchema = z.enum([
  "applied",
  "accepted",
  "rejected",
  "enrolled",
  "completed",
]);
export type EnrollmentStatus = z.infer<typeof EnrollmentStatusSchema>;

export const EnrollmentSchema = z.object({
  courseId: z.number().int(),
  student: z.string(),
  status: EnrollmentStatusSchema,
  votesFor: z.number().int(),
  votesAgainst: z.number().int(),
  teacherVoters: z.array(z.string()),
  acceptedByTeachers: z.boolean(),
  enrolled: z.boolean(),
  completed: z.boolean(),
});
export type Enrollment = z.infer<typeof EnrollmentSchema>;

export const SplitSchema = z.object({
  payouts: z.array(z.object({ to: z.string(), amount: AmountSchema })),
  totalDistributed: AmountSchema,
  remainder: AmountSchema,
});
export type Split = z.infer<typeof SplitSchema>;

// =============================================================================
// Ratings
// =============================================================================

const RatingStatsSchema = z.object({
  sum: z.number().int(),
  count: z.number().int(),
});

export const RatingResultSchema = z.object({
  courseId: z.number().int(),
  student: z.string(),
  teacher: z.string(),
  previous: z.number().int(),
  value: z.number().int(),
  stats: RatingStatsSchema,
});
export type RatingResult = z.infer<typeof RatingResultSchema>;

export const TeacherRatingSchema = RatingStatsSchema.extend({
  account: z.string(),
  average: z.number().nullable(),
  bonusWeight: AmountSchema,
});
export type TeacherRating = z.infer<typeof TeacherRatingSchema>;

// =============================================================================
// Treasury, Administration & Ledger
// =============================================================================

export const TreasurySchema = z.object({
  account: z.string(),
  asset: z.string(),
  decimals: z.number().int(),
  balance: AmountSchema,
});
export type Treasury = z.infer<typeof TreasurySchema>;

export const TransferSchema = z.object({
  to: z.string(),
  amount: AmountSchema,
});
export type Transfer = z.infer<typeof TransferSchema>;

export const RescueSchema = TransferSchema.extend({
  asset: z.string(),
});
export type Rescue = z.infer<typeof RescueSchema>;

export const ProposalDurationSchema = z.object({
  seconds: z.number().int(),
});

export const LedgerAccountSchema = z.object({
  account: z.string(),
  asset: z.string(),
  decimals: z.number().int(),
  balance: AmountSchema,
  allowance: AmountSchema,
});
export type LedgerAccount = z.infer<typeof LedgerAccountSchema>;

// =============================================================================
// Events & Health
// =============================================================================

export const StoredEventSchema = z.object({
  event: z.object({
    type: z.string(),
    metadata: z.object({
      eventId: z.string(),
      timestamp: z.string(),
      actor: z.string(),
      correlationId: z.string(),
      source: z.string(),
    }),
    payload: z.record(z.unknown()),
  }),
  streamId: z.string(),
  version: z.number().int(),
  globalPosition: z.number().int(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});
export type StoredEvent = z.infer<typeof StoredEventSchema>;

export const HealthSchema = z.object({
  status: z.literal("ok"),
  timestamp: z.string(),
});
export type Health = z.infer<typeof HealthSchema>;
