/**
 * Academy entity views and snapshots.
 *
 * Views are immutable copies; the owning component keeps the only
 * mutable record. Snapshots are plain JSON (amounts as decimal strings).
 */

import type { Account, Amount, BasisPoints, MemberRole } from "@collegium/types";

// =============================================================================
// Proposals
// =============================================================================

export type ProposalStatus = "voting" | "closed" | "executed";

export interface Proposal {
  readonly id: number;
  readonly candidate: Account;
  readonly role: MemberRole;
  readonly proposer: Account;
  readonly votesFor: number;
  readonly votesAgainst: number;
  readonly voters: readonly Account[];
  /** Voting window, inclusive, in clock seconds */
  readonly start: number;
  readonly end: number;
  readonly executed: boolean;
  /** Outcome once executed; null before */
  readonly approved: boolean | null;
}

// =============================================================================
// Courses
// =============================================================================

export interface Course {
  readonly id: number;
  readonly title: string;
  readonly price: Amount;
  readonly teachers: readonly Account[];
  /** Aligned with `teachers`; sums to 10000 */
  readonly shares: readonly BasisPoints[];
  readonly creator: Account;
  /** False once soft-deleted; teachers and shares are kept */
  readonly exists: boolean;
}

export interface CourseInput {
  readonly title: string;
  readonly price: Amount;
  readonly teachers: readonly Account[];
  readonly shares: readonly BasisPoints[];
}

// =============================================================================
// Enrollment
// =============================================================================

export type EnrollmentStatus =
  | "applied"
  | "accepted"
  | "rejected"
  | "enrolled"
  | "completed";

export interface Enrollment {
  readonly courseId: number;
  readonly student: Account;
  readonly status: EnrollmentStatus;
  readonly votesFor: number;
  readonly votesAgainst: number;
  readonly teacherVoters: readonly Account[];
  readonly acceptedByTeachers: boolean;
  readonly enrolled: boolean;
  readonly completed: boolean;
}

// =============================================================================
// Ratings
// =============================================================================

export interface RatingStats {
  readonly sum: number;
  readonly count: number;
}

export interface RatingResult {
  readonly courseId: number;
  readonly student: Account;
  readonly teacher: Account;
  /** 0 when this was the first rating */
  readonly previous: number;
  readonly value: number;
  readonly stats: RatingStats;
}

// =============================================================================
// Payouts
// =============================================================================

export interface Payout {
  readonly to: Account;
  readonly amount: Amount;
}

export interface SplitResult {
  readonly payouts: readonly Payout[];
  readonly totalDistributed: Amount;
  /** Left in the treasury by floor division */
  readonly remainder: Amount;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface RoleSnapshot {
  readonly board: readonly Account[];
  readonly teacher: readonly Account[];
  readonly student: readonly Account[];
}

export interface ProposalRecordSnapshot {
  readonly id: number;
  readonly candidate: Account;
  readonly role: MemberRole;
  readonly proposer: Account;
  readonly votesFor: number;
  readonly votesAgainst: number;
  readonly voters: readonly Account[];
  readonly start: number;
  readonly end: number;
  readonly executed: boolean;
  readonly approved: boolean | null;
}

export interface ProposalSnapshot {
  readonly durationSeconds: number;
  readonly proposals: readonly ProposalRecordSnapshot[];
}

export interface CourseRecordSnapshot {
  readonly id: number;
  readonly title: string;
  readonly price: string;
  readonly teachers: readonly Account[];
  readonly shares: readonly BasisPoints[];
  readonly creator: Account;
  readonly exists: boolean;
}

export interface EnrollmentRecordSnapshot {
  readonly courseId: number;
  readonly student: Account;
  readonly votesFor: number;
  readonly votesAgainst: number;
  readonly teacherVoters: readonly Account[];
  readonly decided: boolean;
  readonly acceptedByTeachers: boolean;
  readonly enrolled: boolean;
  readonly completed: boolean;
}

export interface RatingEntrySnapshot {
  readonly courseId: number;
  readonly student: Account;
  readonly teacher: Account;
  readonly value: number;
}

export interface AcademySnapshot {
  readonly version: 1;
  readonly owner: Account;
  readonly treasuryAccount: Account;
  readonly roles: RoleSnapshot;
  readonly proposals: ProposalSnapshot;
  readonly courses: readonly CourseRecordSnapshot[];
  readonly enrollments: readonly EnrollmentRecordSnapshot[];
  readonly ratings: readonly RatingEntrySnapshot[];
}
