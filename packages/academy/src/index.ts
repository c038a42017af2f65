/**
 * @collegium/academy - Role-governed course organization.
 *
 * Admission voting, paid courses with revenue shares, teacher-committee
 * enrollment, ratings and treasury payouts, coordinated by `Academy`.
 *
 * @packageDocumentation
 */

// Coordinator
export { Academy } from "./academy.js";
export type { AcademyConfig, AcademyDependencies } from "./academy.js";

// Components
export { RoleRegistry } from "./roles.js";
export {
  ProposalEngine,
  ELECTORATE,
  DEFAULT_PROPOSAL_DURATION_SECONDS,
} from "./proposals.js";
export type { ExecutionResult } from "./proposals.js";
export { CourseCatalog } from "./courses.js";
export type { ListCoursesOptions } from "./courses.js";
export { EnrollmentWorkflow } from "./enrollments.js";
export type { CompletionResult, EnrollmentAuthority } from "./enrollments.js";
export { RatingLedger, MIN_RATING, MAX_RATING, DEFAULT_BONUS_WEIGHT } from "./ratings.js";
export { Treasury } from "./treasury.js";

// Split math
export { splitByBasisPoints, splitByWeights } from "./distribution.js";
export type { ShareRecipient, WeightRecipient } from "./distribution.js";

// Events
export { Notifier, streams } from "./notifier.js";
export type { EventSink, Notification } from "./notifier.js";

// Time
export { SystemClock, ManualClock } from "./clock.js";

// Errors
export { AcademyError, errorCategory } from "./errors.js";
export type { AcademyErrorCode, ErrorCategory } from "./errors.js";

// Types
export type {
  Proposal,
  ProposalStatus,
  Course,
  CourseInput,
  Enrollment,
  EnrollmentStatus,
  RatingStats,
  RatingResult,
  Payout,
  SplitResult,
  RoleSnapshot,
  ProposalRecordSnapshot,
  ProposalSnapshot,
  CourseRecordSnapshot,
  EnrollmentRecordSnapshot,
  RatingEntrySnapshot,
  AcademySnapshot,
} from "./types.js";
