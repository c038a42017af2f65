/**
 * @collegium/sdk - Typed HTTP client SDK for Collegium.
 *
 * @packageDocumentation
 */

// Types
export type {
  CollegiumClientConfig,
  CollegiumResponse,
  RequestOptions,
} from "./types.js";

export { CollegiumError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export {
  CollegiumClient,
  MembersNamespace,
  ProposalsNamespace,
  CoursesNamespace,
  EnrollmentsNamespace,
  RatingsNamespace,
  TreasuryNamespace,
  AdminNamespace,
  LedgerNamespace,
  EventsNamespace,
} from "./client.js";

export type {
  PageParams,
  ListCoursesParams,
  CreateCourseParams,
  ListEventsParams,
  ListStreamEventsParams,
} from "./client.js";

// Response types
export type {
  AccountRole,
  Course,
  Enrollment,
  EnrollmentStatus,
  ExecutionResult,
  Health,
  LedgerAccount,
  MemberRole,
  Page,
  Proposal,
  ProposalStatus,
  ProposalWithStatus,
  RatingResult,
  Rescue,
  Role,
  RoleMembers,
  Split,
  StoredEvent,
  TeacherRating,
  Transfer,
  Treasury,
} from "./schemas.js";
