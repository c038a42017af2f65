/**
 * Type barrel - re-exports all public types from @collegium/node.
 */

// DTOs
export {
  AccountSchema,
  AmountSchema,
  IdParamSchema,
  MemberRoleSchema,
  PaginationQuerySchema,
  CreateProposalSchema,
  CastVoteSchema,
  CreateCourseSchema,
  ListCoursesQuerySchema,
  EnrollmentVoteSchema,
  GiveRatingSchema,
  BonusSchema,
  PayoutSchema,
  ProposalDurationSchema,
  RescueSchema,
  ApproveSchema,
  MintSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  CreateProposalDto,
  CastVoteDto,
  CreateCourseDto,
  ListCoursesQuery,
  EnrollmentVoteDto,
  GiveRatingDto,
  BonusDto,
  PayoutDto,
  ProposalDurationDto,
  RescueDto,
  ApproveDto,
  MintDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Views
export { toCourseView, toSplitView } from "./views.js";
export type { CourseView, PayoutView, SplitView } from "./views.js";

// Auth
export type { AuthMethod, AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
