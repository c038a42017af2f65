/**
 * Academy errors.
 *
 * Every refused operation throws an AcademyError before any state changes.
 * The category groups codes by what the caller can do about them:
 *
 * - authorization: act as a different account
 * - validation: change the input
 * - not-found: reference something that exists
 * - state-conflict: the entity is not in a state that allows this
 * - temporal: wait for the voting window to open or close
 * - resource: the treasury or the settlement ledger cannot cover it
 */

export type AcademyErrorCode =
  // authorization
  | "ROLE_REQUIRED"
  | "NOT_IN_ELECTORATE"
  | "NOT_AUTHORIZED"
  | "NOT_COURSE_TEACHER"
  | "NOT_OWNER"
  // validation
  | "INVALID_CANDIDATE"
  | "INVALID_ROLE"
  | "INVALID_ACCOUNT"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_SHARE"
  | "EMPTY_TEACHER_LIST"
  | "LENGTH_MISMATCH"
  | "DUPLICATE_TEACHER"
  | "SHARES_MUST_SUM_TO_10000"
  | "UNREGISTERED_TEACHER"
  | "INVALID_RATING_VALUE"
  | "TEACHER_NOT_IN_COURSE"
  | "ZERO_AMOUNT"
  | "ZERO_PRICE_COURSE"
  // not-found
  | "PROPOSAL_NOT_FOUND"
  | "COURSE_NOT_FOUND"
  | "NO_APPLICATION"
  | "UNKNOWN_ASSET"
  // state-conflict
  | "DUPLICATE_ACTIVE_PROPOSAL"
  | "ALREADY_HAS_ROLE"
  | "ALREADY_IN_ROLE"
  | "DUPLICATE_VOTE"
  | "ALREADY_EXECUTED"
  | "ALREADY_ACTIVE"
  | "ALREADY_ENROLLED"
  | "ALREADY_COMPLETED"
  | "NOT_PENDING_OR_NOT_ACCEPTED"
  | "STUDENT_NOT_ENROLLED"
  // temporal
  | "VOTING_CLOSED"
  | "VOTING_STILL_OPEN"
  // resource
  | "INSUFFICIENT_TREASURY"
  | "NO_WEIGHT"
  | "TRANSFER_FAILED";

export type ErrorCategory =
  | "authorization"
  | "validation"
  | "not-found"
  | "state-conflict"
  | "temporal"
  | "resource";

const CATEGORIES: Readonly<Record<AcademyErrorCode, ErrorCategory>> = {
  ROLE_REQUIRED: "authorization",
  NOT_IN_ELECTORATE: "authorization",
  NOT_AUTHORIZED: "authorization",
  NOT_COURSE_TEACHER: "authorization",
  NOT_OWNER: "authorization",

  INVALID_CANDIDATE: "validation",
  INVALID_ROLE: "validation",
  INVALID_ACCOUNT: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_DURATION: "validation",
  INVALID_SHARE: "validation",
  EMPTY_TEACHER_LIST: "validation",
  LENGTH_MISMATCH: "validation",
  DUPLICATE_TEACHER: "validation",
  SHARES_MUST_SUM_TO_10000: "validation",
  UNREGISTERED_TEACHER: "validation",
  INVALID_RATING_VALUE: "validation",
  TEACHER_NOT_IN_COURSE: "validation",
  ZERO_AMOUNT: "validation",
  ZERO_PRICE_COURSE: "validation",

  PROPOSAL_NOT_FOUND: "not-found",
  COURSE_NOT_FOUND: "not-found",
  NO_APPLICATION: "not-found",
  UNKNOWN_ASSET: "not-found",

  DUPLICATE_ACTIVE_PROPOSAL: "state-conflict",
  ALREADY_HAS_ROLE: "state-conflict",
  ALREADY_IN_ROLE: "state-conflict",
  DUPLICATE_VOTE: "state-conflict",
  ALREADY_EXECUTED: "state-conflict",
  ALREADY_ACTIVE: "state-conflict",
  ALREADY_ENROLLED: "state-conflict",
  ALREADY_COMPLETED: "state-conflict",
  NOT_PENDING_OR_NOT_ACCEPTED: "state-conflict",
  STUDENT_NOT_ENROLLED: "state-conflict",

  VOTING_CLOSED: "temporal",
  VOTING_STILL_OPEN: "temporal",

  INSUFFICIENT_TREASURY: "resource",
  NO_WEIGHT: "resource",
  TRANSFER_FAILED: "resource",
};

export function errorCategory(code: AcademyErrorCode): ErrorCategory {
  return CATEGORIES[code];
}

export class AcademyError extends Error {
  public readonly code: AcademyErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: AcademyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AcademyError";
    this.code = code;
    this.category = CATEGORIES[code];
  }
}
