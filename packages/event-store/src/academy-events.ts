/**
 * Academy domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Streams:
 * - proposal-<id>                  governance
 * - course-<id>                    catalog, bonus distributions
 * - enrollment-<course>-<student>  applications, votes, payment, completion
 * - teacher-<account>              ratings
 * - treasury                       board payouts
 * - admin                          owner operations
 *
 * Amounts travel as decimal strings of base units.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Governance Events
// =============================================================================

export interface ProposalCreatedPayload {
  readonly proposalId: number;
  readonly candidate: string;
  readonly role: string;
  readonly proposer: string;
  readonly start: number;
  readonly end: number;
}

export interface ProposalVotedPayload {
  readonly proposalId: number;
  readonly voter: string;
  readonly support: boolean;
  readonly votesFor: number;
  readonly votesAgainst: number;
}

export interface ProposalExecutedPayload {
  readonly proposalId: number;
  readonly candidate: string;
  readonly role: string;
  readonly approved: boolean;
  readonly votesFor: number;
  readonly votesAgainst: number;
}

// =============================================================================
// Catalog Events
// =============================================================================

export interface CourseCreatedPayload {
  readonly courseId: number;
  readonly title: string;
  readonly teachers: readonly string[];
  readonly price: string;
}

export interface CourseRemovedPayload {
  readonly courseId: number;
}

// =============================================================================
// Enrollment Events
// =============================================================================

export interface ApplicationSubmittedPayload {
  readonly courseId: number;
  readonly student: string;
}

export interface EnrollmentVoteRecordedPayload {
  readonly courseId: number;
  readonly student: string;
  readonly teacher: string;
  readonly accept: boolean;
  readonly status: string;
}

export interface EnrollmentConfirmedPayload {
  readonly courseId: number;
  readonly student: string;
  readonly amount: string;
}

export interface PayoutLine {
  readonly to: string;
  readonly amount: string;
}

export interface CourseCompletedPayload {
  readonly courseId: number;
  readonly student: string;
  readonly payouts: readonly PayoutLine[];
}

// =============================================================================
// Rating Events
// =============================================================================

export interface RatingGivenPayload {
  readonly courseId: number;
  readonly student: string;
  readonly teacher: string;
  readonly value: number;
}

// =============================================================================
// Treasury & Admin Events
// =============================================================================

export interface BonusDistributedPayload {
  readonly courseId: number;
  readonly amount: string;
  readonly distributed: string;
  readonly payouts: readonly PayoutLine[];
}

export interface TreasuryPayoutPayload {
  readonly to: string;
  readonly amount: string;
}

export interface ProposalDurationSetPayload {
  readonly seconds: number;
}

export interface FundsRescuedPayload {
  readonly asset: string;
  readonly to: string;
  readonly amount: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const ACADEMY_EVENTS = {
  PROPOSAL_CREATED: "governance.proposal.created",
  PROPOSAL_VOTED: "governance.proposal.voted",
  PROPOSAL_EXECUTED: "governance.proposal.executed",

  COURSE_CREATED: "catalog.course.created",
  COURSE_REMOVED: "catalog.course.removed",

  APPLICATION_SUBMITTED: "enrollment.application.submitted",
  ENROLLMENT_VOTE_RECORDED: "enrollment.vote.recorded",
  ENROLLMENT_CONFIRMED: "enrollment.confirmed",
  COURSE_COMPLETED: "enrollment.course.completed",

  RATING_GIVEN: "rating.given",

  BONUS_DISTRIBUTED: "treasury.bonus.distributed",
  TREASURY_PAYOUT: "treasury.payout",

  PROPOSAL_DURATION_SET: "admin.proposal-duration.set",
  FUNDS_RESCUED: "admin.funds.rescued",
} as const;

export type AcademyEventType = (typeof ACADEMY_EVENTS)[keyof typeof ACADEMY_EVENTS];

// =============================================================================
// Payload Validators
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

function hasBoolean(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "boolean";
}

function hasAmount(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^\d+$/.test(value);
}

function hasPayouts(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return (
    Array.isArray(value) &&
    value.every((line: unknown) => isObject(line) && hasString(line, "to") && hasAmount(line, "amount"))
  );
}

// =============================================================================
// Schema Definitions
// =============================================================================

const GOVERNANCE_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.PROPOSAL_CREATED,
    version: 1,
    description: "An admission proposal was opened",
    source: "governance",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "proposalId") &&
      hasString(p, "candidate") &&
      hasString(p, "role") &&
      hasNumber(p, "end"),
  },
  {
    type: ACADEMY_EVENTS.PROPOSAL_VOTED,
    version: 1,
    description: "A member voted on an admission proposal",
    source: "governance",
    validate: (p) =>
      isObject(p) && hasNumber(p, "proposalId") && hasString(p, "voter") && hasBoolean(p, "support"),
  },
  {
    type: ACADEMY_EVENTS.PROPOSAL_EXECUTED,
    version: 1,
    description: "An admission proposal was resolved",
    source: "governance",
    validate: (p) => isObject(p) && hasNumber(p, "proposalId") && hasBoolean(p, "approved"),
  },
];

const CATALOG_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.COURSE_CREATED,
    version: 1,
    description: "A course was published by a teacher",
    source: "catalog",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "courseId") &&
      hasString(p, "title") &&
      Array.isArray(p["teachers"]) &&
      hasAmount(p, "price"),
  },
  {
    type: ACADEMY_EVENTS.COURSE_REMOVED,
    version: 1,
    description: "A course was soft-deleted",
    source: "catalog",
    validate: (p) => isObject(p) && hasNumber(p, "courseId"),
  },
];

const ENROLLMENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.APPLICATION_SUBMITTED,
    version: 1,
    description: "A student applied to a course",
    source: "enrollment",
    validate: (p) => isObject(p) && hasNumber(p, "courseId") && hasString(p, "student"),
  },
  {
    type: ACADEMY_EVENTS.ENROLLMENT_VOTE_RECORDED,
    version: 1,
    description: "A course teacher voted on an application",
    source: "enrollment",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "courseId") &&
      hasString(p, "teacher") &&
      hasBoolean(p, "accept") &&
      hasString(p, "status"),
  },
  {
    type: ACADEMY_EVENTS.ENROLLMENT_CONFIRMED,
    version: 1,
    description: "A student paid for an accepted application",
    source: "enrollment",
    validate: (p) =>
      isObject(p) && hasNumber(p, "courseId") && hasString(p, "student") && hasAmount(p, "amount"),
  },
  {
    type: ACADEMY_EVENTS.COURSE_COMPLETED,
    version: 1,
    description: "A student completed a course and its teachers were paid",
    source: "enrollment",
    validate: (p) =>
      isObject(p) && hasNumber(p, "courseId") && hasString(p, "student") && hasPayouts(p, "payouts"),
  },
];

const RATING_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.RATING_GIVEN,
    version: 1,
    description: "An enrolled student rated a course teacher",
    source: "rating",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "courseId") &&
      hasString(p, "teacher") &&
      hasNumber(p, "value"),
  },
];

const TREASURY_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.BONUS_DISTRIBUTED,
    version: 1,
    description: "A rating-weighted bonus was paid to a course's teachers",
    source: "treasury",
    validate: (p) =>
      isObject(p) &&
      hasNumber(p, "courseId") &&
      hasAmount(p, "amount") &&
      hasAmount(p, "distributed") &&
      hasPayouts(p, "payouts"),
  },
  {
    type: ACADEMY_EVENTS.TREASURY_PAYOUT,
    version: 1,
    description: "The board paid an account from the treasury",
    source: "treasury",
    validate: (p) => isObject(p) && hasString(p, "to") && hasAmount(p, "amount"),
  },
];

const ADMIN_SCHEMAS: readonly EventSchema[] = [
  {
    type: ACADEMY_EVENTS.PROPOSAL_DURATION_SET,
    version: 1,
    description: "The owner changed the voting window",
    source: "admin",
    validate: (p) => isObject(p) && hasNumber(p, "seconds"),
  },
  {
    type: ACADEMY_EVENTS.FUNDS_RESCUED,
    version: 1,
    description: "The owner moved stray tokens out of the treasury",
    source: "admin",
    validate: (p) =>
      isObject(p) && hasString(p, "asset") && hasString(p, "to") && hasAmount(p, "amount"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Catalog with every academy event registered at version 1.
 */
export function createAcademyCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...GOVERNANCE_SCHEMAS,
    ...CATALOG_SCHEMAS,
    ...ENROLLMENT_SCHEMAS,
    ...RATING_SCHEMAS,
    ...TREASURY_SCHEMAS,
    ...ADMIN_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}
