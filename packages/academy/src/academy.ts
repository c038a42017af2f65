/**
 * Academy - top-level coordinator of the organization.
 *
 * Composes:
 * - RoleRegistry: who holds which role
 * - ProposalEngine: admission voting
 * - CourseCatalog: courses and revenue shares
 * - EnrollmentWorkflow: applications, payment, completion payouts
 * - RatingLedger: ratings and the rating-weighted bonus
 * - Treasury: the organization's account on the settlement ledger
 *
 * Every command takes the calling account first, runs to completion or
 * throws an AcademyError with nothing changed, and publishes its events
 * only after it succeeded. Calls must be serialized by the host.
 */

import type {
  Account,
  Amount,
  Clock,
  MemberRole,
  Role,
  SettlementLedger,
} from "@collegium/types";
import { ACADEMY_EVENTS } from "@collegium/event-store";
import { SystemClock } from "./clock.js";
import { CourseCatalog } from "./courses.js";
import type { ListCoursesOptions } from "./courses.js";
import { EnrollmentWorkflow } from "./enrollments.js";
import { AcademyError } from "./errors.js";
import { Notifier, streams } from "./notifier.js";
import type { EventSink } from "./notifier.js";
import { ProposalEngine } from "./proposals.js";
import type { ExecutionResult } from "./proposals.js";
import { RatingLedger } from "./ratings.js";
import { RoleRegistry } from "./roles.js";
import { Treasury } from "./treasury.js";
import type {
  AcademySnapshot,
  Course,
  CourseInput,
  Enrollment,
  Payout,
  Proposal,
  ProposalStatus,
  RatingResult,
  RatingStats,
  SplitResult,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AcademyDependencies {
  /** Ledger of the payment asset */
  readonly ledger: SettlementLedger;

  /** Default: SystemClock */
  readonly clock?: Clock;

  /** Further assets the owner may rescue from the treasury */
  readonly assetLedgers?: readonly SettlementLedger[];

  /** Receives every committed event */
  readonly sink?: EventSink;

  /** Event and correlation id source. Default: randomUUID */
  readonly newId?: () => string;
}

export interface AcademyConfig extends AcademyDependencies {
  /** Administrator outside the board: voting window and rescue */
  readonly owner: Account;

  /** The organization's account on the ledgers */
  readonly treasuryAccount: Account;

  readonly initialBoard?: readonly Account[];

  /** Default: 180 */
  readonly proposalDurationSeconds?: number;
}


// =============================================================================
// Academy
// =============================================================================

export class Academy {
  public readonly owner: Account;
  private readonly roles: RoleRegistry;
  private readonly proposals: ProposalEngine;
  private readonly catalog: CourseCatalog;
  private readonly enrollments: EnrollmentWorkflow;
  private readonly ratings: RatingLedger;
  private readonly treasury: Treasury;
  private readonly notifier: Notifier;

  /**
   * @param restore - state to resume from; see `Academy.fromSnapshot`
   */
  constructor(config: AcademyConfig, restore?: AcademySnapshot) {
    const clock = config.clock ?? new SystemClock();
    const authority = { owner: config.owner };

    const roles = restore
      ? RoleRegistry.fromSnapshot(restore.roles)
      : new RoleRegistry(config.initialBoard);
    const treasury = new Treasury(config.ledger, config.treasuryAccount, config.assetLedgers);
    const catalog = restore
      ? CourseCatalog.fromSnapshot(restore.courses, roles)
      : new CourseCatalog(roles);
    const enrollments = restore
      ? EnrollmentWorkflow.fromSnapshot(restore.enrollments, roles, catalog, treasury, authority)
      : new EnrollmentWorkflow(roles, catalog, treasury, authority);

    this.owner = config.owner;
    this.roles = roles;
    this.treasury = treasury;
    this.catalog = catalog;
    this.enrollments = enrollments;
    this.proposals = restore
      ? ProposalEngine.fromSnapshot(restore.proposals, roles, clock)
      : new ProposalEngine(roles, clock, config.proposalDurationSeconds);
    this.ratings = restore
      ? RatingLedger.fromSnapshot(restore.ratings, roles, catalog, enrollments, treasury)
      : new RatingLedger(roles, catalog, enrollments, treasury);
    this.notifier = new Notifier(config.sink, clock, config.newId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Governance
  // ───────────────────────────────────────────────────────────────────────

  createAdmissionProposal(caller: Account, candidate: Account, role: string): Proposal {
    const proposal = this.proposals.create(caller, candidate, role);
    this.notifier.emit(caller, [
      {
        streamId: streams.proposal(proposal.id),
        type: ACADEMY_EVENTS.PROPOSAL_CREATED,
        source: "governance",
        payload: {
          proposalId: proposal.id,
          candidate: proposal.candidate,
          role: proposal.role,
          proposer: proposal.proposer,
          start: proposal.start,
          end: proposal.end,
        },
      },
    ]);
    return proposal;
  }

  castVote(caller: Account, proposalId: number, support: boolean): Proposal {
    const proposal = this.proposals.vote(caller, proposalId, support);
    this.notifier.emit(caller, [
      {
        streamId: streams.proposal(proposal.id),
        type: ACADEMY_EVENTS.PROPOSAL_VOTED,
        source: "governance",
        payload: {
          proposalId: proposal.id,
          voter: caller,
          support,
          votesFor: proposal.votesFor,
          votesAgainst: proposal.votesAgainst,
        },
      },
    ]);
    return proposal;
  }

  executeProposal(caller: Account, proposalId: number): ExecutionResult {
    const result = this.proposals.execute(proposalId);
    const { proposal } = result;
    this.notifier.emit(caller, [
      {
        streamId: streams.proposal(proposal.id),
        type: ACADEMY_EVENTS.PROPOSAL_EXECUTED,
        source: "governance",
        payload: {
          proposalId: proposal.id,
          candidate: proposal.candidate,
          role: proposal.role,
          approved: result.approved,
          votesFor: proposal.votesFor,
          votesAgainst: proposal.votesAgainst,
        },
      },
    ]);
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Courses
  // ───────────────────────────────────────────────────────────────────────

  createCourse(caller: Account, input: CourseInput): Course {
    const course = this.catalog.create(caller, input);
    this.notifier.emit(caller, [
      {
        streamId: streams.course(course.id),
        type: ACADEMY_EVENTS.COURSE_CREATED,
        source: "catalog",
        payload: {
          courseId: course.id,
          title: course.title,
          teachers: course.teachers,
          price: course.price.toString(),
        },
      },
    ]);
    return course;
  }

  removeCourse(caller: Account, courseId: number): Course {
    const course = this.catalog.remove(caller, courseId);
    this.notifier.emit(caller, [
      {
        streamId: streams.course(course.id),
        type: ACADEMY_EVENTS.COURSE_REMOVED,
        source: "catalog",
        payload: { courseId: course.id },
      },
    ]);
    return course;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Enrollment
  // ───────────────────────────────────────────────────────────────────────

  applyToCourse(caller: Account, courseId: number): Enrollment {
    const enrollment = this.enrollments.apply(caller, courseId);
    this.notifier.emit(caller, [
      {
        streamId: streams.enrollment(courseId, caller),
        type: ACADEMY_EVENTS.APPLICATION_SUBMITTED,
        source: "enrollment",
        payload: { courseId, student: caller },
      },
    ]);
    return enrollment;
  }

  teacherVoteOnEnrollment(
    caller: Account,
    courseId: number,
    student: Account,
    support: boolean,
  ): Enrollment {
    const enrollment = this.enrollments.vote(caller, courseId, student, support);
    this.notifier.emit(caller, [
      {
        streamId: streams.enrollment(courseId, student),
        type: ACADEMY_EVENTS.ENROLLMENT_VOTE_RECORDED,
        source: "enrollment",
        payload: {
          courseId,
          student,
          teacher: caller,
          accept: support,
          status: enrollment.status,
        },
      },
    ]);
    return enrollment;
  }

  confirmEnrollment(caller: Account, courseId: number): Enrollment {
    const enrollment = this.enrollments.confirm(caller, courseId);
    const course = this.catalog.get(courseId);
    this.notifier.emit(caller, [
      {
        streamId: streams.enrollment(courseId, caller),
        type: ACADEMY_EVENTS.ENROLLMENT_CONFIRMED,
        source: "enrollment",
        payload: { courseId, student: caller, amount: course.price.toString() },
      },
    ]);
    return enrollment;
  }

  completeCourseAndDistribute(caller: Account, courseId: number, student: Account): SplitResult {
    const { split } = this.enrollments.complete(caller, courseId, student);
    this.notifier.emit(caller, [
      {
        streamId: streams.enrollment(courseId, student),
        type: ACADEMY_EVENTS.COURSE_COMPLETED,
        source: "enrollment",
        payload: { courseId, student, payouts: serializePayouts(split.payouts) },
      },
    ]);
    return split;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ratings & Treasury
  // ───────────────────────────────────────────────────────────────────────

  giveRating(caller: Account, courseId: number, teacher: Account, value: number): RatingResult {
    const result = this.ratings.rate(caller, courseId, teacher, value);
    this.notifier.emit(caller, [
      {
        streamId: streams.teacher(teacher),
        type: ACADEMY_EVENTS.RATING_GIVEN,
        source: "rating",
        payload: { courseId, student: caller, teacher, value },
      },
    ]);
    return result;
  }

  distributeBonusByRating(caller: Account, courseId: number, amount: Amount): SplitResult {
    const split = this.ratings.distributeBonus(caller, courseId, amount);
    this.notifier.emit(caller, [
      {
        streamId: streams.course(courseId),
        type: ACADEMY_EVENTS.BONUS_DISTRIBUTED,
        source: "treasury",
        payload: {
          courseId,
          amount: amount.toString(),
          distributed: split.totalDistributed.toString(),
          payouts: serializePayouts(split.payouts),
        },
      },
    ]);
    return split;
  }

  boardPayout(caller: Account, to: Account, amount: Amount): void {
    this.roles.requireRole(caller, "board");
    this.treasury.payOut(to, amount);
    this.notifier.emit(caller, [
      {
        streamId: streams.treasury(),
        type: ACADEMY_EVENTS.TREASURY_PAYOUT,
        source: "treasury",
        payload: { to, amount: amount.toString() },
      },
    ]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner administration
  // ───────────────────────────────────────────────────────────────────────

  setProposalDuration(caller: Account, seconds: number): void {
    this.requireOwner(caller);
    this.proposals.setDuration(seconds);
    this.notifier.emit(caller, [
      {
        streamId: streams.admin(),
        type: ACADEMY_EVENTS.PROPOSAL_DURATION_SET,
        source: "admin",
        payload: { seconds },
      },
    ]);
  }

  rescueFunds(caller: Account, asset: string, to: Account, amount: Amount): void {
    this.requireOwner(caller);
    this.treasury.rescue(asset, to, amount);
    this.notifier.emit(caller, [
      {
        streamId: streams.admin(),
        type: ACADEMY_EVENTS.FUNDS_RESCUED,
        source: "admin",
        payload: { asset, to, amount: amount.toString() },
      },
    ]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  roleOf(account: Account): Role {
    return this.roles.roleOf(account);
  }

  members(role: MemberRole): readonly Account[] {
    return this.roles.members(role);
  }

  getProposal(proposalId: number): Proposal {
    return this.proposals.get(proposalId);
  }

  proposalStatus(proposalId: number): ProposalStatus {
    return this.proposals.status(proposalId);
  }

  listProposals(): readonly Proposal[] {
    return this.proposals.list();
  }

  get proposalDurationSeconds(): number {
    return this.proposals.durationSeconds;
  }

  getCourse(courseId: number): Course {
    return this.catalog.get(courseId);
  }

  listCourses(options?: ListCoursesOptions): readonly Course[] {
    return this.catalog.list(options);
  }

  getEnrollment(courseId: number, student: Account): Enrollment | undefined {
    return this.enrollments.get(courseId, student);
  }

  listEnrollments(courseId: number): readonly Enrollment[] {
    return this.enrollments.list(courseId);
  }

  getRating(courseId: number, student: Account, teacher: Account): number {
    return this.ratings.getRating(courseId, student, teacher);
  }

  teacherRatingStats(teacher: Account): RatingStats {
    return this.ratings.stats(teacher);
  }

  averageRating(teacher: Account): number | null {
    return this.ratings.average(teacher);
  }

  bonusWeight(teacher: Account): bigint {
    return this.ratings.weightOf(teacher);
  }

  get treasuryAccount(): Account {
    return this.treasury.account;
  }

  treasuryBalance(): Amount {
    return this.treasury.balance();
  }

  paymentAsset(): { readonly asset: string; readonly decimals: number } {
    return { asset: this.treasury.asset, decimals: this.treasury.decimals };
  }

  rescuableAssets(): readonly string[] {
    return this.treasury.assets();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): AcademySnapshot {
    return {
      version: 1,
      owner: this.owner,
      treasuryAccount: this.treasury.account,
      roles: this.roles.snapshot(),
      proposals: this.proposals.snapshot(),
      courses: this.catalog.snapshot(),
      enrollments: this.enrollments.snapshot(),
      ratings: this.ratings.snapshot(),
    };
  }

  /**
   * Rebuild an academy from a snapshot. Ledgers are restored separately.
   */
  static fromSnapshot(snapshot: AcademySnapshot, deps: AcademyDependencies): Academy {
    if (snapshot.version !== 1) {
      throw new Error(`Unsupported academy snapshot version: ${String(snapshot.version)}`);
    }
    return new Academy(
      { ...deps, owner: snapshot.owner, treasuryAccount: snapshot.treasuryAccount },
      snapshot,
    );
  }

  private requireOwner(caller: Account): void {
    if (caller !== this.owner) {
      throw new AcademyError("NOT_OWNER", "Only the organization owner can do this");
    }
  }
}

function serializePayouts(payouts: readonly Payout[]): readonly { to: string; amount: string }[] {
  return payouts.map((p) => ({ to: p.to, amount: p.amount.toString() }));
}
