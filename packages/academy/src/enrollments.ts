/**
 * EnrollmentWorkflow - per (course, student) admission and payment.
 *
 * Lifecycle: applied → accepted | rejected → enrolled → completed
 *
 * Rules:
 * - Every teacher of the course votes once per application
 * - The decision is taken when the last teacher votes: strict majority
 *   accepts, a tie rejects
 * - Only a rejected application may be reopened; reopening resets the votes
 * - Enrollment is paid: the course price moves to the treasury before the
 *   request is marked enrolled
 * - Completion pays each teacher floor(price * share / 10000) once
 */

import type { Account } from "@collegium/types";
import type { CourseCatalog } from "./courses.js";
import { splitByBasisPoints } from "./distribution.js";
import { AcademyError } from "./errors.js";
import type { RoleRegistry } from "./roles.js";
import type { Treasury } from "./treasury.js";
import type {
  Course,
  Enrollment,
  EnrollmentRecordSnapshot,
  EnrollmentStatus,
  SplitResult,
} from "./types.js";

interface EnrollmentRecord {
  readonly courseId: number;
  readonly student: Account;
  votesFor: number;
  votesAgainst: number;
  readonly teacherVoters: Set<Account>;
  decided: boolean;
  acceptedByTeachers: boolean;
  enrolled: boolean;
  completed: boolean;
}

export interface EnrollmentAuthority {
  readonly owner: Account;
}

export interface CompletionResult {
  readonly enrollment: Enrollment;
  readonly split: SplitResult;
}

export class EnrollmentWorkflow {
  private readonly _requests = new Map<string, EnrollmentRecord>();

  constructor(
    private readonly _roles: RoleRegistry,
    private readonly _catalog: CourseCatalog,
    private readonly _treasury: Treasury,
    private readonly _authority: EnrollmentAuthority,
  ) {}

  // ─── Commands ────────────────────────────────────────────────────────

  apply(student: Account, courseId: number): Enrollment {
    this._roles.requireRole(student, "student");
    this._catalog.get(courseId);

    const existing = this._requests.get(keyOf(courseId, student));
    if (existing !== undefined) {
      const rejected = existing.decided && !existing.acceptedByTeachers && !existing.enrolled;
      if (!rejected) {
        throw new AcademyError(
          "ALREADY_ACTIVE",
          `"${student}" already has a ${statusOf(existing)} application for course #${courseId}`,
        );
      }
      existing.votesFor = 0;
      existing.votesAgainst = 0;
      existing.teacherVoters.clear();
      existing.decided = false;
      return toView(existing);
    }

    const record: EnrollmentRecord = {
      courseId,
      student,
      votesFor: 0,
      votesAgainst: 0,
      teacherVoters: new Set(),
      decided: false,
      acceptedByTeachers: false,
      enrolled: false,
      completed: false,
    };
    this._requests.set(keyOf(courseId, student), record);
    return toView(record);
  }

  vote(teacher: Account, courseId: number, student: Account, support: boolean): Enrollment {
    const course = this._catalog.get(courseId);
    if (!this._roles.hasRole(teacher, "teacher") || !course.teachers.includes(teacher)) {
      throw new AcademyError(
        "NOT_COURSE_TEACHER",
        `"${teacher}" does not teach course #${courseId}`,
      );
    }

    const record = this._requests.get(keyOf(courseId, student));
    if (record === undefined) {
      throw new AcademyError(
        "NO_APPLICATION",
        `"${student}" has not applied to course #${courseId}`,
      );
    }
    if (record.enrolled) {
      throw new AcademyError(
        "ALREADY_ENROLLED",
        `"${student}" is already enrolled in course #${courseId}`,
      );
    }
    if (record.teacherVoters.has(teacher)) {
      throw new AcademyError(
        "DUPLICATE_VOTE",
        `"${teacher}" already voted on this application`,
      );
    }

    record.teacherVoters.add(teacher);
    if (support) {
      record.votesFor++;
    } else {
      record.votesAgainst++;
    }

    if (record.teacherVoters.size === course.teachers.length) {
      record.decided = true;
      record.acceptedByTeachers = record.votesFor > record.votesAgainst;
    }
    return toView(record);
  }

  /**
   * Pay the course price and enroll. Nothing changes if the payment fails.
   */
  confirm(student: Account, courseId: number): Enrollment {
    this._roles.requireRole(student, "student");
    const course = this._catalog.get(courseId);

    const record = this._requests.get(keyOf(courseId, student));
    if (record === undefined || record.enrolled || !record.acceptedByTeachers) {
      throw new AcademyError(
        "NOT_PENDING_OR_NOT_ACCEPTED",
        `"${student}" has no accepted, unpaid application for course #${courseId}`,
      );
    }
    if (course.price === 0n) {
      throw new AcademyError(
        "ZERO_PRICE_COURSE",
        `Course #${courseId} is free; there is nothing to pay`,
      );
    }

    this._treasury.collect(student, course.price);
    record.enrolled = true;
    return toView(record);
  }

  /**
   * Pay the course's teachers their shares of the price.
   * Also allowed after the course was removed.
   */
  complete(caller: Account, courseId: number, student: Account): CompletionResult {
    const course = this._catalog.find(courseId);
    if (course === undefined) {
      throw new AcademyError("COURSE_NOT_FOUND", `Course #${courseId} does not exist`);
    }
    if (!this._mayComplete(caller, course)) {
      throw new AcademyError(
        "NOT_AUTHORIZED",
        `Only the board, the owner or the course's teachers can complete course #${courseId}`,
      );
    }

    const record = this._requests.get(keyOf(courseId, student));
    if (record === undefined || !record.enrolled) {
      throw new AcademyError(
        "STUDENT_NOT_ENROLLED",
        `"${student}" is not enrolled in course #${courseId}`,
      );
    }
    if (record.completed) {
      throw new AcademyError(
        "ALREADY_COMPLETED",
        `"${student}" already completed course #${courseId}; teachers were paid`,
      );
    }

    this._treasury.assertCovers(course.price);
    const split = splitByBasisPoints(
      course.price,
      course.teachers.map((to, i) => ({ to, share: course.shares[i] ?? 0 })),
    );
    this._treasury.distribute(split.payouts);

    record.completed = true;
    return { enrollment: toView(record), split };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get(courseId: number, student: Account): Enrollment | undefined {
    const record = this._requests.get(keyOf(courseId, student));
    return record === undefined ? undefined : toView(record);
  }

  list(courseId: number): readonly Enrollment[] {
    return [...this._requests.values()]
      .filter((r) => r.courseId === courseId)
      .map(toView);
  }

  /** True once paid, including after completion */
  isEnrolled(courseId: number, student: Account): boolean {
    return this._requests.get(keyOf(courseId, student))?.enrolled === true;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): readonly EnrollmentRecordSnapshot[] {
    return [...this._requests.values()].map((r) => ({
      courseId: r.courseId,
      student: r.student,
      votesFor: r.votesFor,
      votesAgainst: r.votesAgainst,
      teacherVoters: [...r.teacherVoters],
      decided: r.decided,
      acceptedByTeachers: r.acceptedByTeachers,
      enrolled: r.enrolled,
      completed: r.completed,
    }));
  }

  static fromSnapshot(
    snapshot: readonly EnrollmentRecordSnapshot[],
    roles: RoleRegistry,
    catalog: CourseCatalog,
    treasury: Treasury,
    authority: EnrollmentAuthority,
  ): EnrollmentWorkflow {
    const workflow = new EnrollmentWorkflow(roles, catalog, treasury, authority);
    for (const r of snapshot) {
      workflow._requests.set(keyOf(r.courseId, r.student), {
        ...r,
        teacherVoters: new Set(r.teacherVoters),
      });
    }
    return workflow;
  }

  private _mayComplete(caller: Account, course: Course): boolean {
    return (
      caller === this._authority.owner ||
      this._roles.hasRole(caller, "board") ||
      course.teachers.includes(caller)
    );
  }
}

function keyOf(courseId: number, student: Account): string {
  return `${courseId}:${student}`;
}

function statusOf(record: EnrollmentRecord): EnrollmentStatus {
  if (record.completed) return "completed";
  if (record.enrolled) return "enrolled";
  if (!record.decided) return "applied";
  return record.acceptedByTeachers ? "accepted" : "rejected";
}

function toView(record: EnrollmentRecord): Enrollment {
  return {
    courseId: record.courseId,
    student: record.student,
    status: statusOf(record),
    votesFor: record.votesFor,
    votesAgainst: record.votesAgainst,
    teacherVoters: [...record.teacherVoters],
    acceptedByTeachers: record.acceptedByTeachers,
    enrolled: record.enrolled,
    completed: record.completed,
  };
}
