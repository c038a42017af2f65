/**
 * CourseCatalog - paid courses and their revenue shares.
 *
 * Rules:
 * - Only teachers publish courses; every listed teacher must hold the role
 * - Shares are whole basis points aligned with the teacher list, summing to 10000
 * - Removal is a soft delete: teachers, shares and price are kept
 * - Removed courses are invisible to new activity
 */

import type { Account } from "@collegium/types";
import { TOTAL_BASIS_POINTS } from "@collegium/types";
import { AcademyError } from "./errors.js";
import type { RoleRegistry } from "./roles.js";
import type { Course, CourseInput, CourseRecordSnapshot } from "./types.js";

interface CourseRecord {
  readonly id: number;
  readonly title: string;
  readonly price: bigint;
  readonly teachers: readonly Account[];
  readonly shares: readonly number[];
  readonly creator: Account;
  exists: boolean;
}

export interface ListCoursesOptions {
  readonly includeRemoved?: boolean;
}

export class CourseCatalog {
  private readonly _courses = new Map<number, CourseRecord>();
  private _nextId = 1;

  constructor(private readonly _roles: RoleRegistry) {}

  // ─── Commands ────────────────────────────────────────────────────────

  create(caller: Account, input: CourseInput): Course {
    this._roles.requireRole(caller, "teacher");

    const { teachers, shares, price } = input;
    if (teachers.length === 0) {
      throw new AcademyError("EMPTY_TEACHER_LIST", "A course needs at least one teacher");
    }
    if (teachers.length !== shares.length) {
      throw new AcademyError(
        "LENGTH_MISMATCH",
        `${teachers.length} teachers but ${shares.length} shares`,
      );
    }
    if (price < 0n) {
      throw new AcademyError(
        "INVALID_AMOUNT",
        `Price must be non-negative, got ${price.toString()}`,
      );
    }
    for (const share of shares) {
      if (!Number.isInteger(share) || share < 0) {
        throw new AcademyError(
          "INVALID_SHARE",
          `Shares must be non-negative whole basis points, got ${share}`,
        );
      }
    }
    if (new Set(teachers).size !== teachers.length) {
      throw new AcademyError("DUPLICATE_TEACHER", "A teacher is listed more than once");
    }

    const total = shares.reduce((sum, share) => sum + share, 0);
    if (total !== TOTAL_BASIS_POINTS) {
      throw new AcademyError(
        "SHARES_MUST_SUM_TO_10000",
        `Shares must sum to ${TOTAL_BASIS_POINTS} basis points, got ${total}`,
      );
    }

    for (const teacher of teachers) {
      if (!this._roles.hasRole(teacher, "teacher")) {
        throw new AcademyError(
          "UNREGISTERED_TEACHER",
          `"${teacher}" does not hold the teacher role`,
        );
      }
    }

    const record: CourseRecord = {
      id: this._nextId++,
      title: input.title,
      price,
      teachers: [...teachers],
      shares: [...shares],
      creator: caller,
      exists: true,
    };
    this._courses.set(record.id, record);
    return toView(record);
  }

  /**
   * Soft-delete. Allowed for the course's teachers and the board.
   */
  remove(caller: Account, id: number): Course {
    const record = this._requireActive(id);

    const isCourseTeacher = record.teachers.includes(caller);
    if (!isCourseTeacher && !this._roles.hasRole(caller, "board")) {
      throw new AcademyError(
        "NOT_AUTHORIZED",
        `Only the course's teachers or the board can remove course #${id}`,
      );
    }

    record.exists = false;
    return toView(record);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * @throws AcademyError COURSE_NOT_FOUND if absent or removed
   */
  get(id: number): Course {
    return toView(this._requireActive(id));
  }

  /**
   * Like `get`, but also returns removed courses.
   */
  find(id: number): Course | undefined {
    const record = this._courses.get(id);
    return record === undefined ? undefined : toView(record);
  }

  list(options: ListCoursesOptions = {}): readonly Course[] {
    return [...this._courses.values()]
      .filter((c) => c.exists || options.includeRemoved === true)
      .map(toView);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): readonly CourseRecordSnapshot[] {
    return [...this._courses.values()].map((c) => ({
      id: c.id,
      title: c.title,
      price: c.price.toString(),
      teachers: [...c.teachers],
      shares: [...c.shares],
      creator: c.creator,
      exists: c.exists,
    }));
  }

  static fromSnapshot(
    snapshot: readonly CourseRecordSnapshot[],
    roles: RoleRegistry,
  ): CourseCatalog {
    const catalog = new CourseCatalog(roles);
    for (const c of snapshot) {
      catalog._courses.set(c.id, { ...c, price: BigInt(c.price) });
      catalog._nextId = Math.max(catalog._nextId, c.id + 1);
    }
    return catalog;
  }

  private _requireActive(id: number): CourseRecord {
    const record = this._courses.get(id);
    if (record === undefined || !record.exists) {
      throw new AcademyError("COURSE_NOT_FOUND", `Course #${id} does not exist`);
    }
    return record;
  }
}

function toView(record: CourseRecord): Course {
  return {
    id: record.id,
    title: record.title,
    price: record.price,
    teachers: [...record.teachers],
    shares: [...record.shares],
    creator: record.creator,
    exists: record.exists,
  };
}
