/**
 * RatingLedger - teacher ratings and the rating-weighted bonus.
 *
 * Rules:
 * - Only students enrolled in a course rate its teachers, 1 to 5
 * - A re-rating replaces the previous value: the teacher's sum moves by the
 *   difference and the count stays
 * - Bonus weight is floor(sum * 100 / count), or 100 for an unrated teacher
 * - Bonus payouts are floored per teacher; the remainder stays in the treasury
 */

import type { Account, Amount } from "@collegium/types";
import type { CourseCatalog } from "./courses.js";
import { splitByWeights } from "./distribution.js";
import type { EnrollmentWorkflow } from "./enrollments.js";
import { AcademyError } from "./errors.js";
import type { RoleRegistry } from "./roles.js";
import type { Treasury } from "./treasury.js";
import type { RatingEntrySnapshot, RatingResult, RatingStats, SplitResult } from "./types.js";

export const MIN_RATING = 1;
export const MAX_RATING = 5;

/** Weight of a teacher nobody has rated yet */
export const DEFAULT_BONUS_WEIGHT = 100n;

export class RatingLedger {
  /** "<course>:<student>:<teacher>" → rating */
  private readonly _ratings = new Map<string, RatingEntrySnapshot>();
  private readonly _stats = new Map<Account, { sum: number; count: number }>();

  constructor(
    private readonly _roles: RoleRegistry,
    private readonly _catalog: CourseCatalog,
    private readonly _enrollments: EnrollmentWorkflow,
    private readonly _treasury: Treasury,
  ) {}

  // ─── Commands ────────────────────────────────────────────────────────

  rate(student: Account, courseId: number, teacher: Account, value: number): RatingResult {
    this._roles.requireRole(student, "student");
    if (!Number.isInteger(value) || value < MIN_RATING || value > MAX_RATING) {
      throw new AcademyError(
        "INVALID_RATING_VALUE",
        `Rating must be a whole number from ${MIN_RATING} to ${MAX_RATING}, got ${value}`,
      );
    }
    const course = this._catalog.get(courseId);
    if (!this._enrollments.isEnrolled(courseId, student)) {
      throw new AcademyError(
        "STUDENT_NOT_ENROLLED",
        `"${student}" is not enrolled in course #${courseId}`,
      );
    }
    if (!course.teachers.includes(teacher)) {
      throw new AcademyError(
        "TEACHER_NOT_IN_COURSE",
        `"${teacher}" does not teach course #${courseId}`,
      );
    }

    const key = `${courseId}:${student}:${teacher}`;
    const previous = this._ratings.get(key)?.value ?? 0;
    const stats = this._statsOf(teacher);
    if (previous === 0) {
      stats.count++;
      stats.sum += value;
    } else {
      stats.sum += value - previous;
    }
    this._ratings.set(key, { courseId, student, teacher, value });

    return { courseId, student, teacher, previous, value, stats: { ...stats } };
  }

  /**
   * Pay `amount` from the treasury to the course's teachers by rating weight.
   */
  distributeBonus(caller: Account, courseId: number, amount: Amount): SplitResult {
    this._roles.requireRole(caller, "board");
    const course = this._catalog.get(courseId);
    if (amount < 0n) {
      throw new AcademyError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
    }
    if (amount === 0n) {
      throw new AcademyError("ZERO_AMOUNT", "Bonus amount must be greater than zero");
    }
    this._treasury.assertCovers(amount);

    const split = splitByWeights(
      amount,
      course.teachers.map((to) => ({ to, weight: this.weightOf(to) })),
    );
    this._treasury.distribute(split.payouts);
    return split;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** 0 when unset */
  getRating(courseId: number, student: Account, teacher: Account): number {
    return this._ratings.get(`${courseId}:${student}:${teacher}`)?.value ?? 0;
  }

  stats(teacher: Account): RatingStats {
    const stats = this._stats.get(teacher);
    return stats === undefined ? { sum: 0, count: 0 } : { ...stats };
  }

  /** null for an unrated teacher */
  average(teacher: Account): number | null {
    const { sum, count } = this.stats(teacher);
    return count === 0 ? null : sum / count;
  }

  weightOf(teacher: Account): bigint {
    const { sum, count } = this.stats(teacher);
    return count === 0 ? DEFAULT_BONUS_WEIGHT : (BigInt(sum) * 100n) / BigInt(count);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): readonly RatingEntrySnapshot[] {
    return [...this._ratings.values()];
  }

  /**
   * Aggregates are rebuilt from the individual ratings.
   */
  static fromSnapshot(
    snapshot: readonly RatingEntrySnapshot[],
    roles: RoleRegistry,
    catalog: CourseCatalog,
    enrollments: EnrollmentWorkflow,
    treasury: Treasury,
  ): RatingLedger {
    const ledger = new RatingLedger(roles, catalog, enrollments, treasury);
    for (const entry of snapshot) {
      ledger._ratings.set(`${entry.courseId}:${entry.student}:${entry.teacher}`, { ...entry });
      const stats = ledger._statsOf(entry.teacher);
      stats.count++;
      stats.sum += entry.value;
    }
    return ledger;
  }

  private _statsOf(teacher: Account): { sum: number; count: number } {
    let stats = this._stats.get(teacher);
    if (stats === undefined) {
      stats = { sum: 0, count: 0 };
      this._stats.set(teacher, stats);
    }
    return stats;
  }
}
