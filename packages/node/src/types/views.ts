/**
 * JSON views of academy values. Amounts leave as decimal strings.
 */

import type { Course, SplitResult } from "@collegium/academy";

export interface CourseView extends Omit<Course, "price"> {
  readonly price: string;
}

export interface PayoutView {
  readonly to: string;
  readonly amount: string;
}

export interface SplitView {
  readonly payouts: readonly PayoutView[];
  readonly totalDistributed: string;
  readonly remainder: string;
}

export function toCourseView(course: Course): CourseView {
  return { ...course, price: course.price.toString() };
}

export function toSplitView(split: SplitResult): SplitView {
  return {
    payouts: split.payouts.map((p) => ({ to: p.to, amount: p.amount.toString() })),
    totalDistributed: split.totalDistributed.toString(),
    remainder: split.remainder.toString(),
  };
}
