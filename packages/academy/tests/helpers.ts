/**
 * Shared fixtures for academy tests.
 */

import type { Account, DomainEvent, MemberRole } from "@collegium/types";
import { TokenLedger } from "@collegium/ledger";
import { Academy } from "../src/academy.js";
import { ManualClock } from "../src/clock.js";
import { AcademyError } from "../src/errors.js";
import type { AcademyErrorCode } from "../src/errors.js";
import type { EventSink } from "../src/notifier.js";

export const OWNER = "owner";
export const TREASURY = "treasury";
export const BOARD = ["alice", "bob"] as const;
export const START = 1_000;
export const DURATION = 180;

export interface Published {
  readonly streamId: string;
  readonly event: DomainEvent;
}

export class RecordingSink implements EventSink {
  readonly published: Published[] = [];

  publish(streamId: string, event: DomainEvent): void {
    this.published.push({ streamId, event });
  }

  types(): string[] {
    return this.published.map((p) => p.event.type);
  }

  clear(): void {
    this.published.length = 0;
  }
}

export interface Fixture {
  readonly academy: Academy;
  readonly ledger: TokenLedger;
  readonly clock: ManualClock;
  readonly sink: RecordingSink;
}

export function createFixture(): Fixture {
  const ledger = new TokenLedger({ asset: "EDU", decimals: 18 });
  const clock = new ManualClock(START);
  const sink = new RecordingSink();
  let next = 0;
  const academy = new Academy({
    owner: OWNER,
    treasuryAccount: TREASURY,
    initialBoard: BOARD,
    ledger,
    clock,
    sink,
    newId: () => `id-${++next}`,
  });
  return { academy, ledger, clock, sink };
}

/**
 * Run a full admission: propose, let `voters` approve, close and execute.
 */
export function admit(
  fixture: Fixture,
  candidate: Account,
  role: MemberRole,
  voters: readonly Account[],
): void {
  const { academy, clock } = fixture;
  const proposal = academy.createAdmissionProposal(OWNER, candidate, role);
  for (const voter of voters) {
    academy.castVote(voter, proposal.id, true);
  }
  clock.advance(DURATION + 1);
  academy.executeProposal(OWNER, proposal.id);
}

/**
 * Board: alice, bob. Teachers: tom, tina, ted. Students: sam, sue.
 */
export function createSchool(): Fixture {
  const fixture = createFixture();
  for (const teacher of ["tom", "tina", "ted"]) {
    admit(fixture, teacher, "teacher", BOARD);
  }
  for (const student of ["sam", "sue"]) {
    admit(fixture, student, "student", ["tom"]);
  }
  fixture.sink.clear();
  return fixture;
}

/**
 * Apply, let every listed teacher accept, approve and pay.
 */
export function enroll(fixture: Fixture, courseId: number, student: Account): void {
  const { academy, ledger } = fixture;
  const course = academy.getCourse(courseId);
  academy.applyToCourse(student, courseId);
  for (const teacher of course.teachers) {
    academy.teacherVoteOnEnrollment(teacher, courseId, student, true);
  }
  if (ledger.balanceOf(student) < course.price) {
    ledger.mint(student, course.price - ledger.balanceOf(student));
  }
  ledger.approve(student, TREASURY, course.price);
  academy.confirmEnrollment(student, courseId);
}

export function codeOf(fn: () => unknown): AcademyErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof AcademyError) return err.code;
    throw err;
  }
  return undefined;
}
