/**
 * Terminal walkthrough of a whole school year, run on the domain
 * packages directly (no HTTP server):
 * found board -> admissions -> course -> application -> committee vote ->
 * payment -> completion payout -> ratings -> bonus -> event log
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { Academy, ManualClock } from "@collegium/academy";
import type { SplitResult } from "@collegium/academy";
import { TokenLedger } from "@collegium/ledger";
import { InMemoryEventStore, createAcademyCatalog } from "@collegium/event-store";
import type { Account, MemberRole } from "@collegium/types";

// =============================================================================
// Options & Result
// =============================================================================

export interface WalkthroughOptions {
  /** Pause between steps. Default: 600 */
  readonly delayMs?: number;
  /** Default: console.log */
  readonly write?: (line: string) => void;
  /** Default: chalk with auto-detected color support */
  readonly chalk?: ChalkInstance;
}

export interface WalkthroughSummary {
  readonly events: number;
  readonly chainValid: boolean;
  readonly treasury: bigint;
  readonly balances: Readonly<Record<Account, bigint>>;
  readonly completion: SplitResult;
  readonly bonus: SplitResult;
}

const TOTAL_STEPS = 9;
const ASSET = "EDU";
const OWNER = "dean";
const TREASURY = "collegium:treasury";
const DURATION = 180;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Output
// =============================================================================

class Printer {
  constructor(
    readonly c: ChalkInstance,
    readonly write: (line: string) => void,
  ) {}

  banner(): void {
    const c = this.c;
    this.write("");
    this.write(c.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
    this.write(c.cyan.bold("  ║") + c.white.bold("                    COLLEGIUM DEMO                        ") + c.cyan.bold("║"));
    this.write(c.cyan.bold("  ║") + c.gray("        A school run by its board, teachers and students  ") + c.cyan.bold("║"));
    this.write(c.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
    this.write("");
  }

  step(step: number, title: string): void {
    const prefix = this.c.cyan.bold(`  Step ${step}/${TOTAL_STEPS}`);
    const line = this.c.gray("─".repeat(Math.max(2, 50 - title.length)));
    this.write(`\n${prefix}  ${this.c.white.bold(title)}  ${line}`);
  }

  ok(msg: string): void {
    this.write(this.c.green("    ✓ ") + this.c.white(msg));
  }

  info(label: string, value: string): void {
    this.write(this.c.gray("    → ") + this.c.gray(label.padEnd(16)) + this.c.white(value));
  }

  warn(msg: string): void {
    this.write(this.c.yellow("    ! ") + this.c.yellow(msg));
  }

  payouts(split: SplitResult): void {
    for (const payout of split.payouts) {
      this.info(payout.to, `${payout.amount} ${ASSET}`);
    }
    this.info("remainder", `${split.remainder} ${ASSET} stays in the treasury`);
  }
}

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions = {}): Promise<WalkthroughSummary> {
  const delayMs = options.delayMs ?? 600;
  const out = new Printer(options.chalk ?? chalk, options.write ?? ((line) => console.log(line)));
  const pause = (): Promise<void> => sleep(delayMs);

  out.banner();
  out.write("  Walk-through of one course, from admissions to the teachers' bonus.");

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  out.step(1, "Found the school");

  const clock = new ManualClock(0);
  const ledger = new TokenLedger({ asset: ASSET, decimals: 0 });
  const eventStore = new InMemoryEventStore({ catalog: createAcademyCatalog() });
  const academy = new Academy({
    owner: OWNER,
    treasuryAccount: TREASURY,
    initialBoard: ["alice", "bob"],
    proposalDurationSeconds: DURATION,
    ledger,
    clock,
    sink: {
      publish: (streamId, event) => {
        eventStore.append(streamId, [event]);
      },
    },
  });

  out.ok(`Board founded: ${academy.members("board").join(", ")}`);
  out.info("owner", OWNER);
  out.info("treasury", `${TREASURY} (${ASSET})`);
  out.info("voting window", `${DURATION}s`);

  await pause();

  // ─── Step 2: Admissions ─────────────────────────────────────────────

  out.step(2, "Admissions");

  const admit = (candidate: Account, role: MemberRole, voters: readonly Account[]): void => {
    const proposal = academy.createAdmissionProposal(OWNER, candidate, role);
    for (const voter of voters) {
      academy.castVote(voter, proposal.id, true);
    }
    clock.advance(DURATION + 1);
    const result = academy.executeProposal(OWNER, proposal.id);
    if (result.approved) {
      out.ok(`${candidate} admitted as ${role} (voted by ${voters.join(", ")})`);
    } else {
      out.warn(`${candidate} was not admitted`);
    }
  };

  for (const teacher of ["tom", "tina", "ted"]) {
    admit(teacher, "teacher", ["alice", "bob"]);
  }
  admit("sam", "student", ["tom"]);
  admit("carol", "board", ["sam"]);
  out.info("electorates", "board admits teachers, teachers admit students, students admit board");

  await pause();

  // ─── Step 3: Course ─────────────────────────────────────────────────

  out.step(3, "Publish a course");

  const course = academy.createCourse("tom", {
    title: "Distributed Systems",
    price: 999n,
    teachers: ["tom", "tina", "ted"],
    shares: [3333, 3333, 3334],
  });
  out.ok(`Course #${course.id} "${course.title}"`);
  out.info("price", `${course.price} ${ASSET}`);
  out.info("shares", course.teachers.map((t, i) => `${t} ${course.shares[i] ?? 0}`).join(", "));

  await pause();

  // ─── Step 4: Application ────────────────────────────────────────────

  out.step(4, "Apply and vote");

  academy.applyToCourse("sam", course.id);
  out.ok("sam applied");
  academy.teacherVoteOnEnrollment("tom", course.id, "sam", true);
  academy.teacherVoteOnEnrollment("tina", course.id, "sam", true);
  const decided = academy.teacherVoteOnEnrollment("ted", course.id, "sam", false);
  out.info("committee", `${decided.votesFor} for, ${decided.votesAgainst} against`);
  out.ok(`Application ${decided.status}`);

  await pause();

  // ─── Step 5: Payment ────────────────────────────────────────────────

  out.step(5, "Pay and enroll");

  ledger.mint("sam", course.price);
  ledger.approve("sam", TREASURY, course.price);
  out.info("allowance", `${ledger.allowance("sam", TREASURY)} ${ASSET} to the treasury`);
  const enrolled = academy.confirmEnrollment("sam", course.id);
  out.ok(`sam ${enrolled.status}; treasury holds ${academy.treasuryBalance()} ${ASSET}`);

  await pause();

  // ─── Step 6: Completion ─────────────────────────────────────────────

  out.step(6, "Complete the course");

  const completion = academy.completeCourseAndDistribute("carol", course.id, "sam");
  out.ok(`carol signed off; ${completion.totalDistributed} ${ASSET} paid by share`);
  out.payouts(completion);

  await pause();

  // ─── Step 7: Ratings ────────────────────────────────────────────────

  out.step(7, "Rate the teachers");

  academy.giveRating("sam", course.id, "tom", 5);
  academy.giveRating("sam", course.id, "tina", 3);
  for (const teacher of course.teachers) {
    const average = academy.averageRating(teacher);
    out.info(
      teacher,
      `average ${average === null ? "none" : String(average)}, weight ${academy.bonusWeight(teacher)}`,
    );
  }

  await pause();

  // ─── Step 8: Bonus ──────────────────────────────────────────────────

  out.step(8, "Bonus by rating");

  ledger.mint(TREASURY, 1000n);
  out.info("donation", `1000 ${ASSET} into the treasury`);
  const bonus = academy.distributeBonusByRating("alice", course.id, 900n);
  out.ok(`alice paid a ${bonus.totalDistributed} ${ASSET} bonus`);
  out.payouts(bonus);

  await pause();

  // ─── Step 9: Event Log ──────────────────────────────────────────────

  out.step(9, "Event log");

  for (const streamId of eventStore.listStreams()) {
    out.info(streamId, `${eventStore.streamVersion(streamId)} events`);
  }
  const integrity = eventStore.verifyIntegrity();
  const events = eventStore.globalPosition();
  if (integrity.valid) {
    out.ok(`Hash chain intact (${events} events)`);
  } else {
    out.warn(`Hash chain broken: ${integrity.errors.length} errors`);
  }

  const balances: Record<Account, bigint> = {};
  for (const account of ["tom", "tina", "ted", "sam"]) {
    balances[account] = ledger.balanceOf(account);
  }

  out.write("");
  out.write(out.c.gray("    Every step above was authorized by a role and left an event."));
  out.write("");

  return {
    events,
    chainValid: integrity.valid,
    treasury: academy.treasuryBalance(),
    balances,
    completion,
    bonus,
  };
}
