/**
 * ProposalEngine - time-boxed admission voting.
 *
 * Lifecycle: voting [start, end] → closed (now > end) → executed.
 *
 * Rules:
 * - Electorates are crossed: students vote on board admissions, teachers
 *   on student admissions, the board on teacher admissions
 * - One vote per account per proposal
 * - At most one active (unexecuted, window not yet passed) proposal per candidate
 * - Execution happens once, after the window; the role is granted only on a
 *   strict majority of at least one cast vote
 * - Proposals are never deleted
 */

import type { Account, Clock, MemberRole } from "@collegium/types";
import { isAccount, isMemberRole } from "@collegium/types";
import { AcademyError } from "./errors.js";
import type { RoleRegistry } from "./roles.js";
import type { Proposal, ProposalSnapshot, ProposalStatus } from "./types.js";

export const DEFAULT_PROPOSAL_DURATION_SECONDS = 180;

/**
 * The role whose members vote on admissions into each role.
 */
export const ELECTORATE: Readonly<Record<MemberRole, MemberRole>> = {
  board: "student",
  student: "teacher",
  teacher: "board",
};

interface ProposalRecord {
  readonly id: number;
  readonly candidate: Account;
  readonly role: MemberRole;
  readonly proposer: Account;
  votesFor: number;
  votesAgainst: number;
  readonly voters: Set<Account>;
  readonly start: number;
  readonly end: number;
  executed: boolean;
  approved: boolean | null;
}

export interface ExecutionResult {
  readonly proposal: Proposal;
  readonly approved: boolean;
}

export class ProposalEngine {
  private readonly _proposals = new Map<number, ProposalRecord>();
  /** Candidate → id of their most recent proposal */
  private readonly _latest = new Map<Account, number>();
  private _nextId = 1;
  private _durationSeconds: number;

  constructor(
    private readonly _roles: RoleRegistry,
    private readonly _clock: Clock,
    durationSeconds: number = DEFAULT_PROPOSAL_DURATION_SECONDS,
  ) {
    assertDuration(durationSeconds);
    this._durationSeconds = durationSeconds;
  }

  get durationSeconds(): number {
    return this._durationSeconds;
  }

  /**
   * Applies to proposals created afterwards.
   */
  setDuration(seconds: number): void {
    assertDuration(seconds);
    this._durationSeconds = seconds;
  }

  // ─── Commands ────────────────────────────────────────────────────────

  create(proposer: Account, candidate: Account, role: string): Proposal {
    if (!isAccount(candidate)) {
      throw new AcademyError("INVALID_CANDIDATE", `Invalid candidate: "${candidate}"`);
    }
    if (!isMemberRole(role)) {
      throw new AcademyError(
        "INVALID_ROLE",
        `Role must be one of board, teacher, student; got "${role}"`,
      );
    }

    const now = this._clock.now();
    const active = this.activeProposalFor(candidate);
    if (active !== undefined) {
      throw new AcademyError(
        "DUPLICATE_ACTIVE_PROPOSAL",
        `Candidate "${candidate}" already has active proposal #${active.id} (ends at ${active.end})`,
      );
    }
    if (this._roles.hasRole(candidate, role)) {
      throw new AcademyError(
        "ALREADY_HAS_ROLE",
        `Candidate "${candidate}" already holds the ${role} role`,
      );
    }

    const record: ProposalRecord = {
      id: this._nextId++,
      candidate,
      role,
      proposer,
      votesFor: 0,
      votesAgainst: 0,
      voters: new Set(),
      start: now,
      end: now + this._durationSeconds,
      executed: false,
      approved: null,
    };
    this._proposals.set(record.id, record);
    this._latest.set(candidate, record.id);
    return toView(record);
  }

  vote(voter: Account, id: number, support: boolean): Proposal {
    const record = this._require(id);
    const now = this._clock.now();

    if (now < record.start || now > record.end) {
      throw new AcademyError(
        "VOTING_CLOSED",
        `Voting on proposal #${id} is open from ${record.start} to ${record.end}; now is ${now}`,
      );
    }

    const electorate = ELECTORATE[record.role];
    if (!this._roles.hasRole(voter, electorate)) {
      throw new AcademyError(
        "NOT_IN_ELECTORATE",
        `Only ${electorate} members vote on ${record.role} admissions`,
      );
    }
    if (record.voters.has(voter)) {
      throw new AcademyError(
        "DUPLICATE_VOTE",
        `Account "${voter}" already voted on proposal #${id}`,
      );
    }

    record.voters.add(voter);
    if (support) {
      record.votesFor++;
    } else {
      record.votesAgainst++;
    }
    return toView(record);
  }

  /**
   * Resolve a closed proposal. Nothing changes if the grant is refused.
   */
  execute(id: number): ExecutionResult {
    const record = this._require(id);
    const now = this._clock.now();

    if (now <= record.end) {
      throw new AcademyError(
        "VOTING_STILL_OPEN",
        `Proposal #${id} can be executed after ${record.end}; now is ${now}`,
      );
    }
    if (record.executed) {
      throw new AcademyError("ALREADY_EXECUTED", `Proposal #${id} was already executed`);
    }

    const cast = record.votesFor + record.votesAgainst;
    const approved = cast > 0 && record.votesFor > record.votesAgainst;
    if (approved) {
      this._roles.grant(record.candidate, record.role);
    }

    record.executed = true;
    record.approved = approved;
    if (this._latest.get(record.candidate) === record.id) {
      this._latest.delete(record.candidate);
    }
    return { proposal: toView(record), approved };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get(id: number): Proposal {
    return toView(this._require(id));
  }

  /** In creation order */
  list(): readonly Proposal[] {
    return [...this._proposals.values()].map(toView);
  }

  /**
   * The candidate's unexecuted proposal whose window has not passed.
   */
  activeProposalFor(candidate: Account): Proposal | undefined {
    const id = this._latest.get(candidate);
    const record = id === undefined ? undefined : this._proposals.get(id);
    if (record === undefined || record.executed || this._clock.now() > record.end) {
      return undefined;
    }
    return toView(record);
  }

  status(id: number): ProposalStatus {
    const record = this._require(id);
    if (record.executed) return "executed";
    return this._clock.now() > record.end ? "closed" : "voting";
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): ProposalSnapshot {
    return {
      durationSeconds: this._durationSeconds,
      proposals: this.list(),
    };
  }

  static fromSnapshot(
    snapshot: ProposalSnapshot,
    roles: RoleRegistry,
    clock: Clock,
  ): ProposalEngine {
    const engine = new ProposalEngine(roles, clock, snapshot.durationSeconds);
    for (const p of snapshot.proposals) {
      engine._proposals.set(p.id, {
        ...p,
        voters: new Set(p.voters),
      });
      if (!p.executed) {
        engine._latest.set(p.candidate, p.id);
      }
      engine._nextId = Math.max(engine._nextId, p.id + 1);
    }
    return engine;
  }

  private _require(id: number): ProposalRecord {
    const record = this._proposals.get(id);
    if (record === undefined) {
      throw new AcademyError("PROPOSAL_NOT_FOUND", `Proposal #${id} does not exist`);
    }
    return record;
  }
}

function assertDuration(seconds: number): void {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new AcademyError(
      "INVALID_DURATION",
      `Proposal duration must be a positive whole number of seconds, got ${seconds}`,
    );
  }
}

function toView(record: ProposalRecord): Proposal {
  return {
    id: record.id,
    candidate: record.candidate,
    role: record.role,
    proposer: record.proposer,
    votesFor: record.votesFor,
    votesAgainst: record.votesAgainst,
    voters: [...record.voters],
    start: record.start,
    end: record.end,
    executed: record.executed,
    approved: record.approved,
  };
}
