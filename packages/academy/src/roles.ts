/**
 * RoleRegistry - which account holds which membership role.
 *
 * Rules:
 * - An account holds at most one role
 * - Membership is append-only: there is no removal path
 * - Members are listed in the order they were admitted
 */

import type { Account, MemberRole, Role } from "@collegium/types";
import { isAccount, MEMBER_ROLES } from "@collegium/types";
import { AcademyError } from "./errors.js";
import type { RoleSnapshot } from "./types.js";

export class RoleRegistry {
  private readonly _roles = new Map<Account, MemberRole>();
  private readonly _members: Record<MemberRole, Account[]> = {
    board: [],
    teacher: [],
    student: [],
  };

  /**
   * Seed the founding board. Repeated accounts are admitted once.
   *
   * @throws AcademyError INVALID_ACCOUNT on the zero account or a blank id
   */
  constructor(initialBoard: readonly Account[] = []) {
    for (const account of initialBoard) {
      if (!isAccount(account)) {
        throw new AcademyError("INVALID_ACCOUNT", `Invalid board member: "${account}"`);
      }
      if (!this._roles.has(account)) {
        this._add(account, "board");
      }
    }
  }

  roleOf(account: Account): Role {
    return this._roles.get(account) ?? "none";
  }

  hasRole(account: Account, role: MemberRole): boolean {
    return this._roles.get(account) === role;
  }

  members(role: MemberRole): readonly Account[] {
    return [...this._members[role]];
  }

  /**
   * Admit `account` into `role`. Called only when an admission proposal passes.
   *
   * @throws AcademyError ALREADY_IN_ROLE if the account holds any role
   */
  grant(account: Account, role: MemberRole): void {
    const current = this._roles.get(account);
    if (current !== undefined) {
      throw new AcademyError(
        "ALREADY_IN_ROLE",
        `Account "${account}" already holds the ${current} role`,
      );
    }
    this._add(account, role);
  }

  /**
   * @throws AcademyError ROLE_REQUIRED unless `account` holds `role`
   */
  requireRole(account: Account, role: MemberRole): void {
    if (!this.hasRole(account, role)) {
      throw new AcademyError(
        "ROLE_REQUIRED",
        `Account "${account}" must hold the ${role} role`,
      );
    }
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): RoleSnapshot {
    return {
      board: this.members("board"),
      teacher: this.members("teacher"),
      student: this.members("student"),
    };
  }

  static fromSnapshot(snapshot: RoleSnapshot): RoleRegistry {
    const registry = new RoleRegistry();
    for (const role of MEMBER_ROLES) {
      for (const account of snapshot[role]) {
        registry.grant(account, role);
      }
    }
    return registry;
  }

  private _add(account: Account, role: MemberRole): void {
    this._roles.set(account, role);
    this._members[role].push(account);
  }
}
