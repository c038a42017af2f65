/**
 * Tests for RoleRegistry.
 */

import { describe, it, expect } from "vitest";
import { ZERO_ACCOUNT } from "@collegium/types";
import { RoleRegistry } from "../src/roles.js";
import { codeOf } from "./helpers.js";

describe("RoleRegistry", () => {
  it("seeds the founding board once per account", () => {
    const roles = new RoleRegistry(["alice", "bob", "alice"]);

    expect(roles.members("board")).toEqual(["alice", "bob"]);
    expect(roles.roleOf("alice")).toBe("board");
    expect(roles.roleOf("carol")).toBe("none");
  });

  it("rejects the zero account as a board member", () => {
    expect(codeOf(() => new RoleRegistry([ZERO_ACCOUNT]))).toBe("INVALID_ACCOUNT");
  });

  it("grants a role to an account without one", () => {
    const roles = new RoleRegistry();
    roles.grant("tom", "teacher");
    roles.grant("sam", "student");

    expect(roles.members("teacher")).toEqual(["tom"]);
    expect(roles.hasRole("sam", "student")).toBe(true);
    expect(roles.hasRole("sam", "teacher")).toBe(false);
  });

  it("keeps roles exclusive", () => {
    const roles = new RoleRegistry(["alice"]);

    expect(codeOf(() => roles.grant("alice", "teacher"))).toBe("ALREADY_IN_ROLE");
    expect(codeOf(() => roles.grant("alice", "board"))).toBe("ALREADY_IN_ROLE");
    expect(roles.members("teacher")).toEqual([]);
  });

  it("requires a role", () => {
    const roles = new RoleRegistry(["alice"]);

    expect(() => roles.requireRole("alice", "board")).not.toThrow();
    expect(codeOf(() => roles.requireRole("alice", "student"))).toBe("ROLE_REQUIRED");
  });

  it("returns copies of member lists", () => {
    const roles = new RoleRegistry(["alice"]);
    const board = roles.members("board");
    roles.grant("tom", "teacher");

    expect(board).toEqual(["alice"]);
  });

  it("round-trips through a snapshot", () => {
    const roles = new RoleRegistry(["alice"]);
    roles.grant("tom", "teacher");
    roles.grant("sam", "student");

    const restored = RoleRegistry.fromSnapshot(JSON.parse(JSON.stringify(roles.snapshot())));

    expect(restored.snapshot()).toEqual({ board: ["alice"], teacher: ["tom"], student: ["sam"] });
  });
});
