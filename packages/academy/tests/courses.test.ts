/**
 * Tests for CourseCatalog.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CourseCatalog } from "../src/courses.js";
import { RoleRegistry } from "../src/roles.js";
import type { CourseInput } from "../src/types.js";
import { codeOf } from "./helpers.js";

const input = (overrides: Partial<CourseInput> = {}): CourseInput => ({
  title: "Algebra I",
  price: 1_000n,
  teachers: ["tom", "tina", "ted"],
  shares: [4000, 3000, 3000],
  ...overrides,
});

describe("CourseCatalog", () => {
  let roles: RoleRegistry;
  let catalog: CourseCatalog;

  beforeEach(() => {
    roles = new RoleRegistry(["alice"]);
    for (const teacher of ["tom", "tina", "ted"]) roles.grant(teacher, "teacher");
    roles.grant("sam", "student");
    catalog = new CourseCatalog(roles);
  });

  describe("create", () => {
    it("creates a course with shares summing to 10000", () => {
      const course = catalog.create("tom", input());

      expect(course).toEqual({
        id: 1,
        title: "Algebra I",
        price: 1_000n,
        teachers: ["tom", "tina", "ted"],
        shares: [4000, 3000, 3000],
        creator: "tom",
        exists: true,
      });
      expect(catalog.create("tina", input()).id).toBe(2);
    });

    it("lets a teacher publish a course taught by others", () => {
      expect(catalog.create("tom", input({ teachers: ["tina"], shares: [10_000] })).creator).toBe("tom");
    });

    it("requires the teacher role", () => {
      expect(codeOf(() => catalog.create("alice", input()))).toBe("ROLE_REQUIRED");
      expect(codeOf(() => catalog.create("sam", input()))).toBe("ROLE_REQUIRED");
    });

    it("rejects shares that do not sum to 10000", () => {
      expect(codeOf(() => catalog.create("tom", input({ shares: [4000, 3000, 2999] })))).toBe(
        "SHARES_MUST_SUM_TO_10000",
      );
    });

    it("validates the teacher list", () => {
      expect(codeOf(() => catalog.create("tom", input({ teachers: [], shares: [] })))).toBe(
        "EMPTY_TEACHER_LIST",
      );
      expect(codeOf(() => catalog.create("tom", input({ shares: [5000, 5000] })))).toBe("LENGTH_MISMATCH");
      expect(
        codeOf(() => catalog.create("tom", input({ teachers: ["tom", "tom"], shares: [5000, 5000] }))),
      ).toBe("DUPLICATE_TEACHER");
      expect(
        codeOf(() => catalog.create("tom", input({ teachers: ["tom", "sam"], shares: [5000, 5000] }))),
      ).toBe("UNREGISTERED_TEACHER");
    });

    it("validates price and share values", () => {
      expect(codeOf(() => catalog.create("tom", input({ price: -1n })))).toBe("INVALID_AMOUNT");
      expect(codeOf(() => catalog.create("tom", input({ shares: [4000.5, 3000, 2999.5] })))).toBe(
        "INVALID_SHARE",
      );
      expect(codeOf(() => catalog.create("tom", input({ shares: [11_000, -500, -500] })))).toBe(
        "INVALID_SHARE",
      );
    });

    it("accepts a free course", () => {
      expect(catalog.create("tom", input({ price: 0n })).price).toBe(0n);
    });
  });

  describe("remove", () => {
    it("soft-deletes for a course teacher and keeps the data", () => {
      catalog.create("tom", input());

      const removed = catalog.remove("ted", 1);

      expect(removed.exists).toBe(false);
      expect(catalog.find(1)?.shares).toEqual([4000, 3000, 3000]);
      expect(codeOf(() => catalog.get(1))).toBe("COURSE_NOT_FOUND");
      expect(catalog.list()).toEqual([]);
      expect(catalog.list({ includeRemoved: true }).map((c) => c.id)).toEqual([1]);
    });

    it("lets the board remove any course", () => {
      catalog.create("tom", input({ teachers: ["tom"], shares: [10_000] }));

      expect(catalog.remove("alice", 1).exists).toBe(false);
    });

    it("refuses other accounts", () => {
      catalog.create("tom", input({ teachers: ["tom"], shares: [10_000] }));

      expect(codeOf(() => catalog.remove("tina", 1))).toBe("NOT_AUTHORIZED");
      expect(codeOf(() => catalog.remove("sam", 1))).toBe("NOT_AUTHORIZED");
    });

    it("refuses unknown and already removed courses", () => {
      catalog.create("tom", input());
      catalog.remove("tom", 1);

      expect(codeOf(() => catalog.remove("tom", 1))).toBe("COURSE_NOT_FOUND");
      expect(codeOf(() => catalog.remove("tom", 9))).toBe("COURSE_NOT_FOUND");
    });
  });

  it("round-trips through a snapshot", () => {
    catalog.create("tom", input());
    catalog.create("tom", input({ title: "Geometry" }));
    catalog.remove("alice", 2);

    const restored = CourseCatalog.fromSnapshot(JSON.parse(JSON.stringify(catalog.snapshot())), roles);

    expect(restored.list({ includeRemoved: true })).toEqual(catalog.list({ includeRemoved: true }));
    expect(restored.create("tom", input()).id).toBe(3);
  });
});
