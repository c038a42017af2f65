/**
 * Tests for the shared request schemas.
 */

import { describe, it, expect } from "vitest";
import { AmountSchema, IdParamSchema } from "../src/types/dto.js";

describe("AmountSchema", () => {
  it("parses base units to bigint", () => {
    expect(AmountSchema.parse("0")).toBe(0n);
    expect(AmountSchema.parse("90071992547409930001")).toBe(90071992547409930001n);
  });

  it("rejects anything but a plain digit string", () => {
    for (const bad of ["-1", "1.5", "", " 1", "0x10", "1e3"]) {
      const result = AmountSchema.safeParse(bad);
      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe("Amount must be a decimal string of base units");
    }
  });
});

describe("IdParamSchema", () => {
  it("parses positive integers", () => {
    expect(IdParamSchema.parse("1")).toBe(1);
    expect(IdParamSchema.parse("42")).toBe(42);
  });

  it("rejects other numeric spellings", () => {
    for (const bad of ["0", "01", "0x1", "1e0", " 1 ", "1.0", "-1", ""]) {
      expect(IdParamSchema.safeParse(bad).success).toBe(false);
    }
  });
});
