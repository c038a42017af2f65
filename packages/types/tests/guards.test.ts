/**
 * Runtime type guard tests for @collegium/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccount,
  isZeroAccount,
  isRole,
  isMemberRole,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { ZERO_ACCOUNT } from "../src/account.js";

// =============================================================================
// Identity guards
// =============================================================================

describe("isAccount", () => {
  it("accepts an address-like string", () => {
    expect(isAccount("0xabc123")).toBe(true);
  });

  it("accepts any opaque non-empty token", () => {
    expect(isAccount("alice")).toBe(true);
  });

  it("rejects the zero account", () => {
    expect(isAccount(ZERO_ACCOUNT)).toBe(false);
  });

  it("rejects empty and padded strings", () => {
    expect(isAccount("")).toBe(false);
    expect(isAccount(" alice")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccount(42)).toBe(false);
    expect(isAccount(null)).toBe(false);
    expect(isAccount(undefined)).toBe(false);
  });
});

describe("isZeroAccount", () => {
  it("recognises only the sentinel", () => {
    expect(isZeroAccount(ZERO_ACCOUNT)).toBe(true);
    expect(isZeroAccount("0x0")).toBe(false);
  });
});

describe("isRole / isMemberRole", () => {
  it("accepts every role including none", () => {
    for (const role of ["none", "board", "teacher", "student"]) {
      expect(isRole(role)).toBe(true);
    }
  });

  it("excludes none from member roles", () => {
    expect(isMemberRole("none")).toBe(false);
    expect(isMemberRole("teacher")).toBe(true);
  });

  it("rejects unknown and differently cased values", () => {
    expect(isRole("admin")).toBe(false);
    expect(isRole("BOARD")).toBe(false);
    expect(isMemberRole(2)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const META = {
  eventId: "evt-1",
  timestamp: "2025-01-15T10:00:00.000Z",
  actor: "0xboard",
  correlationId: "op-1",
  source: "governance",
};

describe("isEventSource", () => {
  it("accepts known subsystems", () => {
    expect(isEventSource("treasury")).toBe(true);
    expect(isEventSource("admin")).toBe(true);
  });

  it("rejects unknown subsystems", () => {
    expect(isEventSource("vault")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts complete metadata", () => {
    expect(isEventMetadata(META)).toBe(true);
  });

  it("rejects metadata with an unknown source", () => {
    expect(isEventMetadata({ ...META, source: "observer" })).toBe(false);
  });

  it("rejects metadata missing the actor", () => {
    const { actor: _actor, ...rest } = META;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a well-formed event", () => {
    expect(
      isDomainEvent({
        type: "governance.proposal.created",
        metadata: META,
        payload: { proposalId: 1 },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({ type: "x", metadata: META, payload: null }),
    ).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isDomainEvent("event")).toBe(false);
  });
});
