/**
 * Tests for EventCatalog and the academy event definitions.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent, EventSource } from "@collegium/types";
import type { EventSchema } from "../src/catalog.js";
import { CatalogError, EventCatalog } from "../src/catalog.js";
import { ACADEMY_EVENTS, createAcademyCatalog } from "../src/academy-events.js";

// =============================================================================
// Helpers
// =============================================================================

function makeSchema(type: string, version = 1, source: EventSource = "catalog"): EventSchema {
  return {
    type,
    version,
    description: `Test schema for ${type}`,
    source,
    validate: (p) => typeof p === "object" && p !== null && "id" in p,
  };
}

function makeEvent(
  type: string,
  payload: Record<string, unknown>,
  source: EventSource,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: "evt-1",
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "corr-1",
      source,
    },
    payload,
  };
}

// =============================================================================
// Registration
// =============================================================================

describe("registration", () => {
  it("registers and looks up schemas", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("b.event", 1, "rating"));
    catalog.register(makeSchema("a.event"));

    expect(catalog.has("a.event")).toBe(true);
    expect(catalog.getSchema("b.event")?.source).toBe("rating");
    expect(catalog.getSchema("missing")).toBeUndefined();
    expect(catalog.listTypes()).toEqual(["a.event", "b.event"]);
    expect(catalog.size).toBe(2);
  });

  it("treats re-registration of the same version as a no-op", () => {
    const catalog = new EventCatalog();
    const first = makeSchema("a.event");
    catalog.register(first);
    catalog.register(makeSchema("a.event"));

    expect(catalog.getSchema("a.event")).toBe(first);
  });

  it("upgrades to a newer version and refuses a downgrade", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("a.event", 1));
    catalog.register(makeSchema("a.event", 2));

    expect(catalog.getSchema("a.event")?.version).toBe(2);
    expect(() => catalog.register(makeSchema("a.event", 1))).toThrow(CatalogError);
  });

  it("rejects non-positive versions", () => {
    const catalog = new EventCatalog();
    expect(() => catalog.register(makeSchema("a.event", 0))).toThrow(
      'Schema version for "a.event" must be a positive integer, got 0',
    );
  });

  it("lists schemas by source", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("a.event", 1, "admin"));
    catalog.register(makeSchema("b.event", 1, "rating"));

    expect(catalog.listBySource("admin").map((s) => s.type)).toEqual(["a.event"]);
    expect(catalog.listSchemas()).toHaveLength(2);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("validation", () => {
  it("validates payloads of registered types only", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("a.event"));

    expect(catalog.validate("a.event", { id: "x" })).toBe(true);
    expect(catalog.validate("a.event", { other: 1 })).toBe(false);
    expect(catalog.validate("missing", { id: "x" })).toBe(false);
  });

  it("checks type, source and payload of a full event", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("a.event", 1, "catalog"));

    expect(catalog.validateEvent(makeEvent("a.event", { id: "x" }, "catalog"))).toEqual({ valid: true });
    expect(catalog.validateEvent(makeEvent("a.event", { id: "x" }, "admin"))).toEqual({
      valid: false,
      reason: '"a.event" belongs to "catalog", got source "admin"',
    });
    expect(catalog.validateEvent(makeEvent("a.event", {}, "catalog"))).toEqual({
      valid: false,
      reason: 'Invalid payload for "a.event"',
    });
    expect(catalog.validateEvent(makeEvent("b.event", {}, "catalog"))).toEqual({
      valid: false,
      reason: 'Unknown event type "b.event"',
    });
  });
});

// =============================================================================
// Academy catalog
// =============================================================================

describe("createAcademyCatalog", () => {
  const catalog = createAcademyCatalog();

  it("registers every academy event", () => {
    expect(catalog.size).toBe(Object.keys(ACADEMY_EVENTS).length);
    for (const type of Object.values(ACADEMY_EVENTS)) {
      expect(catalog.getSchema(type)?.version).toBe(1);
    }
  });

  it("assigns each event to the subsystem named by its prefix", () => {
    expect(catalog.listBySource("governance")).toHaveLength(3);
    expect(catalog.listBySource("catalog")).toHaveLength(2);
    expect(catalog.listBySource("enrollment")).toHaveLength(4);
    expect(catalog.listBySource("rating")).toHaveLength(1);
    expect(catalog.listBySource("treasury")).toHaveLength(2);
    expect(catalog.listBySource("admin")).toHaveLength(2);
  });

  it("accepts well-formed payloads", () => {
    expect(
      catalog.validate(ACADEMY_EVENTS.PROPOSAL_CREATED, {
        proposalId: 1,
        candidate: "carol",
        role: "teacher",
        proposer: "alice",
        start: 100,
        end: 280,
      }),
    ).toBe(true);
    expect(
      catalog.validate(ACADEMY_EVENTS.COURSE_COMPLETED, {
        courseId: 1,
        student: "sam",
        payouts: [{ to: "tom", amount: "700" }],
      }),
    ).toBe(true);
    expect(
      catalog.validate(ACADEMY_EVENTS.FUNDS_RESCUED, { asset: "XYZ", to: "alice", amount: "10" }),
    ).toBe(true);
  });

  it("rejects amounts that are not base-unit decimal strings", () => {
    expect(catalog.validate(ACADEMY_EVENTS.TREASURY_PAYOUT, { to: "bob", amount: 10 })).toBe(false);
    expect(catalog.validate(ACADEMY_EVENTS.TREASURY_PAYOUT, { to: "bob", amount: "1.5" })).toBe(false);
    expect(
      catalog.validate(ACADEMY_EVENTS.BONUS_DISTRIBUTED, {
        courseId: 1,
        amount: "100",
        distributed: "99",
        payouts: [{ to: "tom", amount: "-1" }],
      }),
    ).toBe(false);
  });
});
