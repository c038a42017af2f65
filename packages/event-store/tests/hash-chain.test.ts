/**
 * Tests for the event log hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@collegium/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "corr-1",
      source: "treasury",
    },
    payload,
  };
}

function record(payload: Record<string, unknown> = {}): UnhashedStoredEvent {
  return {
    event: makeEvent("treasury.payout", payload),
    streamId: "treasury",
    version: 1,
    globalPosition: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

function chainOf(count: number): StoredEvent[] {
  const store = new InMemoryEventStore({ now: () => new Date("2026-01-01T00:00:00.000Z") });
  for (let i = 0; i < count; i++) {
    store.append("treasury", [makeEvent("treasury.payout", { to: "bob", amount: String(i + 1) })]);
  }
  return [...store.readAll()];
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a deterministic 64-char hex digest", () => {
    const h1 = computeEventHash(record({ amount: "5" }), GENESIS_HASH);
    const h2 = computeEventHash(record({ amount: "5" }), GENESIS_HASH);

    expect(h1).toMatch(/^[0-9a-f]{64}$/);
    expect(h1).toBe(h2);
  });

  it("ignores key order in the payload", () => {
    const a = computeEventHash(record({ to: "bob", amount: "5" }), GENESIS_HASH);
    const b = computeEventHash(record({ amount: "5", to: "bob" }), GENESIS_HASH);

    expect(a).toBe(b);
  });

  it("changes with content and with the previous hash", () => {
    const base = computeEventHash(record({ amount: "5" }), GENESIS_HASH);

    expect(computeEventHash(record({ amount: "6" }), GENESIS_HASH)).not.toBe(base);
    expect(computeEventHash(record({ amount: "5" }), "other")).not.toBe(base);
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an untouched chain", () => {
    const result = verifyHashChain(chainOf(3));

    expect(result).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("detects a tampered payload", () => {
    const chain = chainOf(3);
    const second = chain[1];
    if (second === undefined) throw new Error("missing record");
    chain[1] = {
      ...second,
      event: { ...second.event, payload: { to: "mallory", amount: "2" } },
    };

    const result = verifyHashChain(chain);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.errors[0]?.reason).toContain("Hash mismatch at position 2");
  });

  it("detects a removed record", () => {
    const chain = chainOf(3);
    chain.splice(1, 1);

    const result = verifyHashChain(chain);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toContain("previousHash mismatch at position 3");
  });
});
