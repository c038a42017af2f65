/**
 * Tests for idempotency middleware.
 *
 * Verifies:
 * - POST with Idempotency-Key caches the response and does not re-apply it
 * - Replayed response includes X-Idempotent-Replay header
 * - Keys are scoped to the caller
 * - Failed responses are not cached
 * - TTL expiry evicts cached entries
 */

import { describe, it, expect } from "vitest";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";
import { createTestApp, jsonRequest, readJson } from "../setup.js";

function mint(key: string, account = "alice", to = "sam"): Request {
  return jsonRequest(
    "/api/v1/ledger/mint",
    "POST",
    { to, amount: "100" },
    { "X-Account": account, "Idempotency-Key": key },
  );
}

describe("idempotency middleware", () => {
  it("replays a POST with the same key without applying it twice", async () => {
    const t = createTestApp();

    const res1 = await t.app.request(mint("key-123"));
    const res2 = await t.app.request(mint("key-123"));

    expect(res1.status).toBe(200);
    expect(res1.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(res2.status).toBe(200);
    expect(res2.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await readJson(res2)).toEqual(await readJson(res1));
    expect(t.service.ledger.balanceOf("sam")).toBe(100n);
  });

  it("applies each distinct key", async () => {
    const t = createTestApp();

    await t.app.request(mint("a"));
    await t.app.request(mint("b"));

    expect(t.service.ledger.balanceOf("sam")).toBe(200n);
  });

  it("scopes keys to the caller", async () => {
    const t = createTestApp();

    await t.app.request(mint("shared", "alice"));
    const res = await t.app.request(mint("shared", "bob"));

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(t.service.ledger.balanceOf("sam")).toBe(200n);
  });

  it("does not cache failed responses", async () => {
    const t = createTestApp();
    const bad = (): Request =>
      jsonRequest(
        "/api/v1/ledger/mint",
        "POST",
        { to: "sam", amount: "-1" },
        { "X-Account": "alice", "Idempotency-Key": "retry" },
      );

    expect((await t.app.request(bad())).status).toBe(400);
    expect(t.idempotencyStore.size).toBe(0);
  });

  it("bypasses requests without a key", async () => {
    const t = createTestApp();

    await t.app.request(
      jsonRequest("/api/v1/ledger/mint", "POST", { to: "sam", amount: "5" }, { "X-Account": "alice" }),
    );

    expect(t.idempotencyStore.size).toBe(0);
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("evicts entries older than the TTL", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore(1_000, () => now);
    store.set("k", { status: 200, body: "{}", headers: {} });

    now = 1_000;
    expect(store.get("k")?.status).toBe(200);

    now = 1_001;
    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("drops expired entries when new keys arrive", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore(10, () => now);

    for (let i = 0; i < 1_000; i++) {
      now = i * 100;
      store.set(`key-${i}`, { status: 200, body: "{}", headers: {} });
    }

    expect(store.size).toBe(1);
    expect(store.get("key-999")?.status).toBe(200);
  });

  it("keeps live entries when a key is stored again", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore(100, () => now);
    store.set("a", { status: 200, body: "1", headers: {} });
    now = 50;
    store.set("b", { status: 200, body: "2", headers: {} });
    now = 60;
    store.set("a", { status: 200, body: "3", headers: {} });

    now = 140;
    store.set("c", { status: 200, body: "4", headers: {} });

    expect(store.size).toBe(3);
    expect(store.get("a")?.body).toBe("3");

    now = 155;
    store.set("d", { status: 200, body: "5", headers: {} });

    expect(store.get("b")).toBeUndefined();
    expect(store.size).toBe(3);
  });

  it("stamps entries with its own clock", () => {
    const store = new InMemoryIdempotencyStore(1_000, () => 42);
    store.set("k", { status: 201, body: "{}", headers: {} });

    expect(store.get("k")?.cachedAt).toBe(42);
  });
});
