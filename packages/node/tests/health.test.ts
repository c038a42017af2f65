/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reflects service state and event chain integrity
 * - X-Request-Id is set on responses
 * - Unknown routes answer the error envelope
 */

import { describe, it, expect } from "vitest";
import { OWNER, createTestApp, jsonRequest, readJson, send } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = await readJson<{ status: string; timestamp: string }>(res);
    expect(body.status).toBe("ok");
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("is ready with an intact event chain", async () => {
    const t = createTestApp();
    await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });

    const res = await t.app.request("/ready");

    expect(res.status).toBe(200);
    const body = await readJson<{ status: string; events: number; subsystems: unknown }>(res);
    expect(body.status).toBe("ready");
    expect(body.events).toBe(1);
    expect(body.subsystems).toEqual({ service: { status: "ok" }, eventStore: { status: "ok" } });
  });

  it("answers 503 once the service stopped", async () => {
    const t = createTestApp();
    t.service.stop();

    const res = await t.app.request("/ready");

    expect(res.status).toBe(503);
    expect((await readJson<{ status: string }>(res)).status).toBe("not_ready");
  });
});

describe("unknown routes", () => {
  it("answer 404 with the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nowhere");

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nowhere" },
    });
  });
});
