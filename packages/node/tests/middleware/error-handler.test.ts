/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { AcademyError } from "@collegium/academy";
import type { AcademyErrorCode } from "@collegium/academy";
import { LedgerError } from "@collegium/ledger";
import { EventStoreError } from "@collegium/event-store";
import type { AppEnv } from "../../src/types/api-contract.js";
import { ApiError } from "../../src/types/error.js";
import { handleError } from "../../src/middleware/error-handler.js";
import { readJson } from "../setup.js";

function throwing(err: Error) {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/", () => {
    throw err;
  });
  return app;
}

async function statusOf(err: Error): Promise<number> {
  return (await throwing(err).request("/")).status;
}

describe("error handler", () => {
  it.each<[AcademyErrorCode, number]>([
    ["ROLE_REQUIRED", 403],
    ["NOT_OWNER", 403],
    ["SHARES_MUST_SUM_TO_10000", 400],
    ["COURSE_NOT_FOUND", 404],
    ["DUPLICATE_VOTE", 409],
    ["VOTING_STILL_OPEN", 409],
    ["INSUFFICIENT_TREASURY", 422],
    ["TRANSFER_FAILED", 422],
  ])("maps %s to %i", async (code, status) => {
    expect(await statusOf(new AcademyError(code, "refused"))).toBe(status);
  });

  it("renders the academy error in the envelope", async () => {
    const res = await throwing(
      new AcademyError("VOTING_CLOSED", "Voting on proposal #1 closed at 1180"),
    ).request("/");

    expect(await readJson(res)).toEqual({
      error: { code: "VOTING_CLOSED", message: "Voting on proposal #1 closed at 1180" },
    });
  });

  it("maps ledger and event store errors by code", async () => {
    expect(await statusOf(new LedgerError("INSUFFICIENT_BALANCE", "short"))).toBe(422);
    expect(await statusOf(new LedgerError("INVALID_ACCOUNT", "bad"))).toBe(400);
    expect(await statusOf(new EventStoreError("CONCURRENCY_CONFLICT", "stale"))).toBe(409);
  });

  it("uses the status of an ApiError", async () => {
    expect(await statusOf(new ApiError(401, "UNAUTHORIZED", "who?"))).toBe(401);
  });

  it("hides the message of unexpected errors", async () => {
    const res = await throwing(new TypeError("x is undefined")).request("/");

    expect(res.status).toBe(500);
    expect(await readJson(res)).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
