/**
 * Tests for membership and admission proposal routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  DURATION,
  OWNER,
  START,
  createTestApp,
  errorCode,
  jsonRequest,
  readJson,
  send,
} from "./setup.js";
import type { TestApp } from "./setup.js";

interface ProposalBody {
  readonly data: {
    readonly id: number;
    readonly candidate: string;
    readonly votesFor: number;
    readonly votesAgainst: number;
    readonly start: number;
    readonly end: number;
    readonly status?: string;
  };
}

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

describe("GET /api/v1/members", () => {
  it("lists the founding board", async () => {
    const res = await t.app.request("/api/v1/members/board");

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({ data: { role: "board", members: ["alice", "bob"] } });
  });

  it("rejects an unknown role", async () => {
    const res = await t.app.request("/api/v1/members/wizard");

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("reports the role of an account", async () => {
    const alice = await t.app.request("/api/v1/members/account/alice");
    const carol = await t.app.request("/api/v1/members/account/carol");

    expect(await readJson(alice)).toEqual({ data: { account: "alice", role: "board" } });
    expect(await readJson(carol)).toEqual({ data: { account: "carol", role: "none" } });
  });
});

describe("admission proposals", () => {
  it("requires a caller to open a proposal", async () => {
    const res = await t.app.request(
      jsonRequest("/api/v1/proposals", "POST", { candidate: "tom", role: "teacher" }),
    );

    expect(res.status).toBe(401);
  });

  it("opens a proposal with the configured window", async () => {
    const res = await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });

    expect(res.status).toBe(201);
    const { data } = await readJson<ProposalBody>(res);
    expect(data.id).toBe(1);
    expect(data.start).toBe(START);
    expect(data.end).toBe(START + DURATION);
  });

  it("answers INVALID_ROLE for an unknown role", async () => {
    const res = await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "janitor" });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("INVALID_ROLE");
  });

  it("runs a proposal from vote to execution", async () => {
    await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });

    const outsider = await send(t, "tom", "POST", "/proposals/1/votes", { support: true });
    expect(outsider.status).toBe(403);
    expect(await errorCode(outsider)).toBe("NOT_IN_ELECTORATE");

    const vote = await send(t, "alice", "POST", "/proposals/1/votes", { support: true });
    expect((await readJson<ProposalBody>(vote)).data.votesFor).toBe(1);

    const again = await send(t, "alice", "POST", "/proposals/1/votes", { support: false });
    expect(again.status).toBe(409);
    expect(await errorCode(again)).toBe("DUPLICATE_VOTE");

    const early = await send(t, OWNER, "POST", "/proposals/1/execute");
    expect(early.status).toBe(409);
    expect(await errorCode(early)).toBe("VOTING_STILL_OPEN");

    t.clock.advance(DURATION + 1);
    const executed = await send(t, OWNER, "POST", "/proposals/1/execute");
    const body = await readJson<{ data: { approved: boolean } }>(executed);
    expect(body.data.approved).toBe(true);

    const teachers = await t.app.request("/api/v1/members/teacher");
    expect(await readJson(teachers)).toEqual({ data: { role: "teacher", members: ["tom"] } });

    const proposal = await t.app.request("/api/v1/proposals/1");
    expect((await readJson<ProposalBody>(proposal)).data.status).toBe("executed");
  });

  it("rejects a vote with a non-boolean support", async () => {
    await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });

    const res = await send(t, "alice", "POST", "/proposals/1/votes", { support: "yes" });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });

  it("answers 404 and 400 for missing and malformed ids", async () => {
    const missing = await t.app.request("/api/v1/proposals/9");
    const malformed = await t.app.request("/api/v1/proposals/abc");

    expect(missing.status).toBe(404);
    expect(await errorCode(missing)).toBe("PROPOSAL_NOT_FOUND");
    expect(malformed.status).toBe(400);
    expect(await errorCode(malformed)).toBe("VALIDATION_ERROR");
  });

  it("pages through proposals", async () => {
    await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });
    await send(t, OWNER, "POST", "/proposals", { candidate: "sam", role: "student" });

    const first = await readJson<{
      data: { id: number; status: string }[];
      pagination: { cursor: string; hasMore: boolean };
    }>(await t.app.request("/api/v1/proposals?limit=1"));

    expect(first.data.map((p) => [p.id, p.status])).toEqual([[1, "voting"]]);
    expect(first.pagination.hasMore).toBe(true);

    const second = await readJson<{ data: { id: number }[]; pagination: { hasMore: boolean } }>(
      await t.app.request(`/api/v1/proposals?limit=1&cursor=${first.pagination.cursor}`),
    );
    expect(second.data.map((p) => p.id)).toEqual([2]);
    expect(second.pagination.hasMore).toBe(false);
  });
});
