/**
 * Tests for treasury, owner administration and ledger routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OWNER, TREASURY, createTestApp, errorCode, readJson, send } from "./setup.js";
import type { TestApp } from "./setup.js";

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

describe("treasury", () => {
  it("describes the treasury account", async () => {
    const res = await t.app.request("/api/v1/treasury");

    expect(await readJson(res)).toEqual({
      data: { account: TREASURY, asset: "EDU", decimals: 18, balance: "0" },
    });
  });

  it("pays out for board members", async () => {
    await send(t, "alice", "POST", "/ledger/mint", { to: TREASURY, amount: "300" });

    const res = await send(t, "alice", "POST", "/treasury/payouts", { to: "carol", amount: "120" });

    expect(await readJson(res)).toEqual({ data: { to: "carol", amount: "120" } });
    expect(t.service.ledger.balanceOf("carol")).toBe(120n);
    expect(t.service.academy.treasuryBalance()).toBe(180n);
  });

  it("refuses payouts from outside the board or beyond the balance", async () => {
    await send(t, "alice", "POST", "/ledger/mint", { to: TREASURY, amount: "300" });

    const byOwner = await send(t, OWNER, "POST", "/treasury/payouts", { to: "carol", amount: "1" });
    const zero = await send(t, "alice", "POST", "/treasury/payouts", { to: "carol", amount: "0" });
    const tooMuch = await send(t, "alice", "POST", "/treasury/payouts", { to: "carol", amount: "301" });

    expect(await errorCode(byOwner)).toBe("ROLE_REQUIRED");
    expect(zero.status).toBe(400);
    expect(await errorCode(zero)).toBe("ZERO_AMOUNT");
    expect(tooMuch.status).toBe(422);
    expect(await errorCode(tooMuch)).toBe("INSUFFICIENT_TREASURY");
  });
});

describe("owner administration", () => {
  it("changes the voting window", async () => {
    const res = await send(t, OWNER, "PUT", "/admin/proposal-duration", { seconds: 60 });

    expect(await readJson(res)).toEqual({ data: { seconds: 60 } });
    const proposal = await send(t, OWNER, "POST", "/proposals", { candidate: "tom", role: "teacher" });
    expect((await readJson<{ data: { end: number } }>(proposal)).data.end).toBe(1_060);
  });

  it("refuses non-owners and bad durations", async () => {
    const byBoard = await send(t, "alice", "PUT", "/admin/proposal-duration", { seconds: 60 });
    const fractional = await send(t, OWNER, "PUT", "/admin/proposal-duration", { seconds: 1.5 });

    expect(byBoard.status).toBe(403);
    expect(await errorCode(byBoard)).toBe("NOT_OWNER");
    expect(fractional.status).toBe(400);
    expect(await errorCode(fractional)).toBe("INVALID_DURATION");
  });

  it("rescues treasury tokens", async () => {
    await send(t, "alice", "POST", "/ledger/mint", { to: TREASURY, amount: "50" });

    const res = await send(t, OWNER, "POST", "/admin/rescue", { asset: "EDU", to: OWNER, amount: "50" });
    const unknown = await send(t, OWNER, "POST", "/admin/rescue", { asset: "XYZ", to: OWNER, amount: "1" });

    expect(await readJson(res)).toEqual({ data: { asset: "EDU", to: OWNER, amount: "50" } });
    expect(t.service.ledger.balanceOf(OWNER)).toBe(50n);
    expect(unknown.status).toBe(404);
    expect(await errorCode(unknown)).toBe("UNKNOWN_ASSET");
  });
});

describe("ledger", () => {
  it("records the caller's allowance for the treasury", async () => {
    const res = await send(t, "sam", "POST", "/ledger/approve", { amount: "75" });

    expect(await readJson(res)).toEqual({
      data: { account: "sam", asset: "EDU", decimals: 18, balance: "0", allowance: "75" },
    });
  });

  it("hides the faucet unless enabled", async () => {
    const locked = createTestApp({ devFaucet: false });

    const res = await send(locked, "sam", "POST", "/ledger/mint", { to: "sam", amount: "1" });

    expect(res.status).toBe(404);
    expect(await errorCode(res)).toBe("NOT_FOUND");
  });
});
