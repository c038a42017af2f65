/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid)
 * - JWT bearer auth (valid, expired, tampered, wrong issuer)
 * - X-Account header in unsecured mode only
 * - Caller guard on writes
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  requireCaller,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";
import type { AuthConfig } from "../../src/middleware/auth.js";
import { readJson } from "../setup.js";

const JWT_SECRET = "test-secret";

function secured(apiKeys: ApiKeyRecord[] = []): AuthConfig {
  return {
    apiKeys: new Map(apiKeys.map((k) => [k.key, k])),
    jwtSecret: JWT_SECRET,
    jwtIssuer: "collegium",
  };
}

function makeApp(config?: AuthConfig) {
  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware(config));
  app.use("*", requireCaller());
  app.get("/whoami", (c) => c.json({ auth: c.get("auth") ?? null }));
  app.post("/write", (c) => c.json({ ok: true }));
  return app;
}

function token(overrides: { iss?: string; exp?: number } = {}): string {
  return signJwt(
    {
      sub: "alice",
      iss: overrides.iss ?? "collegium",
      exp: overrides.exp ?? Math.floor(Date.now() / 1000) + 3600,
    },
    JWT_SECRET,
  );
}

describe("API Key auth", () => {
  it("resolves the key to its account", async () => {
    const app = makeApp(secured([{ key: "key-1", account: "alice" }]));

    const res = await app.request("/whoami", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    const body = await readJson<{ auth: AuthContext }>(res);
    expect(body.auth).toEqual({ type: "api-key", account: "alice" });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp(secured([{ key: "key-1", account: "alice" }]));

    const res = await app.request("/whoami", { headers: { "X-Api-Key": "nope" } });

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: { code: "UNAUTHORIZED", message: "Invalid API key" },
    });
  });

  it("ignores X-Account once credentials are configured", async () => {
    const app = makeApp(secured());

    const res = await app.request("/whoami", { headers: { "X-Account": "mallory" } });

    expect(await readJson(res)).toEqual({ auth: null });
  });
});

describe("JWT Bearer auth", () => {
  it("uses the subject as the account", async () => {
    const app = makeApp(secured());

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${token()}` },
    });

    const body = await readJson<{ auth: AuthContext }>(res);
    expect(body.auth).toEqual({ type: "jwt", account: "alice" });
  });

  it("returns 401 for an expired JWT", async () => {
    const app = makeApp(secured());

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${token({ exp: Math.floor(Date.now() / 1000) - 100 })}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const app = makeApp(secured());
    const tampered = token().slice(0, -5) + "XXXXX";

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${tampered}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 when JWT is not configured", async () => {
    const app = makeApp({ apiKeys: new Map() });

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${token()}` },
    });

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: { code: "UNAUTHORIZED", message: "JWT authentication not configured" },
    });
  });
});

describe("unsecured mode", () => {
  it("trusts the X-Account header", async () => {
    const app = makeApp();

    const res = await app.request("/whoami", { headers: { "X-Account": " sam " } });

    const body = await readJson<{ auth: AuthContext }>(res);
    expect(body.auth).toEqual({ type: "header", account: "sam" });
  });
});

describe("requireCaller", () => {
  it("lets anonymous reads through", async () => {
    const res = await makeApp(secured()).request("/whoami");

    expect(res.status).toBe(200);
  });

  it("answers 401 to anonymous writes", async () => {
    const res = await makeApp(secured()).request("/write", { method: "POST" });

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({
      error: { code: "UNAUTHORIZED", message: "Authentication required" },
    });
  });

  it("accepts writes with a caller", async () => {
    const res = await makeApp().request("/write", {
      method: "POST",
      headers: { "X-Account": "sam" },
    });

    expect(res.status).toBe(200);
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const claims = verifyJwt(token({ exp: 4_000_000_000 }), JWT_SECRET, "collegium");

    expect(claims?.sub).toBe("alice");
    expect(claims?.exp).toBe(4_000_000_000);
  });

  it("returns undefined for malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for wrong issuer", () => {
    expect(verifyJwt(token({ iss: "elsewhere" }), JWT_SECRET, "collegium")).toBeUndefined();
  });

  it("returns undefined for another secret", () => {
    expect(verifyJwt(token(), "other-secret")).toBeUndefined();
  });
});
