/**
 * Authentication middleware.
 *
 * Resolves the calling account:
 * 1. API key via X-Api-Key header → the account it was issued to
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 verify, `sub`
 * 3. X-Account header, only when no AuthConfig is given (tests, dev)
 *
 * Reads may be anonymous. Presented credentials that fail answer 401;
 * writes without a caller answer 401 via `requireCaller`.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

export const ACCOUNT_HEADER = "X-Account";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer. Without a config
 * the X-Account header is trusted as is.
 */
export function authMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    if (config === undefined) {
      const account = c.req.header(ACCOUNT_HEADER)?.trim();
      if (account !== undefined && account !== "") {
        auth = { type: "header", account };
      }
      c.set("auth", auth);
      return next();
    }

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = { type: "api-key", account: record.account };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        auth = { type: "jwt", account: claims.sub };
      }
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Caller Guard
// =============================================================================

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/**
 * Reject mutating requests that carry no caller.
 *
 * Must run AFTER authMiddleware.
 */
export function requireCaller(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!READ_METHODS.has(c.req.method) && c.get("auth") === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }
    return next();
  };
}

/**
 * The calling account of a mutating request.
 *
 * @throws ApiError 401 when none was presented
 */
export function callerOf(c: Context<AppEnv>): string {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new ApiError(401, "UNAUTHORIZED", "Authentication required");
  }
  return auth.account;
}

// =============================================================================
// JWT Helpers
// =============================================================================

const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().optional(),
  exp: z.number(),
  iat: z.number(),
});

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
}

function sign(data: string, secret: string): string {
  return createHmac("sha256", secret).update(data).digest("base64url");
}

/**
 * Verify an HS256 JWT.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  try {
    if (!JwtHeaderSchema.safeParse(decodeSegment(headerB64)).success) {
      return undefined;
    }
    const parsed = JwtPayloadSchema.safeParse(decodeSegment(payloadB64));
    if (!parsed.success) {
      return undefined;
    }
    const payload = parsed.data;

    if (payload.exp < Math.floor(Date.now() / 1000)) {
      return undefined;
    }
    if (expectedIssuer !== undefined && payload.iss !== expectedIssuer) {
      return undefined;
    }

    return { sub: payload.sub, iss: payload.iss ?? "", exp: payload.exp, iat: payload.iat };
  } catch {
    // Undecodable segment
    return undefined;
  }
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}
