/**
 * Caller identity types.
 *
 * Every mutating request acts as one account of the organization.
 * The account is taken from:
 * 1. an API key via X-Api-Key header, mapped to its account
 * 2. an HS256 JWT bearer token, whose `sub` is the account
 * 3. the X-Account header, only when no credentials are configured
 *
 * What the account may do is decided by the academy's roles, not here.
 */

export type AuthMethod = "api-key" | "jwt" | "header";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: AuthMethod;
  readonly account: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly account: string;
}

export interface JwtClaims {
  readonly sub: string;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
