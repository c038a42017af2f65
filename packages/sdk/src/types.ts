/**
 * @collegium/sdk - SDK types.
 *
 * Types specific to the SDK client layer. Response payload types are
 * inferred from the schemas in ./schemas.ts.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the Collegium SDK client.
 *
 * At most one credential is sent per request, in the order the server
 * checks them: API key, then bearer token, then the unsecured account
 * header.
 */
export interface CollegiumClientConfig {
  /** Base URL of the Collegium API (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** API key sent as X-Api-Key */
  readonly apiKey?: string | undefined;
  /** HS256 token sent as Authorization: Bearer */
  readonly token?: string | undefined;
  /** Caller sent as X-Account; only honored by servers without auth configured */
  readonly account?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** Base of the exponential backoff in milliseconds (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Unwrapped API response.
 */
export interface CollegiumResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Per-request options for mutations.
 */
export interface RequestOptions {
  /**
   * Sent as Idempotency-Key. POSTs without one get a generated key,
   * reused across retries of the same call.
   */
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the Collegium API.
 */
export class CollegiumError extends Error {
  /** Error code from the API (e.g., "ROLE_REQUIRED", "VALIDATION_ERROR") */
  readonly code: string;
  /** HTTP status code; 0 when no response arrived */
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "CollegiumError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
