/**
 * @collegium/sdk - HTTP Client.
 *
 * Wraps native fetch() with:
 * - Credential header injection
 * - Request ID generation
 * - Idempotency keys for POSTs
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization
 * - Response validation against a zod schema
 */

import type { z } from "zod";
import type { CollegiumClientConfig, CollegiumResponse, RequestOptions } from "./types.js";
import { CollegiumError } from "./types.js";

type Method = "GET" | "POST" | "PUT" | "DELETE";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateId(prefix: string): string {
  return `${prefix}-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "x-idempotent-replay",
    "retry-after",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

interface ErrorFields {
  readonly code: string | undefined;
  readonly message: string | undefined;
  readonly details: unknown;
}

/** Read `{ error: { code, message, details } }` without trusting its shape. */
function errorFields(body: unknown): ErrorFields {
  if (typeof body !== "object" || body === null || !("error" in body)) {
    return { code: undefined, message: undefined, details: undefined };
  }
  const error = body.error;
  if (typeof error !== "object" || error === null) {
    return { code: undefined, message: undefined, details: undefined };
  }
  return {
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    message: "message" in error && typeof error.message === "string" ? error.message : undefined,
    details: "details" in error ? error.details : undefined,
  };
}

/** Payloads come wrapped as `{ data }` except on list and health endpoints. */
function unwrap(body: unknown, envelope: boolean): unknown {
  if (envelope && typeof body === "object" && body !== null && "data" in body) {
    return body.data;
  }
  return body;
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the Collegium API.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly credentials: Record<string, string>;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: CollegiumClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.credentials = {};
    if (config.apiKey !== undefined) {
      this.credentials["X-Api-Key"] = config.apiKey;
    } else if (config.token !== undefined) {
      this.credentials["Authorization"] = `Bearer ${config.token}`;
    } else if (config.account !== undefined) {
      this.credentials["X-Account"] = config.account;
    }
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
  ): Promise<CollegiumResponse<z.output<S>>> {
    return this.request("GET", path, schema, true);
  }

  /** GET for endpoints that answer without the `{ data }` envelope. */
  async getBare<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
  ): Promise<CollegiumResponse<z.output<S>>> {
    return this.request("GET", path, schema, false);
  }

  async post<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S,
    options?: RequestOptions,
  ): Promise<CollegiumResponse<z.output<S>>> {
    const idempotencyKey = options?.idempotencyKey ?? generateId("idem");
    return this.request("POST", path, schema, true, body, idempotencyKey);
  }

  async put<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S,
  ): Promise<CollegiumResponse<z.output<S>>> {
    return this.request("PUT", path, schema, true, body);
  }

  async delete<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
  ): Promise<CollegiumResponse<z.output<S>>> {
    return this.request("DELETE", path, schema, true);
  }

  /**
   * Core request method with retry logic.
   */
  private async request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    envelope: boolean,
    body?: unknown,
    idempotencyKey?: string,
  ): Promise<CollegiumResponse<z.output<S>>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateId("sdk"),
      ...this.credentials,
    };

    if (idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = idempotencyKey;
    }

    const init: RequestInit = {
      method,
      headers,
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → validate and unwrap
        if (response.ok) {
          const parsed = schema.safeParse(unwrap(responseBody, envelope));
          if (!parsed.success) {
            throw new CollegiumError(
              "INVALID_RESPONSE",
              `Unexpected response shape from ${method} ${path}`,
              response.status,
              parsed.error.issues,
            );
          }
          return {
            data: parsed.data,
            status: response.status,
            headers: responseHeaders,
          };
        }

        const error = errorFields(responseBody);

        // 4xx → don't retry (client errors)
        if (response.status >= 400 && response.status < 500) {
          throw new CollegiumError(
            error.code ?? "CLIENT_ERROR",
            error.message ?? `HTTP ${response.status}`,
            response.status,
            error.details,
          );
        }

        // 5xx → retry with backoff
        if (attempt < this.maxRetries) {
          lastError = new CollegiumError(
            "SERVER_ERROR",
            `HTTP ${response.status}`,
            response.status,
          );
          await sleep(this.backoff(attempt));
          continue;
        }

        throw new CollegiumError(
          error.code ?? "SERVER_ERROR",
          error.message ?? `HTTP ${response.status} after ${attempt + 1} attempts`,
          response.status,
        );
      } catch (error) {
        if (error instanceof CollegiumError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < this.maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(this.backoff(attempt));
          continue;
        }

        throw new CollegiumError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : lastError?.message ?? "Network error",
          0,
        );
      }
    }

    throw new CollegiumError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), 10 * this.retryDelayMs);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new CollegiumError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
