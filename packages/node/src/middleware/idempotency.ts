/**
 * Idempotency middleware.
 *
 * Caches POST mutation responses by Idempotency-Key header, scoped to the
 * caller and path. If the same key is seen again within the TTL, the cached
 * response is returned instead of re-executing the handler, so a retried
 * payment is not applied twice.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export type ResponseToCache = Omit<CachedResponse, "cachedAt">;

/** Stores stamp `cachedAt` themselves on `set`. */
export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: ResponseToCache): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

/**
 * Entries live in insertion order, which is also `cachedAt` order, so
 * `set` drops expired entries from the front until it meets a live one.
 */
export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: ResponseToCache): void {
    const now = this._now();
    this.sweep(now);
    // Re-inserting moves the key to the back, keeping the order by age
    this._cache.delete(key);
    this._cache.set(key, { ...response, cachedAt: now });
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }

  private sweep(now: number): void {
    for (const [key, entry] of this._cache) {
      if (now - entry.cachedAt <= this._ttlMs) {
        return;
      }
      this._cache.delete(key);
    }
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

/**
 * Must run AFTER authMiddleware.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const caller = c.get("auth")?.account ?? "";
    const scopedKey = `${caller}\n${c.req.path}\n${idempotencyKey}`;

    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
      });
    }

    await next();

    if (c.res.status < 400) {
      const clonedRes = c.res.clone();
      const body = await clonedRes.text();
      const headers: Record<string, string> = {};
      clonedRes.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(scopedKey, {
        status: clonedRes.status,
        body,
        headers,
      });
    }
  };
}
