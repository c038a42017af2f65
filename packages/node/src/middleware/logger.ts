/**
 * Request logging middleware.
 *
 * Owns the request id: an incoming X-Request-Id is kept, otherwise a UUID
 * is generated. The id is echoed on the response and, when a sink is
 * given, reported with the caller in one entry per request; main.ts hands
 * the sink to pino.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Calling account, when one was presented */
  readonly caller?: string | undefined;
}

export function loggerMiddleware(
  log?: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
    log?.({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId,
      caller: c.get("auth")?.account,
    });
  };
}
