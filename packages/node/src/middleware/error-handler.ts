/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Academy errors map by category; ledger and event store errors by code.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { AcademyError } from "@collegium/academy";
import type { ErrorCategory } from "@collegium/academy";
import { LedgerError } from "@collegium/ledger";
import type { LedgerErrorCode } from "@collegium/ledger";
import { EventStoreError } from "@collegium/event-store";
import type { EventStoreErrorCode } from "@collegium/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const CATEGORY_STATUS: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  authorization: 403,
  validation: 400,
  "not-found": 404,
  "state-conflict": 409,
  temporal: 409,
  resource: 422,
};

const LEDGER_STATUS: Readonly<Record<LedgerErrorCode, ErrorStatus>> = {
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  EMPTY_BATCH: 400,
  INVALID_SNAPSHOT: 400,
};

const EVENT_STORE_STATUS: Readonly<Record<EventStoreErrorCode, ErrorStatus>> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
  INVALID_EVENT: 500,
};

interface Resolved {
  readonly status: ErrorStatus;
  readonly code: string;
}

function resolve(err: Error): Resolved {
  if (err instanceof AcademyError) {
    return { status: CATEGORY_STATUS[err.category], code: err.code };
  }
  if (err instanceof ApiError) {
    return { status: err.status, code: err.code };
  }
  if (err instanceof LedgerError) {
    return { status: LEDGER_STATUS[err.code], code: err.code };
  }
  if (err instanceof EventStoreError) {
    return { status: EVENT_STORE_STATUS[err.code], code: err.code };
  }
  return { status: 500, code: "INTERNAL_ERROR" };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof HTTPException) {
    // Malformed JSON and other framework rejections
    const code = err.status === 400 ? "VALIDATION_ERROR" : "HTTP_ERROR";
    return c.json(createErrorEnvelope(code, err.message), err.status);
  }

  const { status, code } = resolve(err);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message), status);
}
