/**
 * Middleware barrel - re-exports all middleware.
 */

export { handleError, CATEGORY_STATUS } from "./error-handler.js";
export { loggerMiddleware, REQUEST_ID_HEADER } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse, ResponseToCache } from "./idempotency.js";
export {
  authMiddleware,
  requireCaller,
  callerOf,
  verifyJwt,
  signJwt,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
