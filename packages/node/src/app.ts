/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without an HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { AcademyService } from "./services/academy-service.js";
import type {
  AcademyServiceConfig,
  AcademyServiceOptions,
} from "./services/academy-service.js";
import { handleError } from "./middleware/error-handler.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { authMiddleware, requireCaller } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMemberRoutes } from "./routes/members.js";
import { createProposalRoutes } from "./routes/proposals.js";
import { createCourseRoutes } from "./routes/courses.js";
import { createEnrollmentRoutes } from "./routes/enrollments.js";
import { createRatingRoutes, createTeacherRoutes } from "./routes/ratings.js";
import { createTreasuryRoutes } from "./routes/treasury.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: AcademyServiceConfig;
  readonly serviceOptions?: AcademyServiceOptions;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called for errors that answer 500 */
  readonly onUnexpectedError?: (err: Error) => void;
  readonly idempotencyTtlMs?: number;
  /** Auth configuration. Without it the X-Account header names the caller. */
  readonly auth?: AuthConfig;
  /** Expose POST /api/v1/ledger/mint */
  readonly devFaucet?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AcademyService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new AcademyService(options.serviceConfig, options.serviceOptions);
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", loggerMiddleware(options.logFn));

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError((err, c) => {
    const res = handleError(err, c);
    if (res.status === 500) {
      options.onUnexpectedError?.(err);
    }
    return res;
  });

  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Middleware: caller → write guard → idempotency ─────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", authMiddleware(options.auth));
  app.use("/api/*", requireCaller());
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // ─── v1 Routes ──────────────────────────────────────────────────
  app.route("/api/v1/members", createMemberRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/courses", createCourseRoutes());
  app.route("/api/v1/courses", createEnrollmentRoutes());
  app.route("/api/v1/courses", createRatingRoutes());
  app.route("/api/v1/teachers", createTeacherRoutes());
  app.route("/api/v1/treasury", createTreasuryRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes({ devFaucet: options.devFaucet ?? false }));
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
