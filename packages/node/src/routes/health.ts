/**
 * Health check routes.
 *
 * GET /health - Liveness probe (always 200 if server is running)
 * GET /ready  - Readiness probe (service started, event hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AcademyService } from "../services/academy-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: AcademyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkEventStore();

    const subsystems: Record<string, SubsystemStatus> = {
      service: service.isReady() ? { status: "ok" } : { status: "down", detail: "stopped" },
      eventStore: integrity.valid
        ? { status: "ok" }
        : { status: "down", detail: `chainValid=false, errors=${integrity.errors.length}` },
    };

    const allReady = Object.values(subsystems).every((s) => s.status === "ok");

    return c.json(
      {
        status: allReady ? "ready" : "not_ready",
        subsystems,
        events: service.eventStore.globalPosition(),
        timestamp: new Date().toISOString(),
      },
      allReady ? 200 : 503,
    );
  });

  return routes;
}
