/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AcademyService } from "../services/academy-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Collegium app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by the logger middleware) */
    requestId: string;

    /** The organization's service (set by app.ts) */
    service: AcademyService;

    /** Calling account, when one was presented (set by auth middleware) */
    auth: AuthContext | undefined;
  };
}
