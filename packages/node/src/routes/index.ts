/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMemberRoutes } from "./members.js";
export { createProposalRoutes } from "./proposals.js";
export { createCourseRoutes } from "./courses.js";
export { createEnrollmentRoutes } from "./enrollments.js";
export { createRatingRoutes, createTeacherRoutes } from "./ratings.js";
export { createTreasuryRoutes } from "./treasury.js";
export { createAdminRoutes } from "./admin.js";
export { createLedgerRoutes } from "./ledger.js";
export type { LedgerRouteOptions } from "./ledger.js";
export { createEventRoutes } from "./events.js";
