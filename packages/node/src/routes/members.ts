/**
 * Membership queries.
 *
 * GET /api/v1/members/:role             - Members of a role, in admission order
 * GET /api/v1/members/account/:account  - Role held by an account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { MemberRoleSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createMemberRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/account/:account", (c) => {
    const account = c.req.param("account");
    const role = c.get("service").academy.roleOf(account);
    return c.json({ data: { account, role } });
  });

  routes.get("/:role", (c) => {
    const parsed = MemberRoleSchema.safeParse(c.req.param("role"));
    if (!parsed.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Role must be one of board, teacher, student"),
        400,
      );
    }
    const role = parsed.data;
    const members = c.get("service").academy.members(role);
    return c.json({ data: { role, members } });
  });

  return routes;
}
