/**
 * Owner administration routes.
 *
 * PUT  /api/v1/admin/proposal-duration  - Voting window for new proposals
 * POST /api/v1/admin/rescue             - Move tokens out of the treasury
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ProposalDurationSchema, RescueSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/proposal-duration", validateBody(ProposalDurationSchema), (c) => {
    const { seconds } = c.req.valid("json");
    const { academy } = c.get("service");
    academy.setProposalDuration(callerOf(c), seconds);
    return c.json({ data: { seconds: academy.proposalDurationSeconds } });
  });

  routes.post("/rescue", validateBody(RescueSchema), (c) => {
    const { asset, to, amount } = c.req.valid("json");
    c.get("service").academy.rescueFunds(callerOf(c), asset, to, amount);
    return c.json({ data: { asset, to, amount: amount.toString() } });
  });

  return routes;
}
