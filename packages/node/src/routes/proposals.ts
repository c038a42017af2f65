/**
 * Admission proposal routes.
 *
 * POST /api/v1/proposals              - Open a proposal
 * GET  /api/v1/proposals              - List proposals (cursor pagination)
 * GET  /api/v1/proposals/:id          - Get a proposal with its status
 * POST /api/v1/proposals/:id/votes    - Vote as a member of the electorate
 * POST /api/v1/proposals/:id/execute  - Resolve after the window closed
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CastVoteSchema,
  CreateProposalSchema,
  PaginationQuerySchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { parseId } from "./params.js";

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateProposalSchema), (c) => {
    const body = c.req.valid("json");
    const proposal = c
      .get("service")
      .academy.createAdmissionProposal(callerOf(c), body.candidate, body.role);
    return c.json({ data: proposal }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = PaginationQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const { academy } = c.get("service");
    const proposals = academy
      .listProposals()
      .map((p) => ({ ...p, status: academy.proposalStatus(p.id) }));

    return c.json(paginate(proposals, queryResult.data, (p) => p.id, "id"));
  });

  routes.get("/:id", (c) => {
    const id = parseId(c.req.param("id"));
    const { academy } = c.get("service");
    const proposal = academy.getProposal(id);
    return c.json({ data: { ...proposal, status: academy.proposalStatus(id) } });
  });

  routes.post("/:id/votes", validateBody(CastVoteSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const { support } = c.req.valid("json");
    const proposal = c.get("service").academy.castVote(callerOf(c), id, support);
    return c.json({ data: proposal });
  });

  routes.post("/:id/execute", (c) => {
    const id = parseId(c.req.param("id"));
    const result = c.get("service").academy.executeProposal(callerOf(c), id);
    return c.json({ data: result });
  });

  return routes;
}
