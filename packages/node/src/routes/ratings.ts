/**
 * Rating and bonus routes.
 *
 * POST /api/v1/courses/:id/ratings      - Rate a course teacher (enrolled student)
 * POST /api/v1/courses/:id/bonus        - Rating-weighted bonus (board)
 * GET  /api/v1/teachers/:account/rating - Aggregate rating and bonus weight
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BonusSchema, GiveRatingSchema } from "../types/dto.js";
import { toSplitView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { parseId } from "./params.js";

export function createRatingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:id/ratings", validateBody(GiveRatingSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const { teacher, value } = c.req.valid("json");
    const result = c.get("service").academy.giveRating(callerOf(c), id, teacher, value);
    return c.json({ data: result }, 201);
  });

  routes.post("/:id/bonus", validateBody(BonusSchema), (c) => {
    const id = parseId(c.req.param("id"));
    const { amount } = c.req.valid("json");
    const split = c.get("service").academy.distributeBonusByRating(callerOf(c), id, amount);
    return c.json({ data: toSplitView(split) });
  });

  return routes;
}

export function createTeacherRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account/rating", (c) => {
    const account = c.req.param("account");
    const { academy } = c.get("service");
    const stats = academy.teacherRatingStats(account);
    return c.json({
      data: {
        account,
        sum: stats.sum,
        count: stats.count,
        average: academy.averageRating(account),
        bonusWeight: academy.bonusWeight(account).toString(),
      },
    });
  });

  return routes;
}
