/**
 * Course catalog routes.
 *
 * POST   /api/v1/courses      - Publish a course (teachers only)
 * GET    /api/v1/courses      - List courses (cursor pagination, ?includeRemoved)
 * GET    /api/v1/courses/:id  - Get an active course
 * DELETE /api/v1/courses/:id  - Soft-delete (listed teacher or board)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateCourseSchema, ListCoursesQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { toCourseView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { parseId } from "./params.js";

export function createCourseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateCourseSchema), (c) => {
    const body = c.req.valid("json");
    const course = c.get("service").academy.createCourse(callerOf(c), {
      title: body.title,
      price: body.price,
      teachers: body.teachers,
      shares: body.shares,
    });
    return c.json({ data: toCourseView(course) }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListCoursesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const courses = c
      .get("service")
      .academy.listCourses({ includeRemoved: query.includeRemoved ?? false })
      .map(toCourseView);

    return c.json(paginate(courses, query, (course) => course.id, "id"));
  });

  routes.get("/:id", (c) => {
    const course = c.get("service").academy.getCourse(parseId(c.req.param("id")));
    return c.json({ data: toCourseView(course) });
  });

  routes.delete("/:id", (c) => {
    const id = parseId(c.req.param("id"));
    const course = c.get("service").academy.removeCourse(callerOf(c), id);
    return c.json({ data: toCourseView(course) });
  });

  return routes;
}
