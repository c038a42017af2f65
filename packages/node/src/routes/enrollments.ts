/**
 * Enrollment routes, mounted under /api/v1/courses.
 *
 * POST /:id/applications                    - Apply as a student
 * GET  /:id/applications                    - Requests for a course
 * GET  /:id/applications/:student           - One request
 * POST /:id/applications/:student/votes     - Teacher committee vote
 * POST /:id/enrollment/confirm              - Pay and enroll (caller is the student)
 * POST /:id/applications/:student/complete  - Complete and pay the teachers
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EnrollmentVoteSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { toSplitView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { parseId } from "./params.js";

export function createEnrollmentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:id/applications", (c) => {
    const id = parseId(c.req.param("id"));
    const enrollment = c.get("service").academy.applyToCourse(callerOf(c), id);
    return c.json({ data: enrollment }, 201);
  });

  routes.get("/:id/applications", (c) => {
    const id = parseId(c.req.param("id"));
    return c.json({ data: c.get("service").academy.listEnrollments(id) });
  });

  routes.get("/:id/applications/:student", (c) => {
    const id = parseId(c.req.param("id"));
    const student = c.req.param("student");
    const enrollment = c.get("service").academy.getEnrollment(id, student);
    if (enrollment === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `No application from "${student}" for course #${id}`),
        404,
      );
    }
    return c.json({ data: enrollment });
  });

  routes.post(
    "/:id/applications/:student/votes",
    validateBody(EnrollmentVoteSchema),
    (c) => {
      const id = parseId(c.req.param("id"));
      const { accept } = c.req.valid("json");
      const enrollment = c
        .get("service")
        .academy.teacherVoteOnEnrollment(callerOf(c), id, c.req.param("student"), accept);
      return c.json({ data: enrollment });
    },
  );

  routes.post("/:id/enrollment/confirm", (c) => {
    const id = parseId(c.req.param("id"));
    const enrollment = c.get("service").academy.confirmEnrollment(callerOf(c), id);
    return c.json({ data: enrollment });
  });

  routes.post("/:id/applications/:student/complete", (c) => {
    const id = parseId(c.req.param("id"));
    const split = c
      .get("service")
      .academy.completeCourseAndDistribute(callerOf(c), id, c.req.param("student"));
    return c.json({ data: toSplitView(split) });
  });

  return routes;
}
