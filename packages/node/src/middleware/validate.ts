/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema through Hono's
 * validator, so handlers read the parsed value with `c.req.valid("json")`.
 * Returns 400 with error envelope on validation failure.
 */

import { validator } from "hono/validator";
import type { ZodError, ZodTypeAny, z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T extends ZodTypeAny>(schema: T) {
  return validator("json", (value, c): z.output<T> | Response => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
