/**
 * Path parameter parsing shared by the routes.
 */

import { IdParamSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

/**
 * @throws ApiError 400 unless `raw` is a positive integer
 */
export function parseId(raw: string | undefined, label = "id"): number {
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ApiError(400, "VALIDATION_ERROR", `Invalid ${label}: "${raw ?? ""}"`);
  }
  return result.data;
}
