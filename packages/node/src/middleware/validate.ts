/**
 * Zod request validation.
 *
 * Parses the JSON body or query string against a Zod schema and throws
 * an ApiError (400) on failure, so the global error handler renders
 * the envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body against a Zod schema.
 */
export async function readValidatedBody<T>(c: Context, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/**
 * Validate the query string against a Zod schema.
 */
export function readValidatedQuery<T>(c: Context, schema: Schema<T>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
