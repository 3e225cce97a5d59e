/**
 * Zod validation middleware.
 *
 * Validates the JSON body or the query string against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv, ValidatedQueryEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/** Any schema producing T, whatever it accepts as input. */
type SchemaOf<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 */
export function validateBody<T>(
  schema: SchemaOf<T>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Validate query parameters against a Zod schema.
 *
 * On success, sets `validatedQuery` in context variables.
 */
export function validateQuery<T>(
  schema: SchemaOf<T>,
): MiddlewareHandler<ValidatedQueryEnv<T>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
