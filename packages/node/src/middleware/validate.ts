/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodTypeAny, z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Context variables added by validateBody. Hono merges them into the
 * route's environment, so handlers read a typed `validatedBody`.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

export interface ValidateBodyOptions {
  /** Treat a missing or blank body as `{}` instead of rejecting it. */
  readonly allowEmpty?: boolean | undefined;
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets the parsed (and transformed) body as `validatedBody`.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
  options: ValidateBodyOptions = {},
): MiddlewareHandler<ValidatedEnv<z.output<S>>> {
  return async (c, next) => {
    const raw = await c.req.text();
    let body: unknown = {};
    if (raw.trim().length > 0 || options.allowEmpty !== true) {
      try {
        body = JSON.parse(raw);
      } catch {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
          400,
        );
      }
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

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
