/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id header or generates a new UUID.
 * Incoming ids longer than MAX_REQUEST_ID_LENGTH are replaced.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";
export const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      existing !== undefined && existing !== "" && existing.length <= MAX_REQUEST_ID_LENGTH
        ? existing
        : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
