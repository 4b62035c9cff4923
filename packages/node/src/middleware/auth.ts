/**
 * Caller identification middleware.
 *
 * Two strategies, chosen once when the app is built:
 * 1. API key via X-Api-Key header → the address registered for that key
 * 2. Without configured keys, the X-Caller-Address header names the caller
 *
 * On success, sets `c.set("auth", authContext)`. On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress, isNullAddress, normalizeAddress } from "@cliffline/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ADDRESS_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Authenticate by API key. Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", address: normalizeAddress(record.address) });
    return next();
  };
}

/**
 * Trust the X-Caller-Address header. For development and tests only.
 */
export function callerAddressMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const address = c.req.header(CALLER_ADDRESS_HEADER);
    if (address === undefined) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHORIZED",
          `${CALLER_ADDRESS_HEADER} header is required`,
        ),
        401,
      );
    }
    if (!isAddress(address) || isNullAddress(address)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Invalid caller address "${address}"`),
        401,
      );
    }

    c.set("auth", { type: "header", address: normalizeAddress(address) });
    return next();
  };
}
