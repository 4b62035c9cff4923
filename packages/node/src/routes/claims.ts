/**
 * Claim routes.
 *
 * POST /api/v1/claims — Release everything vested to the caller
 *                       (optional body `{ owner? }`, defaulting to the caller)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ClaimSchema, toClaimResponse } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createClaimRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(ClaimSchema, { allowEmpty: true }), (c) => {
    const service = c.get("service");
    const result = service.claim(
      c.get("auth").address,
      c.get("validatedBody").owner,
    );
    return c.json({ data: toClaimResponse(result) });
  });

  return routes;
}
