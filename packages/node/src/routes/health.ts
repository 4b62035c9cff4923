/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service up and event hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.checkIntegrity();
    const ready = service.isReady() && integrity.valid;

    const body = {
      status: ready ? "ready" : "not_ready",
      eventStore: {
        status: integrity.valid ? "ok" : "down",
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
