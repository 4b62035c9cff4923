/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can build the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VestingService } from "./services/vesting-service.js";
import type { VestingServiceConfig } from "./services/vesting-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerAddressMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createManagerRoutes } from "./routes/managers.js";
import { createClaimRoutes } from "./routes/claims.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VestingServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called for every error answered with a 500 */
  readonly onUnexpectedError?: (err: Error, c: Context<AppEnv>) => void;
  /**
   * API key configuration. When omitted, callers identify themselves
   * with the X-Caller-Address header.
   */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VestingService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VestingService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.use(
    "/api/*",
    options.auth !== undefined
      ? authMiddleware(options.auth)
      : callerAddressMiddleware(),
  );

  app.route("/api/v1/managers", createManagerRoutes());
  app.route("/api/v1/claims", createClaimRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
