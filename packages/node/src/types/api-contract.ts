/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { VestingService } from "../services/vesting-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vesting service backing every route */
    service: VestingService;

    /** Authenticated caller (set by auth middleware on /api routes) */
    auth: AuthContext;
  };
}
