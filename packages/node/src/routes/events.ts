/**
 * Event query routes.
 *
 * GET /api/v1/events            — Global event log (?fromPosition=&limit=)
 * GET /api/v1/events/:streamId  — One stream, e.g. vesting:0xf00d (?fromVersion=&limit=)
 *
 * Pages are read one event past `limit` to tell whether more remain.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { fromPosition, limit } = queryResult.data;
    const events = service.readAllEvents({ fromPosition, maxCount: limit + 1 });
    const page = events.slice(0, limit);
    const last = page[page.length - 1];

    return c.json({
      data: page,
      pagination: {
        limit,
        hasMore: events.length > limit,
        nextPosition: events.length > limit && last !== undefined ? last.globalPosition + 1 : null,
      },
    });
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");

    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { fromVersion, limit } = queryResult.data;
    const events = service.readStreamEvents(streamId, { fromVersion, maxCount: limit + 1 });
    const page = events.slice(0, limit);
    const last = page[page.length - 1];

    return c.json({
      data: page,
      pagination: {
        limit,
        hasMore: events.length > limit,
        nextVersion: events.length > limit && last !== undefined ? last.version + 1 : null,
      },
    });
  });

  return routes;
}
