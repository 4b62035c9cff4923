/**
 * Vesting manager routes.
 *
 * POST /api/v1/managers                                    — Initialize the caller's manager
 * GET  /api/v1/managers/:owner                             — Manager summary and reserve balance
 * GET  /api/v1/managers/:owner/schedules                   — List schedules
 * POST /api/v1/managers/:owner/schedules                   — Create a schedule
 * GET  /api/v1/managers/:owner/schedules/:index            — Get one schedule
 * POST /api/v1/managers/:owner/schedules/:index/pause      — Pause a schedule
 * POST /api/v1/managers/:owner/schedules/:index/resume     — Resume a schedule
 * GET  /api/v1/managers/:owner/claimable/:beneficiary      — Claimable amount (?at=seconds)
 * POST /api/v1/managers/:owner/reserve                     — Fund the claim reserve
 */

import { Hono } from "hono";
import { normalizeAddress } from "@cliffline/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  ClaimableQuerySchema,
  CreateScheduleSchema,
  FundReserveSchema,
  LifecycleSchema,
  toFundingResponse,
  toScheduleResponse,
  toStatusChangeResponse,
} from "../types/dto.js";
import type { ManagerResponse } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

/**
 * Path indices are decimal integers; anything else is passed on as NaN
 * so the vesting core reports SCHEDULE_NOT_FOUND.
 */
function parseIndex(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
}

export function createManagerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/managers — Initialize
  routes.post("/", (c) => {
    const service = c.get("service");
    const caller = c.get("auth").address;
    const info = service.initialize(caller);
    return c.json({ data: info }, 201);
  });

  // GET /api/v1/managers/:owner
  routes.get("/:owner", (c) => {
    const service = c.get("service");
    const info = service.getManager(c.req.param("owner"));
    const data: ManagerResponse = {
      ...info,
      reserveBalance: service.reserveBalance(info.owner).toString(),
    };
    return c.json({ data });
  });

  // GET /api/v1/managers/:owner/schedules
  routes.get("/:owner/schedules", (c) => {
    const service = c.get("service");
    const views = service.listSchedules(c.req.param("owner"));
    return c.json({ data: views.map(toScheduleResponse) });
  });

  // POST /api/v1/managers/:owner/schedules
  routes.post(
    "/:owner/schedules",
    validateBody(CreateScheduleSchema),
    (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");
      const view = service.createSchedule(c.get("auth").address, {
        ...body,
        owner: c.req.param("owner"),
      });
      return c.json({ data: toScheduleResponse(view) }, 201);
    },
  );

  // GET /api/v1/managers/:owner/schedules/:index
  routes.get("/:owner/schedules/:index", (c) => {
    const service = c.get("service");
    const index = parseIndex(c.req.param("index"));
    const schedule = service.getSchedule(c.req.param("owner"), index);
    return c.json({ data: toScheduleResponse({ index, schedule }) });
  });

  // POST /api/v1/managers/:owner/schedules/:index/pause
  routes.post(
    "/:owner/schedules/:index/pause",
    validateBody(LifecycleSchema),
    (c) => {
      const service = c.get("service");
      const change = service.pause(c.get("auth").address, {
        owner: c.req.param("owner"),
        beneficiary: c.get("validatedBody").beneficiary,
        index: parseIndex(c.req.param("index")),
      });
      return c.json({ data: toStatusChangeResponse(change) });
    },
  );

  // POST /api/v1/managers/:owner/schedules/:index/resume
  routes.post(
    "/:owner/schedules/:index/resume",
    validateBody(LifecycleSchema),
    (c) => {
      const service = c.get("service");
      const change = service.resume(c.get("auth").address, {
        owner: c.req.param("owner"),
        beneficiary: c.get("validatedBody").beneficiary,
        index: parseIndex(c.req.param("index")),
      });
      return c.json({ data: toStatusChangeResponse(change) });
    },
  );

  // GET /api/v1/managers/:owner/claimable/:beneficiary
  routes.get("/:owner/claimable/:beneficiary", (c) => {
    const service = c.get("service");

    const queryResult = ClaimableQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const owner = c.req.param("owner");
    const beneficiary = c.req.param("beneficiary");
    const at = queryResult.data.at;
    const amount = service.claimableAmount(beneficiary, owner, at);

    return c.json({
      data: {
        owner: normalizeAddress(owner),
        beneficiary: normalizeAddress(beneficiary),
        amount: amount.toString(),
        at: at ?? service.clock.now(),
      },
    });
  });

  // POST /api/v1/managers/:owner/reserve
  routes.post("/:owner/reserve", validateBody(FundReserveSchema), (c) => {
    const service = c.get("service");
    const result = service.fundReserve(
      c.get("auth").address,
      c.req.param("owner"),
      c.get("validatedBody").amount,
    );
    return c.json({ data: toFundingResponse(result) }, 201);
  });

  return routes;
}
