/**
 * Tests for request logging and request ids.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { createApp } from "../../src/app.js";
import { OWNER, callerHeaders, jsonRequest } from "../setup.js";

function appWithLog() {
  const entries: RequestLogEntry[] = [];
  const { app } = createApp({
    serviceConfig: { symbol: "VEST", decimals: 8 },
    logFn: (entry) => entries.push(entry),
  });
  return { app, entries };
}

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const { app, entries } = appWithLog();

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs the status the error handler produced", async () => {
    const { app, entries } = appWithLog();

    await app.request(jsonRequest("/api/v1/managers", "POST", undefined, callerHeaders(OWNER)));
    await app.request(jsonRequest("/api/v1/managers", "POST", undefined, callerHeaders(OWNER)));

    expect(entries.map((e) => [e.method, e.status])).toEqual([
      ["POST", 201],
      ["POST", 409],
    ]);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes an incoming request id", async () => {
    const { app } = appWithLog();
    const res = await app.request("/health", { headers: { "X-Request-Id": "req-42" } });
    expect(res.headers.get("X-Request-Id")).toBe("req-42");
  });

  it("generates a UUID when none or an oversized one is sent", async () => {
    const { app } = appWithLog();
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    const fresh = await app.request("/health");
    expect(fresh.headers.get("X-Request-Id")).toMatch(uuid);

    const oversized = await app.request("/health", {
      headers: { "X-Request-Id": "x".repeat(129) },
    });
    expect(oversized.headers.get("X-Request-Id")).toMatch(uuid);
  });
});
