/**
 * Test helpers for @cliffline/node.
 *
 * Builds the Hono app with all middleware and routes, a manual clock and
 * a funded owner account, but no HTTP server.
 */

import { ManualClock } from "@cliffline/vesting";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { AuthConfig } from "../src/middleware/auth.js";
import type { GenesisAllocation } from "../src/services/vesting-service.js";

export const OWNER = "0xf00d";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";

/** Start of every test timeline, in seconds */
export const T0 = 1_700_000_000;

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

export interface TestAppOptions {
  readonly auth?: AuthConfig;
  readonly allocations?: readonly GenesisAllocation[];
}

export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = new ManualClock(T0);
  const instance = createApp({
    serviceConfig: {
      symbol: "VEST",
      decimals: 8,
      clock,
      allocations: options.allocations ?? [{ address: OWNER, amount: 10_000n }],
    },
    auth: options.auth,
  });
  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Headers identifying `address` as the caller.
 */
export function callerHeaders(address: string): Record<string, string> {
  return { "X-Caller-Address": address };
}

export interface DataBody<T> {
  data: T;
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
