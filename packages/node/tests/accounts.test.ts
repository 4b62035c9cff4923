import { describe, it, expect } from "vitest";
import { ALICE, OWNER, callerHeaders, createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody } from "./setup.js";

describe("GET /api/v1/accounts/:address", () => {
  it("reports genesis balances with the token's units", async () => {
    const { app } = createTestApp({
      allocations: [{ address: OWNER, amount: 123_456_789n }],
    });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/0xF00D", "GET", undefined, callerHeaders(ALICE)),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        address: OWNER,
        balance: "123456789",
        formatted: "1.23456789",
        symbol: "VEST",
        decimals: 8,
      },
    });
  });

  it("reports zero for unknown accounts", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest(`/api/v1/accounts/${ALICE}`, "GET", undefined, callerHeaders(ALICE)),
    );
    const body = (await res.json()) as { data: { balance: string; formatted: string } };
    expect(body.data.balance).toBe("0");
    expect(body.data.formatted).toBe("0.00000000");
  });

  it("rejects malformed addresses", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/accounts/alice", "GET", undefined, callerHeaders(ALICE)),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: 'Invalid address "alice"',
    });
  });
});
