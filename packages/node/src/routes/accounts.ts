/**
 * Account routes.
 *
 * GET /api/v1/accounts/:address — Token balance of an address
 */

import { Hono } from "hono";
import { formatUnits } from "@cliffline/ledger";
import { isAddress } from "@cliffline/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const service = c.get("service");
    const address = c.req.param("address");

    if (!isAddress(address)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid address "${address}"`),
        400,
      );
    }

    const account = service.account(address);
    return c.json({
      data: {
        address: account.address,
        balance: account.balance.toString(),
        formatted: formatUnits(account.balance, account.decimals),
        symbol: account.symbol,
        decimals: account.decimals,
      },
    });
  });

  return routes;
}
