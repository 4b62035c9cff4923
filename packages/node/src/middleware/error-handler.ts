/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Known domain errors (VestingError, LedgerError, EventStoreError) keep
 * their code and message; anything else becomes a 500.
 */

import type { Context, ErrorHandler } from "hono";
import { EventStoreError } from "@cliffline/event-store";
import { LedgerError } from "@cliffline/ledger";
import { VestingError } from "@cliffline/vesting";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainStatus = 400 | 403 | 404 | 409 | 422;

const STATUS_MAP: Readonly<Record<string, DomainStatus>> = {
  // Vesting errors
  MANAGER_NOT_FOUND: 404,
  SCHEDULE_NOT_FOUND: 404,
  ALREADY_INITIALIZED: 409,
  INVALID_VESTING_PARAMS: 400,
  INVALID_BENEFICIARY: 400,
  NOT_OWNER: 403,
  NO_CLAIMABLE_AMOUNT: 422,

  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  INSUFFICIENT_BALANCE: 422,

  // Event store errors
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
};

type DomainError = VestingError | LedgerError | EventStoreError;

function asDomainError(err: Error): DomainError | undefined {
  if (
    err instanceof VestingError ||
    err instanceof LedgerError ||
    err instanceof EventStoreError
  ) {
    return err;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. `onUnexpected` sees every error that ends
 * up as a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context<AppEnv>) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    const domain = asDomainError(err);
    const status = domain === undefined ? undefined : STATUS_MAP[domain.code];
    if (domain !== undefined && status !== undefined) {
      return c.json(createErrorEnvelope(domain.code, domain.message), status);
    }

    onUnexpected?.(err, c);
    return c.json(
      createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
      500,
    );
  };
}

/**
 * Default handler with no reporting.
 */
export const handleError: ErrorHandler<AppEnv> = createErrorHandler();
