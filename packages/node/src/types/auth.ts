/**
 * Caller identity.
 *
 * Every API request acts on behalf of one address. It is resolved either
 * from an API key (X-Api-Key) or, when no keys are configured, from the
 * X-Caller-Address header.
 */

import type { Address } from "@cliffline/types";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly address: Address;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}
