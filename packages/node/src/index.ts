/**
 * @cliffline/node — HTTP service for the vesting ledger.
 *
 * @packageDocumentation
 */

export { VestingService } from "./services/vesting-service.js";
export type {
  VestingServiceConfig,
  GenesisAllocation,
  AccountView,
} from "./services/vesting-service.js";
export { loadConfig, parseApiKeys, parseAllocations, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, ParsedAllocation } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
