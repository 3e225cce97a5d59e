/**
 * @stakewell/node — HTTP node for the staking ledger.
 *
 * The server itself starts from main.ts; this module is the
 * package's public API.
 */

export { StakingService } from "./services/staking-service.js";
export type { StakingServiceConfig, ReadinessReport } from "./services/staking-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
