/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStakingRoutes } from "./staking.js";
export { createAccountRoutes } from "./accounts.js";
export { createAssetRoutes } from "./assets.js";
export { createLedgerRoutes } from "./ledger.js";
export { createEventRoutes } from "./events.js";
