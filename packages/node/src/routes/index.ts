/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createBalanceRoutes } from "./balances.js";
export { createOperationRoutes } from "./operations.js";
export { createStatsRoutes } from "./stats.js";
export { createEventRoutes } from "./events.js";
export { createAdminRoutes } from "./admin.js";
export { createFaucetRoutes } from "./faucet.js";
