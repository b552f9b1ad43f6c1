/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes, createCoinRoutes, createAccountRoutes } from "./tokens.js";
export { createStakingRoutes } from "./staking.js";
export { createGovernanceRoutes } from "./governance.js";
export { createAccessRoutes } from "./access.js";
export { createEventRoutes } from "./events.js";
