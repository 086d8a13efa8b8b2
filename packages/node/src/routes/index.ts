/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAuthorityRoutes } from "./authority.js";
export { createRoleRoutes } from "./roles.js";
export { createTargetRoutes } from "./targets.js";
export { createOperationRoutes } from "./operations.js";
export { createEventRoutes } from "./events.js";
