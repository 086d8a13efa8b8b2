/**
 * @custody-gate/access-manager — Role-based permission oracle.
 *
 * Provides:
 * - Roles with admins, guardians, grant delays and per-member execution delays
 * - Target function bindings and closed targets
 * - Schedule, execute, cancel and consume of delayed operations, with expiry
 * - The consuming-marker protocol for managed targets
 *
 * @packageDocumentation
 */

export { ADMIN_ROLE, PUBLIC_ROLE, DEFAULT_EXPIRATION, DEFAULT_MIN_SETBACK } from "./constants.js";
export { AccessManagerError, isAccessManagerError } from "./errors.js";
export type { AccessManagerErrorCode, AccessManagerErrorDetails } from "./errors.js";
export {
  CONSUMING_SCHEDULED_OP_SELECTOR,
  ZERO_SELECTOR,
  MANAGER_ABI,
  selectorOf,
  hashOperation,
} from "./calldata.js";
export { SystemClock, ManualClock, delayOf, delayValue, delayState, updateDelay } from "./time.js";
export type { Clock, Delay, DelayState } from "./time.js";
export { ConsumingScope } from "./targets.js";
export type { ManagedTarget, ExecutableTarget } from "./targets.js";
export { PermissionRegistry } from "./registry.js";
export type { AccessDetail, PermissionRegistryOptions } from "./registry.js";
export { NAMESPACES as ACCESS_MANAGER_NAMESPACES } from "./storage.js";
export { AccessManager } from "./access-manager.js";
export type {
  AccessManagerOptions,
  BindingGuard,
  ExecutionResult,
  GrantGuard,
  PermissionOracle,
} from "./access-manager.js";
