/**
 * @custody-gate/types — Shared types for the custody authorization stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming code, not in types
 */

// Primitives
export type {
  Hex,
  Address,
  Selector,
  RoleId,
  Seconds,
  Timestamp,
  OperationId,
} from "./primitives.js";

// Access
export type {
  CallPermission,
  OperationClass,
  RoleMembership,
  ScheduledOperation,
  RoleToFunction,
  AdminRoleBinding,
  AccountToRole,
  InitializationData,
} from "./access.js";

// Events
export type {
  EventSource,
  EventMetadata,
  DomainEvent,
  JsonValue,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isSelector,
  isOperationId,
  isRoleId,
  isSeconds,
  isDelay,
  MAX_DELAY,
} from "./guards.js";
