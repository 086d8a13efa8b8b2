/**
 * Access Types
 *
 * Authorization verdicts, redemption classification and the
 * one-time bootstrap data of an authority.
 */

import type {
  Address,
  OperationId,
  RoleId,
  Seconds,
  Selector,
  Timestamp,
} from "./primitives.js";

/**
 * Result of an authorization check.
 *
 * - `immediate`: the caller may run the guarded body now
 * - `delay`: seconds a scheduled call must wait; 0 with `immediate: false`
 *   means the caller is denied
 */
export interface CallPermission {
  readonly immediate: boolean;
  readonly delay: Seconds;
}

/**
 * How an operation participates in redemption locking.
 */
export type OperationClass = "deposit" | "withdraw" | "other";

/**
 * Membership of an account in a role.
 */
export interface RoleMembership {
  readonly isMember: boolean;
  readonly executionDelay: Seconds;
}

/**
 * A scheduled operation as seen by callers.
 */
export interface ScheduledOperation {
  readonly operationId: OperationId;
  readonly nonce: number;
  readonly readyAt: Timestamp;
}

// =============================================================================
// Bootstrap
// =============================================================================

/** Binds one operation on one target to the role allowed to call it. */
export interface RoleToFunction {
  readonly target: Address;
  readonly roleId: RoleId;
  readonly functionSelector: Selector;
  readonly minimalExecutionDelay: Seconds;
}

/** Sets the admin role of a role. */
export interface AdminRoleBinding {
  readonly roleId: RoleId;
  readonly adminRoleId: RoleId;
}

/** Grants a role to an account with an execution delay. */
export interface AccountToRole {
  readonly roleId: RoleId;
  readonly account: Address;
  readonly executionDelay: Seconds;
}

/**
 * Input of the one-time authority bootstrap.
 */
export interface InitializationData {
  readonly roleToFunctions: readonly RoleToFunction[];
  readonly adminRoles: readonly AdminRoleBinding[];
  readonly accountToRoles: readonly AccountToRole[];
}
