/**
 * AccessManager — role-based permission oracle with delayed operations.
 *
 * Roles map accounts to execution delays. A (target, selector) pair is
 * bound to one role; members with a zero delay may call at once, members
 * with a delay must schedule the call and wait for it to become ready.
 *
 * Administrative calls on the manager itself go through the same check:
 * each is encoded as calldata against the manager's own address and
 * authorized by the rules in `checkSelf`.
 *
 * Every mutating method is all-or-nothing: it runs inside a state store
 * transaction stamped with the caller and the current ledger time.
 */

import { encodeFunctionData } from "viem";
import type { StateStore } from "@custody-gate/state-store";
import type {
  Address,
  CallPermission,
  Hex,
  OperationId,
  RoleId,
  RoleMembership,
  ScheduledOperation,
  Seconds,
  Selector,
  Timestamp,
} from "@custody-gate/types";
import {
  CONSUMING_SCHEDULED_OP_SELECTOR,
  MANAGER_ABI,
  adminRestrictionOf,
  executionIdOf,
  firstAddressArg,
  firstRoleIdArg,
  hashOperation,
  selectorOf,
} from "./calldata.js";
import { ADMIN_ROLE, DEFAULT_EXPIRATION, DEFAULT_MIN_SETBACK } from "./constants.js";
import { AccessManagerError } from "./errors.js";
import { PermissionRegistry } from "./registry.js";
import type { AccessDetail } from "./registry.js";
import type { ExecutableTarget, ManagedTarget } from "./targets.js";
import type { Clock } from "./time.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Narrow capability the authorization core composes with.
 */
export interface PermissionOracle {
  readonly address: Address;
  check(caller: Address, target: Address, selector: Selector): CallPermission;
  grant(caller: Address, roleId: RoleId, account: Address, executionDelay: Seconds): boolean;
  schedule(caller: Address, target: Address, data: Hex, when?: Timestamp): ScheduledOperation;
  consume(target: ManagedTarget, caller: Address, data: Hex): number;
}

/** Runs before every authorized grant; throws to reject it. */
export type GrantGuard = (roleId: RoleId, account: Address, executionDelay: Seconds) => void;

/** Runs before every authorized target function binding; throws to reject it. */
export type BindingGuard = (target: Address, selector: Selector, roleId: RoleId) => void;

export interface AccessManagerOptions {
  readonly address: Address;
  readonly initialAdmin: Address;
  readonly store: StateStore;
  readonly clock: Clock;
  /** Seconds after its ready time that a schedule stays consumable. */
  readonly expiration?: Seconds;
  readonly minSetback?: Seconds;
  readonly grantGuard?: GrantGuard;
  readonly bindingGuard?: BindingGuard;
}

export interface ExecutionResult {
  readonly nonce: number;
  readonly result: unknown;
}

interface SelfPermission extends CallPermission {
  /** Role the caller was checked against. */
  readonly roleId: RoleId;
}

const DENIED: CallPermission = { immediate: false, delay: 0 };

function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

// =============================================================================
// AccessManager
// =============================================================================

export class AccessManager implements PermissionOracle {
  readonly address: Address;
  readonly expiration: Seconds;
  /** Unchecked state; mutations through it bypass authorization. */
  readonly registry: PermissionRegistry;

  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly grantGuard: GrantGuard | undefined;
  private readonly bindingGuard: BindingGuard | undefined;
  private readonly executing: string[] = [];

  constructor(options: AccessManagerOptions) {
    const expiration = options.expiration ?? DEFAULT_EXPIRATION;
    if (!Number.isSafeInteger(expiration) || expiration <= 0) {
      throw new RangeError(`Schedule expiration must be a positive number of seconds, got ${expiration}`);
    }

    this.address = options.address;
    this.expiration = expiration;
    this.store = options.store;
    this.clock = options.clock;
    this.grantGuard = options.grantGuard;
    this.bindingGuard = options.bindingGuard;
    this.registry = new PermissionRegistry({
      address: options.address,
      store: options.store,
      clock: options.clock,
      minSetback: options.minSetback ?? DEFAULT_MIN_SETBACK,
    });

    // Bootstrap grant: skips the grant guard.
    this.call(this.address, () => this.registry.grant(ADMIN_ROLE, options.initialAdmin, 0, 0));
  }

  get minSetback(): Seconds {
    return this.registry.minSetback;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Whether `caller` may call `selector` on `target` now, or after a delay.
   */
  check(caller: Address, target: Address, selector: Selector): CallPermission {
    if (this.registry.isTargetClosed(target)) {
      return DENIED;
    }
    if (sameAddress(caller, this.address)) {
      return { immediate: this.isExecuting(target, selector), delay: 0 };
    }
    const roleId = this.registry.getTargetFunctionRole(target, selector);
    const { isMember, executionDelay } = this.registry.hasRole(roleId, caller);
    if (!isMember) {
      return DENIED;
    }
    return { immediate: executionDelay === 0, delay: executionDelay };
  }

  hasRole(roleId: RoleId, account: Address): RoleMembership {
    return this.registry.hasRole(roleId, account);
  }

  getAccess(roleId: RoleId, account: Address): AccessDetail {
    return this.registry.getAccess(roleId, account);
  }

  getRoleAdmin(roleId: RoleId): RoleId {
    return this.registry.getRoleAdmin(roleId);
  }

  getRoleGuardian(roleId: RoleId): RoleId {
    return this.registry.getRoleGuardian(roleId);
  }

  getRoleGrantDelay(roleId: RoleId): Seconds {
    return this.registry.getRoleGrantDelay(roleId);
  }

  getTargetFunctionRole(target: Address, selector: Selector): RoleId {
    return this.registry.getTargetFunctionRole(target, selector);
  }

  isTargetClosed(target: Address): boolean {
    return this.registry.isTargetClosed(target);
  }

  getTargetAdminDelay(target: Address): Seconds {
    return this.registry.getTargetAdminDelay(target);
  }

  /** Ready time of a pending schedule; 0 if there is none or it has expired. */
  getSchedule(operationId: OperationId): Timestamp {
    const { timepoint } = this.registry.schedule(operationId);
    return timepoint === 0 || this.isExpired(timepoint) ? 0 : timepoint;
  }

  getNonce(operationId: OperationId): number {
    return this.registry.schedule(operationId).nonce;
  }

  hashOperation(caller: Address, target: Address, data: Hex): OperationId {
    return hashOperation(caller, target, data);
  }

  /** True while the manager is relaying a call to `selector` on `target`. */
  isExecuting(target: Address, selector: Selector): boolean {
    const current = this.executing[this.executing.length - 1];
    return current === executionIdOf(target, selector);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles
  // ───────────────────────────────────────────────────────────────────────

  labelRole(caller: Address, roleId: RoleId, label: string): void {
    const data = encodeFunctionData({ abi: MANAGER_ABI, functionName: "labelRole", args: [roleId, label] });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.labelRole(roleId, label);
    });
  }

  /**
   * Grant `roleId` to `account`. Requires the role's admin role.
   * Returns true when `account` was not a member before.
   */
  grant(caller: Address, roleId: RoleId, account: Address, executionDelay: Seconds): boolean {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "grantRole",
      args: [roleId, account, executionDelay],
    });
    return this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.grantGuard?.(roleId, account, executionDelay);
      return this.registry.grant(
        roleId,
        account,
        this.registry.getRoleGrantDelay(roleId),
        executionDelay,
      );
    });
  }

  revokeRole(caller: Address, roleId: RoleId, account: Address): boolean {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "revokeRole",
      args: [roleId, account],
    });
    return this.call(caller, () => {
      this.checkAuthorized(caller, data);
      return this.registry.revoke(roleId, account);
    });
  }

  /**
   * Give up `roleId`. `callerConfirmation` must repeat the caller's address.
   */
  renounceRole(caller: Address, roleId: RoleId, callerConfirmation: Address): boolean {
    if (!sameAddress(caller, callerConfirmation)) {
      throw new AccessManagerError(
        "BAD_CONFIRMATION",
        "Only the account itself can renounce its role",
        { account: callerConfirmation },
      );
    }
    return this.call(caller, () => this.registry.revoke(roleId, caller));
  }

  setRoleAdmin(caller: Address, roleId: RoleId, admin: RoleId): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setRoleAdmin",
      args: [roleId, admin],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.setRoleAdmin(roleId, admin);
    });
  }

  setRoleGuardian(caller: Address, roleId: RoleId, guardian: RoleId): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setRoleGuardian",
      args: [roleId, guardian],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.setRoleGuardian(roleId, guardian);
    });
  }

  setGrantDelay(caller: Address, roleId: RoleId, newDelay: Seconds): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setGrantDelay",
      args: [roleId, newDelay],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.setGrantDelay(roleId, newDelay);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Targets
  // ───────────────────────────────────────────────────────────────────────

  setTargetFunctionRole(
    caller: Address,
    target: Address,
    selectors: readonly Selector[],
    roleId: RoleId,
  ): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setTargetFunctionRole",
      args: [target, selectors, roleId],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      for (const selector of selectors) {
        this.bindingGuard?.(target, selector, roleId);
        this.registry.setTargetFunctionRole(target, selector, roleId);
      }
    });
  }

  setTargetAdminDelay(caller: Address, target: Address, newDelay: Seconds): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setTargetAdminDelay",
      args: [target, newDelay],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.setTargetAdminDelay(target, newDelay);
    });
  }

  setTargetClosed(caller: Address, target: Address, closed: boolean): void {
    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setTargetClosed",
      args: [target, closed],
    });
    this.call(caller, () => {
      this.checkAuthorized(caller, data);
      this.registry.setTargetClosed(target, closed);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Delayed operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Schedule `data` on `target` for `caller`. The ready time is `when`,
   * or the earliest allowed time if `when` is 0.
   *
   * @throws AccessManagerError UNAUTHORIZED_CALL if the caller has no delay
   *   for the call or `when` is earlier than now plus that delay
   * @throws AccessManagerError ALREADY_SCHEDULED if a live schedule exists
   */
  schedule(caller: Address, target: Address, data: Hex, when: Timestamp = 0): ScheduledOperation {
    const selector = selectorOf(data);
    return this.call(caller, () => {
      const { delay } = this.checkExtended(caller, target, data);
      const minWhen = this.clock.now() + delay;
      if (delay === 0 || (when > 0 && when < minWhen)) {
        throw new AccessManagerError(
          "UNAUTHORIZED_CALL",
          `${caller} cannot schedule ${selector} on ${target}`,
          { caller, target, selector },
        );
      }

      const readyAt = Math.max(when, minWhen);
      const operationId = hashOperation(caller, target, data);
      const previous = this.registry.schedule(operationId);
      if (previous.timepoint !== 0 && !this.isExpired(previous.timepoint)) {
        throw new AccessManagerError(
          "ALREADY_SCHEDULED",
          `Operation ${operationId} is already scheduled`,
          { operationId },
        );
      }

      const nonce = previous.nonce + 1;
      this.registry.writeSchedule(operationId, { timepoint: readyAt, nonce });
      this.registry.emit("operation.scheduled", {
        operationId,
        nonce,
        readyAt,
        caller: caller.toLowerCase(),
        target: target.toLowerCase(),
        data,
      });
      return { operationId, nonce, readyAt };
    });
  }

  /**
   * Consume the schedule of `caller` for `data` on `target`. Only accepted
   * while the target reports that it is consuming a scheduled operation.
   * Returns the nonce of the consumed schedule.
   *
   * `target` is trusted as given: only the schedule hashed with
   * `target.address` is consumed, but nothing here proves the object is
   * that target. Hand it only objects the host process controls; a target
   * outside the process goes through `AuthorizationCore.authorizeCall`
   * under an authenticated identity.
   */
  consume(target: ManagedTarget, caller: Address, data: Hex): number {
    if (target.isConsumingScheduledOp() !== CONSUMING_SCHEDULED_OP_SELECTOR) {
      throw new AccessManagerError(
        "UNAUTHORIZED_CONSUME",
        `${target.address} is not consuming a scheduled operation`,
        { target: target.address },
      );
    }
    return this.call(caller, () => this.consumeOperation(hashOperation(caller, target.address, data)));
  }

  /**
   * Relay `data` to `target` on behalf of `caller`, consuming a schedule
   * when the caller's permission is delayed. While relaying, `check` grants
   * the manager itself immediate access to exactly that target function.
   */
  execute(caller: Address, target: ExecutableTarget, data: Hex): ExecutionResult {
    const selector = selectorOf(data);
    return this.call(caller, () => {
      const { immediate, delay } = this.checkExtended(caller, target.address, data);
      if (!immediate && delay === 0) {
        throw new AccessManagerError(
          "UNAUTHORIZED_CALL",
          `${caller} cannot call ${selector} on ${target.address}`,
          { caller, target: target.address, selector },
        );
      }

      const operationId = hashOperation(caller, target.address, data);
      let nonce = 0;
      if (delay !== 0 || this.getSchedule(operationId) !== 0) {
        nonce = this.consumeOperation(operationId);
      }

      this.executing.push(executionIdOf(target.address, selector));
      try {
        return { nonce, result: target.dispatch(this.address, data) };
      } finally {
        this.executing.pop();
      }
    });
  }

  /**
   * Cancel a schedule. `sender` must be the scheduling caller, an
   * ADMIN_ROLE member, or a guardian of the role bound to the call.
   */
  cancel(sender: Address, caller: Address, target: Address, data: Hex): number {
    const selector = selectorOf(data);
    return this.call(sender, () => {
      const operationId = hashOperation(caller, target, data);
      const { timepoint, nonce } = this.registry.schedule(operationId);
      if (timepoint === 0) {
        throw notScheduled(operationId);
      }
      if (!sameAddress(sender, caller)) {
        const guardian = this.registry.getRoleGuardian(
          this.registry.getTargetFunctionRole(target, selector),
        );
        const allowed =
          this.registry.hasRole(ADMIN_ROLE, sender).isMember ||
          this.registry.hasRole(guardian, sender).isMember;
        if (!allowed) {
          throw new AccessManagerError(
            "UNAUTHORIZED_CANCEL",
            `${sender} cannot cancel ${selector} on ${target} scheduled by ${caller}`,
            { sender, caller, target, selector },
          );
        }
      }

      this.registry.writeSchedule(operationId, { timepoint: 0, nonce });
      this.registry.emit("operation.canceled", { operationId, nonce });
      return nonce;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private call<T>(actor: Address, body: () => T): T {
    return this.store.transaction({ actor, timestamp: this.clock.now() }, body);
  }

  private isExpired(timepoint: Timestamp): boolean {
    return timepoint + this.expiration <= this.clock.now();
  }

  private checkExtended(caller: Address, target: Address, data: Hex): CallPermission {
    if (sameAddress(target, this.address)) {
      return this.checkSelf(caller, data);
    }
    return this.check(caller, target, selectorOf(data));
  }

  /**
   * Permission of `caller` for a call on the manager itself. Administrative
   * calls are restricted by `adminRestrictionOf`; anything else by the
   * role bound to its selector, and only while the manager is open.
   */
  private checkSelf(caller: Address, data: Hex): SelfPermission {
    const selector = selectorOf(data);
    if (sameAddress(caller, this.address)) {
      return { immediate: this.isExecuting(this.address, selector), delay: 0, roleId: ADMIN_ROLE };
    }

    let roleId: RoleId = ADMIN_ROLE;
    let operationDelay: Seconds = 0;
    switch (adminRestrictionOf(selector)) {
      case "admin":
        break;
      case "target-admin":
        operationDelay = this.registry.getTargetAdminDelay(firstAddressArg(data));
        break;
      case "role-admin":
        roleId = this.registry.getRoleAdmin(firstRoleIdArg(data));
        break;
      case undefined:
        if (this.registry.isTargetClosed(this.address)) {
          return { ...DENIED, roleId: ADMIN_ROLE };
        }
        roleId = this.registry.getTargetFunctionRole(this.address, selector);
        break;
    }

    const { isMember, executionDelay } = this.registry.hasRole(roleId, caller);
    if (!isMember) {
      return { ...DENIED, roleId };
    }
    const delay = Math.max(operationDelay, executionDelay);
    return { immediate: delay === 0, delay, roleId };
  }

  private checkAuthorized(caller: Address, data: Hex): void {
    const { immediate, delay, roleId } = this.checkSelf(caller, data);
    if (immediate) return;
    if (delay === 0) {
      throw new AccessManagerError(
        "UNAUTHORIZED_ACCOUNT",
        `${caller} is missing role ${roleId.toString(10)}`,
        { account: caller, roleId },
      );
    }
    this.consumeOperation(hashOperation(caller, this.address, data));
  }

  private consumeOperation(operationId: OperationId): number {
    const { timepoint, nonce } = this.registry.schedule(operationId);
    if (timepoint === 0) {
      throw notScheduled(operationId);
    }
    if (timepoint > this.clock.now()) {
      throw new AccessManagerError(
        "NOT_READY",
        `Operation ${operationId} is not ready until ${timepoint}`,
        { operationId, readyAt: timepoint },
      );
    }
    if (this.isExpired(timepoint)) {
      throw new AccessManagerError("EXPIRED", `Operation ${operationId} has expired`, {
        operationId,
      });
    }

    this.registry.writeSchedule(operationId, { timepoint: 0, nonce });
    this.registry.emit("operation.executed", { operationId, nonce });
    return nonce;
  }
}

function notScheduled(operationId: OperationId): AccessManagerError<"NOT_SCHEDULED"> {
  return new AccessManagerError(
    "NOT_SCHEDULED",
    `Operation ${operationId} is not scheduled`,
    { operationId },
  );
}
