/**
 * AuthorizationCore — authorization and timelock service for vault targets.
 *
 * Composes the access manager (roles, bindings, schedules) with the
 * redemption lock ledger, the per-role minimal execution delays, the
 * bootstrap latch and the vault latches. The core shares the manager's
 * address: its own restricted operations are bound as target functions
 * of that address.
 *
 * Each public mutator runs as one state store transaction; any error
 * unwinds every write and every pending event of the call.
 */

import { encodeFunctionData } from "viem";
import {
  ADMIN_ROLE,
  AccessManager,
  ConsumingScope,
  PUBLIC_ROLE,
  selectorOf,
} from "@custody-gate/access-manager";
import type { Clock, ManagedTarget } from "@custody-gate/access-manager";
import type { StateStore } from "@custody-gate/state-store";
import { isSeconds } from "@custody-gate/types";
import type {
  Address,
  CallPermission,
  Hex,
  InitializationData,
  RoleId,
  Seconds,
  Selector,
  Timestamp,
} from "@custody-gate/types";
import { AuthorityError, unauthorized } from "./errors.js";
import { ExecutionDelayRegistry } from "./execution-delay-registry.js";
import { InitializationGuard } from "./initialization-guard.js";
import { DEFAULT_CLASSIFIER } from "./operation-classifier.js";
import type { OperationClassifier } from "./operation-classifier.js";
import { RedemptionLockLedger } from "./redemption-lock-ledger.js";
import { Roles } from "./roles.js";
import { AUTHORITY_ABI } from "./selectors.js";
import { allocateTables } from "./storage.js";
import {
  PUBLIC_DEPOSIT_SELECTORS,
  SHARE_TRANSFER_SELECTORS,
  VaultLatches,
} from "./vault-latches.js";

/** Upper bound of the redemption delay: 7 days. */
export const MAX_REDEMPTION_DELAY: Seconds = 7 * 24 * 60 * 60;

export interface AuthorizationCoreOptions {
  readonly address: Address;
  readonly initialAdmin: Address;
  readonly redemptionDelay: Seconds;
  readonly store: StateStore;
  readonly clock: Clock;
  readonly expiration?: Seconds;
  readonly minSetback?: Seconds;
  readonly classifier?: OperationClassifier;
}

/** Outcome of a gated call: its permission and the nonce of any consumed schedule. */
export interface AuthorizedCall extends CallPermission {
  readonly nonce: number;
}

export class AuthorizationCore implements ManagedTarget {
  readonly address: Address;
  readonly manager: AccessManager;

  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly delays: ExecutionDelayRegistry;
  private readonly locks: RedemptionLockLedger;
  private readonly initialization: InitializationGuard;
  private readonly latches: VaultLatches;
  private readonly consuming = new ConsumingScope();

  /**
   * @throws AuthorityError INVALID_REDEMPTION_DELAY if the delay is not a
   *   whole, non-negative number of seconds
   * @throws AuthorityError TOO_LONG_REDEMPTION_DELAY if the delay exceeds
   *   MAX_REDEMPTION_DELAY
   */
  constructor(options: AuthorizationCoreOptions) {
    if (!isSeconds(options.redemptionDelay)) {
      throw new AuthorityError(
        "INVALID_REDEMPTION_DELAY",
        `Redemption delay ${options.redemptionDelay} is not a whole number of seconds`,
        { redemptionDelay: options.redemptionDelay },
      );
    }
    if (options.redemptionDelay > MAX_REDEMPTION_DELAY) {
      throw new AuthorityError(
        "TOO_LONG_REDEMPTION_DELAY",
        `Redemption delay ${options.redemptionDelay} exceeds ${MAX_REDEMPTION_DELAY} seconds`,
        { redemptionDelay: options.redemptionDelay },
      );
    }

    this.address = options.address;
    this.store = options.store;
    this.clock = options.clock;

    const tables = allocateTables(options.store);
    this.delays = new ExecutionDelayRegistry(options.store, tables.minimalExecutionDelays);
    this.locks = new RedemptionLockLedger(
      options.store,
      tables.redemptionLocks,
      options.classifier ?? DEFAULT_CLASSIFIER,
      options.redemptionDelay,
    );
    this.initialization = new InitializationGuard(tables.initialization);
    this.latches = new VaultLatches(options.store, tables.vaultLatches);

    this.manager = new AccessManager({
      address: options.address,
      initialAdmin: options.initialAdmin,
      store: options.store,
      clock: options.clock,
      ...(options.expiration !== undefined ? { expiration: options.expiration } : {}),
      ...(options.minSetback !== undefined ? { minSetback: options.minSetback } : {}),
      grantGuard: (roleId, _account, executionDelay) =>
        this.delays.assertAllowed(roleId, executionDelay),
      bindingGuard: (target, selector, roleId) =>
        this.latches.assertRebindable(target, selector, roleId),
    });
  }

  /** Redemption delay fixed at construction. */
  get REDEMPTION_DELAY_IN_SECONDS(): Seconds {
    return this.locks.redemptionDelay;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Authorization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Apply redemption lock rules for `caller`, then report its permission
   * for `selector` on `target`. Not a pure read: a deposit-class call
   * moves the caller's unlock time.
   *
   * @throws AuthorityError ACCOUNT_IS_LOCKED before any permission check
   */
  canCallAndUpdate(caller: Address, target: Address, selector: Selector): CallPermission {
    return this.transaction(caller, () => {
      this.locks.check(caller, selector, this.clock.now());
      return this.manager.check(caller, target, selector);
    });
  }

  /**
   * Gate a call of `caller` carrying `data` on a target outside this
   * process, the way `AccessManagedTarget.restricted` gates one inside it.
   * A delayed caller consumes its ready schedule; a denial throws, so the
   * lock bookkeeping of a refused call never persists.
   *
   * `target` must be the authenticated identity of the target asking.
   *
   * @throws AuthorityError ACCESS_MANAGED_UNAUTHORIZED when denied outright
   */
  authorizeCall(target: Address, caller: Address, data: Hex): AuthorizedCall {
    const selector = selectorOf(data);
    return this.transaction(caller, () => {
      const { immediate, delay } = this.canCallAndUpdate(caller, target, selector);
      if (immediate) {
        return { immediate, delay, nonce: 0 };
      }
      if (delay === 0) {
        throw unauthorized(caller);
      }

      const scope = new ConsumingScope();
      const remote: ManagedTarget = {
        address: target,
        isConsumingScheduledOp: () => scope.marker(),
      };
      const nonce = scope.run(() => this.manager.consume(remote, caller, data));
      return { immediate, delay, nonce };
    });
  }

  /**
   * Run `body` as one all-or-nothing call stamped with `caller`.
   * Guarded targets wrap their whole call in this, so that a denial after
   * a lock update unwinds the update.
   */
  transaction<T>(caller: Address, body: () => T): T {
    return this.store.transaction({ actor: caller, timestamp: this.clock.now() }, body);
  }

  isConsumingScheduledOp(): Selector {
    return this.consuming.marker();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * One-time bootstrap: binds function roles (and hands cancellation of
   * every operational role to GUARDIAN), sets minimal delays, admin roles,
   * then grants roles under the minimal delay floor.
   *
   * @throws AuthorityError ALREADY_INITIALIZED on any call after the first success
   */
  initialize(caller: Address, data: InitializationData): void {
    this.transaction(caller, () => {
      // First: a repeated call fails whatever its data
      this.initialization.enter();
      const calldata = encodeFunctionData({
        abi: AUTHORITY_ABI,
        functionName: "initialize",
        args: [
          {
            roleToFunctions: data.roleToFunctions.map((binding) => ({
              target: binding.target,
              roleId: binding.roleId,
              functionSelector: binding.functionSelector,
              minimalExecutionDelay: BigInt(binding.minimalExecutionDelay),
            })),
            adminRoles: data.adminRoles.map((binding) => ({ ...binding })),
            accountToRoles: data.accountToRoles.map((grant) => ({ ...grant })),
          },
        ],
      });
      this.checkCanCall(caller, calldata);

      const registry = this.manager.registry;
      for (const binding of data.roleToFunctions) {
        registry.setTargetFunctionRole(binding.target, binding.functionSelector, binding.roleId);
        if (
          binding.roleId !== ADMIN_ROLE &&
          binding.roleId !== Roles.GUARDIAN &&
          binding.roleId !== PUBLIC_ROLE
        ) {
          registry.setRoleGuardian(binding.roleId, Roles.GUARDIAN);
        }
      }

      this.delays.setMany(
        data.roleToFunctions.map((binding) => binding.roleId),
        data.roleToFunctions.map((binding) => binding.minimalExecutionDelay),
      );

      for (const { roleId, adminRoleId } of data.adminRoles) {
        registry.setRoleAdmin(roleId, adminRoleId);
      }

      for (const grant of data.accountToRoles) {
        this.delays.assertAllowed(grant.roleId, grant.executionDelay);
        registry.grant(
          grant.roleId,
          grant.account,
          registry.getRoleGrantDelay(grant.roleId),
          grant.executionDelay,
        );
      }

      this.store.emit("authority", "authority.initialized", {
        roleToFunctions: data.roleToFunctions.length,
        adminRoles: data.adminRoles.length,
        accountToRoles: data.accountToRoles.length,
      });
    });
  }

  /** Open or close `target` to every caller. */
  updateTargetClosed(caller: Address, target: Address, closed: boolean): void {
    const calldata = encodeFunctionData({
      abi: AUTHORITY_ABI,
      functionName: "updateTargetClosed",
      args: [target, closed],
    });
    this.transaction(caller, () => {
      this.checkCanCall(caller, calldata);
      this.manager.registry.setTargetClosed(target, closed);
    });
  }

  /** Open deposit, mint and deposit-with-permit on `vault` to anyone. One-way. */
  convertToPublicVault(caller: Address, vault: Address): void {
    const calldata = encodeFunctionData({
      abi: AUTHORITY_ABI,
      functionName: "convertToPublicVault",
      args: [vault],
    });
    this.transaction(caller, () => {
      this.checkCanCall(caller, calldata);
      this.bindPublic(vault, PUBLIC_DEPOSIT_SELECTORS);
      this.latches.latchPublic(vault);
    });
  }

  /** Open transfer and transfer-from on `vault` to anyone. One-way. */
  enableTransferShares(caller: Address, vault: Address): void {
    const calldata = encodeFunctionData({
      abi: AUTHORITY_ABI,
      functionName: "enableTransferShares",
      args: [vault],
    });
    this.transaction(caller, () => {
      this.checkCanCall(caller, calldata);
      this.bindPublic(vault, SHARE_TRANSFER_SELECTORS);
      this.latches.latchTransferable(vault);
    });
  }

  /**
   * @throws AuthorityError ARRAY_LENGTH_MISMATCH if the arrays differ in length
   */
  setMinimalExecutionDelaysForRoles(
    caller: Address,
    roleIds: readonly RoleId[],
    delays: readonly Seconds[],
  ): void {
    const calldata = encodeFunctionData({
      abi: AUTHORITY_ABI,
      functionName: "setMinimalExecutionDelaysForRoles",
      args: [roleIds, delays.map((delay) => BigInt(delay))],
    });
    this.transaction(caller, () => {
      this.checkCanCall(caller, calldata);
      this.delays.setMany(roleIds, delays);
    });
  }

  /**
   * Grant through the manager with the role's minimal delay enforced.
   *
   * @throws AuthorityError TOO_SHORT_EXECUTION_DELAY_FOR_ROLE
   */
  grantRole(caller: Address, roleId: RoleId, account: Address, executionDelay: Seconds): boolean {
    return this.manager.grant(caller, roleId, account, executionDelay);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getMinimalExecutionDelayForRole(roleId: RoleId): Seconds {
    return this.delays.get(roleId);
  }

  getAccountLockTime(account: Address): Timestamp {
    return this.locks.lockTime(account);
  }

  isInitialized(): boolean {
    return this.initialization.initialized;
  }

  isPublicVault(vault: Address): boolean {
    return this.latches.isPublic(vault);
  }

  isTransferSharesEnabled(vault: Address): boolean {
    return this.latches.isTransferable(vault);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Authorize a restricted call on the core. A delayed caller consumes
   * its schedule with the consuming marker set.
   */
  private checkCanCall(caller: Address, calldata: Hex): void {
    const { immediate, delay } = this.manager.check(caller, this.address, selectorOf(calldata));
    if (immediate) return;
    if (delay > 0) {
      this.consuming.run(() => this.manager.consume(this, caller, calldata));
      return;
    }
    throw unauthorized(caller);
  }

  private bindPublic(vault: Address, selectors: readonly Selector[]): void {
    for (const selector of selectors) {
      this.manager.registry.setTargetFunctionRole(vault, selector, PUBLIC_ROLE);
    }
  }
}
