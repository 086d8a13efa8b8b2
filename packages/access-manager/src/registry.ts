/**
 * PermissionRegistry — role, target and schedule state without authorization.
 *
 * Every mutation here is unchecked: callers are expected to have
 * authorized the change already. The registry enforces only the rules
 * that hold whoever asks (locked roles, admin cycles, delayed updates).
 */

import type { CallContext, StateStore } from "@custody-gate/state-store";
import type {
  Address,
  JsonValue,
  OperationId,
  RoleId,
  RoleMembership,
  Seconds,
  Selector,
  Timestamp,
} from "@custody-gate/types";
import { ADMIN_ROLE, PUBLIC_ROLE } from "./constants.js";
import { AccessManagerError } from "./errors.js";
import { allocateTables } from "./storage.js";
import type {
  AccessManagerTables,
  MemberRecord,
  RoleRecord,
  ScheduleRecord,
  TargetRecord,
} from "./storage.js";
import type { Clock, DelayState } from "./time.js";
import { delayOf, delayState, delayValue, updateDelay } from "./time.js";

export interface PermissionRegistryOptions {
  /** Address of the manager that owns this registry; actor of implicit events. */
  readonly address: Address;
  readonly store: StateStore;
  readonly clock: Clock;
  readonly minSetback: Seconds;
}

/** Membership detail of one account in one role. */
export interface AccessDetail {
  /** Time from which the membership counts, or 0 if not a member. */
  readonly since: Timestamp;
  readonly executionDelay: DelayState;
}

const EMPTY_ROLE: RoleRecord = { admin: ADMIN_ROLE, guardian: ADMIN_ROLE, grantDelay: delayOf(0) };
const OPEN_TARGET: TargetRecord = { closed: false, adminDelay: delayOf(0) };
const NO_SCHEDULE: ScheduleRecord = { timepoint: 0, nonce: 0 };

function role(roleId: RoleId): string {
  return roleId.toString(10);
}

export class PermissionRegistry {
  readonly address: Address;
  readonly minSetback: Seconds;
  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly tables: AccessManagerTables;

  constructor(options: PermissionRegistryOptions) {
    this.address = options.address;
    this.minSetback = options.minSetback;
    this.store = options.store;
    this.clock = options.clock;
    this.tables = allocateTables(options.store);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Role queries
  // ───────────────────────────────────────────────────────────────────────

  getRoleAdmin(roleId: RoleId): RoleId {
    return this.roleRecord(roleId).admin;
  }

  getRoleGuardian(roleId: RoleId): RoleId {
    return this.roleRecord(roleId).guardian;
  }

  getRoleGrantDelay(roleId: RoleId): Seconds {
    return delayValue(this.roleRecord(roleId).grantDelay, this.clock.now());
  }

  getRoleLabel(roleId: RoleId): string | undefined {
    return this.roleRecord(roleId).label;
  }

  getAccess(roleId: RoleId, account: Address): AccessDetail {
    const member = this.tables.members.get({ roleId, account });
    if (member === undefined) {
      return { since: 0, executionDelay: { value: 0 } };
    }
    return { since: member.since, executionDelay: delayState(member.delay, this.clock.now()) };
  }

  /**
   * Everyone holds PUBLIC_ROLE with no delay. Other memberships count
   * once their `since` time has been reached.
   */
  hasRole(roleId: RoleId, account: Address): RoleMembership {
    if (roleId === PUBLIC_ROLE) {
      return { isMember: true, executionDelay: 0 };
    }
    const member = this.tables.members.get({ roleId, account });
    const now = this.clock.now();
    if (member === undefined || member.since > now) {
      return { isMember: false, executionDelay: 0 };
    }
    return { isMember: true, executionDelay: delayValue(member.delay, now) };
  }

  /** Accounts with a stored membership of `roleId`, effective or not. */
  membersOf(roleId: RoleId): readonly Address[] {
    return this.tables.members
      .entries()
      .filter(([key]) => key.roleId === roleId)
      .map(([key]) => key.account);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Role mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Add `account` to `roleId`, or update its execution delay if it is
   * already a member. Returns true when the account is new to the role.
   */
  grant(roleId: RoleId, account: Address, grantDelay: Seconds, executionDelay: Seconds): boolean {
    if (roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }

    const now = this.clock.now();
    const existing = this.tables.members.get({ roleId, account });
    let since: Timestamp;
    let record: MemberRecord;
    if (existing === undefined) {
      since = now + grantDelay;
      record = { since, delay: delayOf(executionDelay) };
    } else {
      const updated = updateDelay(existing.delay, now, executionDelay, 0);
      since = updated.effect;
      record = { since: existing.since, delay: updated.delay };
    }
    this.tables.members.set({ roleId, account }, record);

    this.emit("role.granted", {
      roleId: role(roleId),
      account: account.toLowerCase(),
      executionDelay,
      since,
      newMember: existing === undefined,
    });
    return existing === undefined;
  }

  /** Remove `account` from `roleId`. Returns false if it was not a member. */
  revoke(roleId: RoleId, account: Address): boolean {
    if (roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }
    if (!this.tables.members.delete({ roleId, account })) {
      return false;
    }
    this.emit("role.revoked", { roleId: role(roleId), account: account.toLowerCase() });
    return true;
  }

  /**
   * @throws AccessManagerError ROLE_ADMIN_CYCLE if `admin` is `roleId` or
   *   already administered (directly or not) by `roleId`
   */
  setRoleAdmin(roleId: RoleId, admin: RoleId): void {
    if (roleId === ADMIN_ROLE || roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }

    const seen = new Set<RoleId>();
    let current = admin;
    for (;;) {
      if (current === roleId) {
        throw new AccessManagerError(
          "ROLE_ADMIN_CYCLE",
          `Making role ${role(admin)} the admin of role ${role(roleId)} creates a cycle`,
          { roleId, adminRoleId: admin },
        );
      }
      if (current === ADMIN_ROLE || seen.has(current)) break;
      seen.add(current);
      current = this.getRoleAdmin(current);
    }

    this.tables.roles.set(roleId, { ...this.roleRecord(roleId), admin });
    this.emit("role.admin_changed", { roleId: role(roleId), adminRoleId: role(admin) });
  }

  setRoleGuardian(roleId: RoleId, guardian: RoleId): void {
    if (roleId === ADMIN_ROLE || roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }
    this.tables.roles.set(roleId, { ...this.roleRecord(roleId), guardian });
    this.emit("role.guardian_changed", { roleId: role(roleId), guardianRoleId: role(guardian) });
  }

  setGrantDelay(roleId: RoleId, newDelay: Seconds): void {
    if (roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }
    const current = this.roleRecord(roleId);
    const { delay, effect } = updateDelay(
      current.grantDelay,
      this.clock.now(),
      newDelay,
      this.minSetback,
    );
    this.tables.roles.set(roleId, { ...current, grantDelay: delay });
    this.emit("role.grant_delay_changed", { roleId: role(roleId), delay: newDelay, since: effect });
  }

  labelRole(roleId: RoleId, label: string): void {
    if (roleId === ADMIN_ROLE || roleId === PUBLIC_ROLE) {
      throw lockedRole(roleId);
    }
    this.tables.roles.set(roleId, { ...this.roleRecord(roleId), label });
    this.emit("role.label", { roleId: role(roleId), label });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Targets
  // ───────────────────────────────────────────────────────────────────────

  /** Role bound to `selector` on `target`; ADMIN_ROLE when unbound. */
  getTargetFunctionRole(target: Address, selector: Selector): RoleId {
    return this.tables.functionRoles.get({ target, selector }) ?? ADMIN_ROLE;
  }

  isTargetClosed(target: Address): boolean {
    return this.targetRecord(target).closed;
  }

  getTargetAdminDelay(target: Address): Seconds {
    return delayValue(this.targetRecord(target).adminDelay, this.clock.now());
  }

  setTargetFunctionRole(target: Address, selector: Selector, roleId: RoleId): void {
    this.tables.functionRoles.set({ target, selector }, roleId);
    this.emit("target.function_role_updated", {
      target: target.toLowerCase(),
      selector: selector.toLowerCase(),
      roleId: role(roleId),
    });
  }

  setTargetClosed(target: Address, closed: boolean): void {
    this.tables.targets.set(target, { ...this.targetRecord(target), closed });
    this.emit("target.closed", { target: target.toLowerCase(), closed });
  }

  setTargetAdminDelay(target: Address, newDelay: Seconds): void {
    const current = this.targetRecord(target);
    const { delay, effect } = updateDelay(
      current.adminDelay,
      this.clock.now(),
      newDelay,
      this.minSetback,
    );
    this.tables.targets.set(target, { ...current, adminDelay: delay });
    this.emit("target.admin_delay_updated", {
      target: target.toLowerCase(),
      delay: newDelay,
      since: effect,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Schedules
  // ───────────────────────────────────────────────────────────────────────

  schedule(operationId: OperationId): ScheduleRecord {
    return this.tables.schedules.get(operationId) ?? NO_SCHEDULE;
  }

  writeSchedule(operationId: OperationId, record: ScheduleRecord): void {
    this.tables.schedules.set(operationId, record);
  }

  /** Emit an access manager event, stamped by the enclosing call if there is one. */
  emit(type: string, payload: Readonly<Record<string, JsonValue>>): void {
    const fallback: CallContext = { actor: this.address, timestamp: this.clock.now() };
    this.store.emit("access-manager", type, payload, fallback);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private roleRecord(roleId: RoleId): RoleRecord {
    return this.tables.roles.get(roleId) ?? EMPTY_ROLE;
  }

  private targetRecord(target: Address): TargetRecord {
    return this.tables.targets.get(target) ?? OPEN_TARGET;
  }
}

function lockedRole(roleId: RoleId): AccessManagerError<"LOCKED_ROLE"> {
  return new AccessManagerError("LOCKED_ROLE", `Role ${role(roleId)} is locked`, { roleId });
}
