/**
 * Tests for AccessManager: role administration, target bindings,
 * delayed operations and the consuming-marker protocol.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { encodeFunctionData } from "viem";
import { InMemoryEventStore } from "@custody-gate/event-store";
import { StateStore } from "@custody-gate/state-store";
import type { Address, CallPermission, Hex, RoleId, Selector } from "@custody-gate/types";
import { AccessManager } from "../src/access-manager.js";
import type { AccessManagerOptions } from "../src/access-manager.js";
import { MANAGER_ABI, selectorOf } from "../src/calldata.js";
import { ADMIN_ROLE, DEFAULT_EXPIRATION, DEFAULT_MIN_SETBACK, PUBLIC_ROLE } from "../src/constants.js";
import { AccessManagerError } from "../src/errors.js";
import { ConsumingScope } from "../src/targets.js";
import type { ExecutableTarget, ManagedTarget } from "../src/targets.js";
import { ManualClock } from "../src/time.js";

const MANAGER: Address = "0x00000000000000000000000000000000000000aa";
const ADMIN: Address = "0x1111111111111111111111111111111111111111";
const ALICE: Address = "0x2222222222222222222222222222222222222222";
const BOB: Address = "0x3333333333333333333333333333333333333333";
const TARGET: Address = "0x4444444444444444444444444444444444444444";

const SEL: Selector = "0x12345678";
const SEL2: Selector = "0x87654321";
const DATA: Hex = "0x123456780000000000000000000000000000000000000000000000000000000000000001";
const DATA2: Hex = "0x87654321";

const ROLE: RoleId = 5n;

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

/** Target that asks the manager about every call relayed to it. */
class RecordingTarget implements ExecutableTarget {
  readonly address: Address = TARGET;
  readonly scope = new ConsumingScope();
  readonly seen: CallPermission[] = [];

  constructor(private readonly manager: AccessManager) {}

  isConsumingScheduledOp(): Selector {
    return this.scope.marker();
  }

  dispatch(sender: Address, data: Hex): unknown {
    const permission = this.manager.check(sender, this.address, selectorOf(data));
    this.seen.push(permission);
    return permission.immediate;
  }
}

let clock: ManualClock;
let events: InMemoryEventStore;
let store: StateStore;
let manager: AccessManager;
let target: RecordingTarget;

function createManager(overrides: Partial<AccessManagerOptions> = {}): AccessManager {
  return new AccessManager({ address: MANAGER, initialAdmin: ADMIN, store, clock, ...overrides });
}

beforeEach(() => {
  clock = new ManualClock(1000);
  events = new InMemoryEventStore();
  store = new StateStore({ events });
  manager = createManager();
  target = new RecordingTarget(manager);
});

// =============================================================================
// Construction
// =============================================================================

describe("construction", () => {
  it("grants ADMIN_ROLE to the initial admin with no delay", () => {
    expect(manager.hasRole(ADMIN_ROLE, ADMIN)).toEqual({ isMember: true, executionDelay: 0 });
  });

  it("publishes the bootstrap grant under the manager's address", () => {
    const [first] = events.read("access-manager");
    expect(first!.event.type).toBe("role.granted");
    expect(first!.event.metadata.actor).toBe(MANAGER);
  });

  it("uses the default expiration and setback", () => {
    expect(manager.expiration).toBe(DEFAULT_EXPIRATION);
    expect(manager.minSetback).toBe(DEFAULT_MIN_SETBACK);
  });

  it("rejects a zero expiration", () => {
    expect(() => new AccessManager({
      address: MANAGER,
      initialAdmin: ADMIN,
      store: new StateStore(),
      clock,
      expiration: 0,
    })).toThrow(RangeError);
  });
});

// =============================================================================
// check
// =============================================================================

describe("check", () => {
  it("binds unconfigured selectors to ADMIN_ROLE", () => {
    expect(manager.check(ADMIN, TARGET, SEL)).toEqual({ immediate: true, delay: 0 });
    expect(manager.check(ALICE, TARGET, SEL)).toEqual({ immediate: false, delay: 0 });
  });

  it("opens PUBLIC_ROLE selectors to anyone", () => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], PUBLIC_ROLE);
    expect(manager.check(BOB, TARGET, SEL)).toEqual({ immediate: true, delay: 0 });
  });

  it("reports the member's execution delay", () => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], ROLE);
    manager.grant(ADMIN, ROLE, ALICE, 300);
    expect(manager.check(ALICE, TARGET, SEL)).toEqual({ immediate: false, delay: 300 });
  });

  it("denies everyone on a closed target", () => {
    manager.setTargetClosed(ADMIN, TARGET, true);
    expect(manager.check(ADMIN, TARGET, SEL)).toEqual({ immediate: false, delay: 0 });
    expect(manager.isTargetClosed(TARGET)).toBe(true);
  });

  it("keeps administrative calls open when the manager itself is closed", () => {
    manager.setTargetClosed(ADMIN, MANAGER, true);
    expect(manager.grant(ADMIN, ROLE, ALICE, 0)).toBe(true);
  });
});

// =============================================================================
// Roles
// =============================================================================

describe("grant", () => {
  it("requires the admin of the role", () => {
    expect(thrown(() => manager.grant(ALICE, ROLE, BOB, 0))).toMatchObject({
      code: "UNAUTHORIZED_ACCOUNT",
      details: { account: ALICE, roleId: ADMIN_ROLE },
    });
  });

  it("lets a role's admin role grant it", () => {
    manager.setRoleAdmin(ADMIN, ROLE, 6n);
    manager.grant(ADMIN, 6n, ALICE, 0);

    expect(manager.grant(ALICE, ROLE, BOB, 0)).toBe(true);
    expect(manager.hasRole(ROLE, BOB).isMember).toBe(true);
    expect(thrown(() => manager.grant(ADMIN, ROLE, BOB, 0))).toMatchObject({
      code: "UNAUTHORIZED_ACCOUNT",
      details: { account: ADMIN, roleId: 6n },
    });
  });

  it("delays new memberships by the role's grant delay", () => {
    manager.setGrantDelay(ADMIN, ROLE, 100);
    expect(manager.getRoleGrantDelay(ROLE)).toBe(0);

    clock.advance(DEFAULT_MIN_SETBACK);
    expect(manager.getRoleGrantDelay(ROLE)).toBe(100);

    manager.grant(ADMIN, ROLE, ALICE, 0);
    expect(manager.hasRole(ROLE, ALICE).isMember).toBe(false);
    expect(manager.getAccess(ROLE, ALICE).since).toBe(1000 + DEFAULT_MIN_SETBACK + 100);

    clock.advance(100);
    expect(manager.hasRole(ROLE, ALICE).isMember).toBe(true);
  });

  it("lowers an existing member's delay only after the difference", () => {
    manager.grant(ADMIN, ROLE, ALICE, 600);
    expect(manager.grant(ADMIN, ROLE, ALICE, 100)).toBe(false);
    expect(manager.hasRole(ROLE, ALICE).executionDelay).toBe(600);
    expect(manager.getAccess(ROLE, ALICE).executionDelay).toEqual({
      value: 600,
      pending: { value: 100, effect: 1500 },
    });

    clock.advance(500);
    expect(manager.hasRole(ROLE, ALICE).executionDelay).toBe(100);
  });

  it("raises an existing member's delay at once", () => {
    manager.grant(ADMIN, ROLE, ALICE, 100);
    manager.grant(ADMIN, ROLE, ALICE, 900);
    expect(manager.hasRole(ROLE, ALICE).executionDelay).toBe(900);
  });

  it("refuses to grant PUBLIC_ROLE", () => {
    expect(thrown(() => manager.grant(ADMIN, PUBLIC_ROLE, ALICE, 0))).toMatchObject({
      code: "LOCKED_ROLE",
      details: { roleId: PUBLIC_ROLE },
    });
  });

  it("publishes role.granted with the caller as actor", () => {
    manager.grant(ADMIN, ROLE, ALICE, 300);
    const granted = events.read("access-manager", { type: "role.granted" });
    const last = granted[granted.length - 1]!;

    expect(granted).toHaveLength(2);
    expect(last.event.metadata.actor).toBe(ADMIN);
    expect(last.event.metadata.timestamp).toBe(1000);
    expect(last.event.payload).toEqual({
      roleId: "5",
      account: ALICE,
      executionDelay: 300,
      since: 1000,
      newMember: true,
    });
  });

  it("leaves no trace when the grant guard rejects", () => {
    manager = createManager({
      store: (store = new StateStore({ events: (events = new InMemoryEventStore()) })),
      grantGuard: (_roleId, _account, executionDelay) => {
        if (executionDelay < 100) throw new RangeError("delay too short");
      },
    });

    expect(() => manager.grant(ADMIN, ROLE, ALICE, 10)).toThrow(RangeError);
    expect(manager.hasRole(ROLE, ALICE).isMember).toBe(false);
    expect(events.read("access-manager", { type: "role.granted" })).toHaveLength(1);
  });
});

describe("revoke and renounce", () => {
  beforeEach(() => {
    manager.grant(ADMIN, ROLE, ALICE, 0);
  });

  it("revokes once", () => {
    expect(manager.revokeRole(ADMIN, ROLE, ALICE)).toBe(true);
    expect(manager.revokeRole(ADMIN, ROLE, ALICE)).toBe(false);
    expect(manager.hasRole(ROLE, ALICE).isMember).toBe(false);
  });

  it("requires the caller to confirm its own address", () => {
    expect(thrown(() => manager.renounceRole(ALICE, ROLE, BOB))).toMatchObject({
      code: "BAD_CONFIRMATION",
      details: { account: BOB },
    });
    expect(manager.renounceRole(ALICE, ROLE, ALICE)).toBe(true);
    expect(manager.hasRole(ROLE, ALICE).isMember).toBe(false);
  });
});

describe("role configuration", () => {
  it("rejects an admin binding that closes a cycle", () => {
    manager.setRoleAdmin(ADMIN, ROLE, 6n);
    expect(thrown(() => manager.setRoleAdmin(ADMIN, 6n, ROLE))).toMatchObject({
      code: "ROLE_ADMIN_CYCLE",
      details: { roleId: 6n, adminRoleId: ROLE },
    });
    expect(manager.getRoleAdmin(6n)).toBe(ADMIN_ROLE);
  });

  it("rejects a role administering itself", () => {
    expect(thrown(() => manager.setRoleAdmin(ADMIN, 7n, 7n))).toMatchObject({
      code: "ROLE_ADMIN_CYCLE",
    });
  });

  it("locks the admin and label of ADMIN_ROLE", () => {
    expect(thrown(() => manager.setRoleAdmin(ADMIN, ADMIN_ROLE, ROLE))).toMatchObject({
      code: "LOCKED_ROLE",
    });
    expect(thrown(() => manager.labelRole(ADMIN, ADMIN_ROLE, "root"))).toMatchObject({
      code: "LOCKED_ROLE",
    });
  });

  it("restricts configuration to ADMIN_ROLE", () => {
    expect(thrown(() => manager.labelRole(ALICE, ROLE, "ops"))).toMatchObject({
      code: "UNAUTHORIZED_ACCOUNT",
      details: { account: ALICE, roleId: ADMIN_ROLE },
    });
  });

  it("sets guardians", () => {
    manager.setRoleGuardian(ADMIN, ROLE, 9n);
    expect(manager.getRoleGuardian(ROLE)).toBe(9n);
  });
});

// =============================================================================
// Targets
// =============================================================================

describe("target configuration", () => {
  it("runs the binding guard for every selector, all-or-nothing", () => {
    const calls: [Address, Selector, RoleId][] = [];
    manager = createManager({
      store: (store = new StateStore()),
      bindingGuard: (boundTarget, selector, roleId) => {
        calls.push([boundTarget, selector, roleId]);
        if (selector === SEL2) throw new RangeError("latched");
      },
    });

    expect(() => manager.setTargetFunctionRole(ADMIN, TARGET, [SEL, SEL2], ROLE)).toThrow(
      RangeError,
    );
    expect(calls).toEqual([
      [TARGET, SEL, ROLE],
      [TARGET, SEL2, ROLE],
    ]);
    expect(manager.getTargetFunctionRole(TARGET, SEL)).toBe(ADMIN_ROLE);
  });

  it("applies the target admin delay to closing the target", () => {
    manager.setTargetAdminDelay(ADMIN, TARGET, 3600);
    expect(manager.getTargetAdminDelay(TARGET)).toBe(0);

    clock.advance(DEFAULT_MIN_SETBACK);
    expect(manager.getTargetAdminDelay(TARGET)).toBe(3600);

    expect(thrown(() => manager.setTargetClosed(ADMIN, TARGET, true))).toMatchObject({
      code: "NOT_SCHEDULED",
    });

    const data = encodeFunctionData({
      abi: MANAGER_ABI,
      functionName: "setTargetClosed",
      args: [TARGET, true],
    });
    const scheduled = manager.schedule(ADMIN, MANAGER, data);
    expect(scheduled.readyAt).toBe(1000 + DEFAULT_MIN_SETBACK + 3600);

    clock.advance(3600);
    manager.setTargetClosed(ADMIN, TARGET, true);
    expect(manager.isTargetClosed(TARGET)).toBe(true);
  });
});

// =============================================================================
// Delayed operations
// =============================================================================

describe("schedule and consume", () => {
  beforeEach(() => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], ROLE);
    manager.grant(ADMIN, ROLE, ALICE, 300);
  });

  it("schedules at now plus the caller's delay", () => {
    const scheduled = manager.schedule(ALICE, TARGET, DATA);
    expect(scheduled).toEqual({
      operationId: manager.hashOperation(ALICE, TARGET, DATA),
      nonce: 1,
      readyAt: 1300,
    });
    expect(manager.getSchedule(scheduled.operationId)).toBe(1300);
  });

  it("honours a later requested time and rejects an earlier one", () => {
    expect(thrown(() => manager.schedule(ALICE, TARGET, DATA, 1100))).toMatchObject({
      code: "UNAUTHORIZED_CALL",
      details: { caller: ALICE, target: TARGET, selector: SEL },
    });
    expect(manager.schedule(ALICE, TARGET, DATA, 5000).readyAt).toBe(5000);
  });

  it("rejects callers without a delay", () => {
    expect(thrown(() => manager.schedule(ADMIN, TARGET, DATA2))).toMatchObject({
      code: "UNAUTHORIZED_CALL",
    });
    expect(thrown(() => manager.schedule(BOB, TARGET, DATA))).toMatchObject({
      code: "UNAUTHORIZED_CALL",
    });
  });

  it("rejects a second live schedule of the same operation", () => {
    manager.schedule(ALICE, TARGET, DATA);
    expect(thrown(() => manager.schedule(ALICE, TARGET, DATA))).toMatchObject({
      code: "ALREADY_SCHEDULED",
    });
  });

  it("only consumes while the target reports the marker", () => {
    manager.schedule(ALICE, TARGET, DATA);
    clock.advance(300);
    expect(thrown(() => manager.consume(target, ALICE, DATA))).toMatchObject({
      code: "UNAUTHORIZED_CONSUME",
      details: { target: TARGET },
    });
  });

  it("consumes once the ready time is reached", () => {
    const { operationId } = manager.schedule(ALICE, TARGET, DATA);

    expect(thrown(() => target.scope.run(() => manager.consume(target, ALICE, DATA)))).toMatchObject({
      code: "NOT_READY",
      details: { operationId, readyAt: 1300 },
    });

    clock.advance(300);
    expect(target.scope.run(() => manager.consume(target, ALICE, DATA))).toBe(1);
    expect(manager.getSchedule(operationId)).toBe(0);
    expect(manager.getNonce(operationId)).toBe(1);
    expect(target.scope.active).toBe(false);

    expect(thrown(() => target.scope.run(() => manager.consume(target, ALICE, DATA)))).toMatchObject({
      code: "NOT_SCHEDULED",
    });
  });

  it("consumes only schedules made for the target's own address", () => {
    const { operationId } = manager.schedule(ALICE, TARGET, DATA);
    clock.advance(300);

    const scope = new ConsumingScope();
    const other: ManagedTarget = {
      address: "0x7777777777777777777777777777777777777777",
      isConsumingScheduledOp: () => scope.marker(),
    };

    expect(thrown(() => scope.run(() => manager.consume(other, ALICE, DATA)))).toMatchObject({
      code: "NOT_SCHEDULED",
      details: { operationId: manager.hashOperation(ALICE, other.address, DATA) },
    });
    expect(manager.getSchedule(operationId)).toBe(1300);
  });

  it("expires schedules after the expiration window", () => {
    const { operationId } = manager.schedule(ALICE, TARGET, DATA);
    clock.advance(300 + DEFAULT_EXPIRATION);

    expect(manager.getSchedule(operationId)).toBe(0);
    expect(thrown(() => target.scope.run(() => manager.consume(target, ALICE, DATA)))).toMatchObject({
      code: "EXPIRED",
      details: { operationId },
    });

    const again = manager.schedule(ALICE, TARGET, DATA);
    expect(again.nonce).toBe(2);
    expect(again.readyAt).toBe(1300 + DEFAULT_EXPIRATION + 300);
  });
});

describe("cancel", () => {
  beforeEach(() => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], ROLE);
    manager.grant(ADMIN, ROLE, ALICE, 300);
    manager.schedule(ALICE, TARGET, DATA);
  });

  it("lets the scheduling caller cancel", () => {
    expect(manager.cancel(ALICE, ALICE, TARGET, DATA)).toBe(1);
    expect(manager.getSchedule(manager.hashOperation(ALICE, TARGET, DATA))).toBe(0);
  });

  it("lets an admin cancel", () => {
    expect(manager.cancel(ADMIN, ALICE, TARGET, DATA)).toBe(1);
  });

  it("lets the guardian of the bound role cancel", () => {
    manager.setRoleGuardian(ADMIN, ROLE, 9n);
    manager.grant(ADMIN, 9n, BOB, 0);
    expect(manager.cancel(BOB, ALICE, TARGET, DATA)).toBe(1);
  });

  it("rejects anyone else", () => {
    expect(thrown(() => manager.cancel(BOB, ALICE, TARGET, DATA))).toMatchObject({
      code: "UNAUTHORIZED_CANCEL",
      details: { sender: BOB, caller: ALICE, target: TARGET, selector: SEL },
    });
  });

  it("rejects canceling what is not scheduled", () => {
    manager.cancel(ALICE, ALICE, TARGET, DATA);
    expect(thrown(() => manager.cancel(ALICE, ALICE, TARGET, DATA))).toMatchObject({
      code: "NOT_SCHEDULED",
    });
  });
});

describe("execute", () => {
  beforeEach(() => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], ROLE);
  });

  it("relays with the manager marked as executing that function", () => {
    manager.grant(ADMIN, ROLE, ALICE, 0);

    expect(manager.execute(ALICE, target, DATA)).toEqual({ nonce: 0, result: true });
    expect(target.seen).toEqual([{ immediate: true, delay: 0 }]);
    expect(manager.check(MANAGER, TARGET, SEL)).toEqual({ immediate: false, delay: 0 });
  });

  it("rejects non-members", () => {
    expect(thrown(() => manager.execute(BOB, target, DATA))).toMatchObject({
      code: "UNAUTHORIZED_CALL",
    });
    expect(target.seen).toHaveLength(0);
  });

  it("consumes the schedule of a delayed caller", () => {
    manager.grant(ADMIN, ROLE, ALICE, 300);
    expect(thrown(() => manager.execute(ALICE, target, DATA))).toMatchObject({
      code: "NOT_SCHEDULED",
    });

    manager.schedule(ALICE, TARGET, DATA);
    clock.advance(300);
    expect(manager.execute(ALICE, target, DATA).nonce).toBe(1);
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("state export", () => {
  it("restores roles and bindings into a fresh store", () => {
    manager.setTargetFunctionRole(ADMIN, TARGET, [SEL], ROLE);
    manager.grant(ADMIN, ROLE, ALICE, 300);
    const exported = store.exportState();

    store = new StateStore();
    const restored = createManager();
    store.importState(exported);

    expect(restored.hasRole(ROLE, ALICE)).toEqual({ isMember: true, executionDelay: 300 });
    expect(restored.getTargetFunctionRole(TARGET, SEL)).toBe(ROLE);
  });

  it("surfaces errors as AccessManagerError", () => {
    expect(thrown(() => manager.grant(ALICE, ROLE, BOB, 0))).toBeInstanceOf(AccessManagerError);
  });
});
