/**
 * Storage layout of the access manager.
 */

import { z } from "zod";
import { addressKey, roleIdKey, zodValue } from "@custody-gate/state-store";
import type { KeyCodec, StateStore, StorageTable, ValueCodec } from "@custody-gate/state-store";
import { isAddress, isOperationId, isSelector } from "@custody-gate/types";
import type { Address, OperationId, RoleId, Selector, Timestamp } from "@custody-gate/types";
import type { Delay } from "./time.js";

export const NAMESPACES = {
  roles: "custody-gate.storage.AccessManager.Roles",
  members: "custody-gate.storage.AccessManager.Members",
  targets: "custody-gate.storage.AccessManager.Targets",
  functionRoles: "custody-gate.storage.AccessManager.TargetFunctionRoles",
  schedules: "custody-gate.storage.AccessManager.Schedules",
} as const;

// =============================================================================
// Records
// =============================================================================

export interface RoleRecord {
  readonly admin: RoleId;
  readonly guardian: RoleId;
  readonly grantDelay: Delay;
  readonly label?: string;
}

export interface MemberRecord {
  /** Time from which the membership counts; a grant delay pushes it forward. */
  readonly since: Timestamp;
  readonly delay: Delay;
}

export interface TargetRecord {
  readonly closed: boolean;
  readonly adminDelay: Delay;
}

export interface ScheduleRecord {
  /** Ready time, or 0 once consumed or canceled. */
  readonly timepoint: Timestamp;
  readonly nonce: number;
}

export interface MemberKey {
  readonly roleId: RoleId;
  readonly account: Address;
}

export interface FunctionKey {
  readonly target: Address;
  readonly selector: Selector;
}

// =============================================================================
// Codecs
// =============================================================================

const seconds = z.number().int().nonnegative();
const roleId = z.string().regex(/^\d+$/).transform((s) => BigInt(s));

const DelaySchema = z.object({ before: seconds, after: seconds, effect: seconds });

const encodeDelay = (delay: Delay) => ({
  before: delay.before,
  after: delay.after,
  effect: delay.effect,
});

const roleValue: ValueCodec<RoleRecord> = zodValue(
  z.object({
    admin: roleId,
    guardian: roleId,
    grantDelay: DelaySchema,
    label: z.string().optional(),
  }).transform(({ label, ...rest }): RoleRecord => ({
    ...rest,
    ...(label !== undefined ? { label } : {}),
  })),
  (record) => ({
    admin: record.admin.toString(10),
    guardian: record.guardian.toString(10),
    grantDelay: encodeDelay(record.grantDelay),
    ...(record.label !== undefined ? { label: record.label } : {}),
  }),
);

const memberValue: ValueCodec<MemberRecord> = zodValue(
  z.object({ since: seconds, delay: DelaySchema }),
  (record) => ({ since: record.since, delay: encodeDelay(record.delay) }),
);

const targetValue: ValueCodec<TargetRecord> = zodValue(
  z.object({ closed: z.boolean(), adminDelay: DelaySchema }),
  (record) => ({ closed: record.closed, adminDelay: encodeDelay(record.adminDelay) }),
);

const scheduleValue: ValueCodec<ScheduleRecord> = zodValue(
  z.object({ timepoint: seconds, nonce: seconds }),
  (record) => ({ timepoint: record.timepoint, nonce: record.nonce }),
);

function splitKey(raw: string): [string, string] {
  const at = raw.indexOf("/");
  if (at < 0) {
    throw new TypeError(`Malformed composite key: ${raw}`);
  }
  return [raw.slice(0, at), raw.slice(at + 1)];
}

const memberKey: KeyCodec<MemberKey> = {
  encode: (key) => `${roleIdKey.encode(key.roleId)}/${addressKey.encode(key.account)}`,
  decode: (raw) => {
    const [role, account] = splitKey(raw);
    return { roleId: roleIdKey.decode(role), account: addressKey.decode(account) };
  },
};

const functionKey: KeyCodec<FunctionKey> = {
  encode: (key) => `${addressKey.encode(key.target)}/${key.selector.toLowerCase()}`,
  decode: (raw) => {
    const [target, selector] = splitKey(raw);
    if (!isAddress(target) || !isSelector(selector)) {
      throw new TypeError(`Malformed function key: ${raw}`);
    }
    return { target, selector };
  },
};

const operationKey: KeyCodec<OperationId> = {
  encode: (key) => key.toLowerCase(),
  decode: (raw) => {
    if (!isOperationId(raw)) {
      throw new TypeError(`Not an operation id: ${raw}`);
    }
    return raw;
  },
};

// =============================================================================
// Tables
// =============================================================================

export interface AccessManagerTables {
  readonly roles: StorageTable<RoleId, RoleRecord>;
  readonly members: StorageTable<MemberKey, MemberRecord>;
  readonly targets: StorageTable<Address, TargetRecord>;
  readonly functionRoles: StorageTable<FunctionKey, RoleId>;
  readonly schedules: StorageTable<OperationId, ScheduleRecord>;
}

export function allocateTables(store: StateStore): AccessManagerTables {
  return {
    roles: store.table(NAMESPACES.roles, roleIdKey, roleValue),
    members: store.table(NAMESPACES.members, memberKey, memberValue),
    targets: store.table(NAMESPACES.targets, addressKey, targetValue),
    functionRoles: store.table(
      NAMESPACES.functionRoles,
      functionKey,
      zodValue(roleId, (value) => value.toString(10)),
    ),
    schedules: store.table(NAMESPACES.schedules, operationKey, scheduleValue),
  };
}
