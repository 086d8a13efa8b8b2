/**
 * Storage layout of the authority. Each struct lives at its own
 * namespace slot, apart from the access manager's tables.
 */

import { z } from "zod";
import {
  addressKey,
  roleIdKey,
  secondsValue,
  zodValue,
} from "@custody-gate/state-store";
import type { StateStore, StorageCell, StorageTable } from "@custody-gate/state-store";
import type { Address, RoleId, Seconds, Timestamp } from "@custody-gate/types";

export const NAMESPACES = {
  redemptionLocks: "custody-gate.storage.RedemptionLocks",
  minimalExecutionDelays: "custody-gate.storage.MinimalExecutionDelaysForRoles",
  initializable: "custody-gate.storage.Initializable",
  vaultLatches: "custody-gate.storage.VaultLatches",
} as const;

export type InitializationState = "uninitialized" | "initialized";

export interface VaultLatchRecord {
  readonly deposits: "private" | "public";
  readonly shares: "locked" | "transferable";
}

export interface AuthorityTables {
  readonly redemptionLocks: StorageTable<Address, Timestamp>;
  readonly minimalExecutionDelays: StorageTable<RoleId, Seconds>;
  readonly initialization: StorageCell<InitializationState>;
  readonly vaultLatches: StorageTable<Address, VaultLatchRecord>;
}

const VaultLatchSchema = z.object({
  deposits: z.enum(["private", "public"]),
  shares: z.enum(["locked", "transferable"]),
});

export function allocateTables(store: StateStore): AuthorityTables {
  return {
    redemptionLocks: store.table(NAMESPACES.redemptionLocks, addressKey, secondsValue),
    minimalExecutionDelays: store.table(NAMESPACES.minimalExecutionDelays, roleIdKey, secondsValue),
    initialization: store.cell(
      NAMESPACES.initializable,
      zodValue(z.enum(["uninitialized", "initialized"]), (state) => state),
      "uninitialized",
    ),
    vaultLatches: store.table(
      NAMESPACES.vaultLatches,
      addressKey,
      zodValue(VaultLatchSchema, (record) => ({ deposits: record.deposits, shares: record.shares })),
    ),
  };
}
