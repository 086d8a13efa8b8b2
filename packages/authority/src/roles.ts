/**
 * Role catalog of the vault system.
 */

import { ADMIN_ROLE, PUBLIC_ROLE } from "@custody-gate/access-manager";
import type { RoleId } from "@custody-gate/types";

export const Roles = {
  ADMIN: ADMIN_ROLE,
  OWNER: 1n,
  /** Cancels scheduled operations and closes targets in an emergency. */
  GUARDIAN: 2n,
  TECH_VAULT: 3n,
  DAO: 4n,
  ATOMIST: 100n,
  ALPHA: 200n,
  FUSE_MANAGER: 300n,
  PERFORMANCE_FEE_MANAGER: 400n,
  MANAGEMENT_FEE_MANAGER: 500n,
  CLAIM_REWARDS: 600n,
  REWARDS_CLAIM_MANAGER: 601n,
  TRANSFER_REWARDS: 700n,
  WHITELIST: 800n,
  CONFIG_INSTANT_WITHDRAWAL_FUSES: 900n,
  WITHDRAW_MANAGER_REQUEST_FEE: 901n,
  WITHDRAW_MANAGER_WITHDRAW_FEE: 902n,
  UPDATE_MARKETS_BALANCES: 1000n,
  UPDATE_REWARDS_BALANCE: 1100n,
  PRICE_ORACLE_MIDDLEWARE_MANAGER: 1200n,
  PUBLIC: PUBLIC_ROLE,
} as const satisfies Record<string, RoleId>;

export type RoleName = keyof typeof Roles;

function isRoleName(name: string): name is RoleName {
  return Object.hasOwn(Roles, name);
}

const NAMES = new Map<RoleId, RoleName>(
  Object.entries(Roles).flatMap(([name, id]) => (isRoleName(name) ? [[id, name] as const] : [])),
);

/** Catalog name of a role id, if it has one. */
export function roleName(roleId: RoleId): RoleName | undefined {
  return NAMES.get(roleId);
}
