/**
 * One-way vault latches: deposits go from private to public, shares from
 * locked to transferable. Once latched, the operations stay bound to
 * PUBLIC_ROLE.
 */

import { PUBLIC_ROLE } from "@custody-gate/access-manager";
import type { StateStore, StorageTable } from "@custody-gate/state-store";
import type { Address, RoleId, Selector } from "@custody-gate/types";
import { AuthorityError } from "./errors.js";
import { VAULT_SELECTORS } from "./selectors.js";
import type { VaultLatchRecord } from "./storage.js";

export const PUBLIC_DEPOSIT_SELECTORS: readonly Selector[] = [
  VAULT_SELECTORS.deposit,
  VAULT_SELECTORS.mint,
  VAULT_SELECTORS.depositWithPermit,
];

export const SHARE_TRANSFER_SELECTORS: readonly Selector[] = [
  VAULT_SELECTORS.transfer,
  VAULT_SELECTORS.transferFrom,
];

const INITIAL: VaultLatchRecord = { deposits: "private", shares: "locked" };

export class VaultLatches {
  constructor(
    private readonly store: StateStore,
    private readonly latches: StorageTable<Address, VaultLatchRecord>,
  ) {}

  isPublic(vault: Address): boolean {
    return this.record(vault).deposits === "public";
  }

  isTransferable(vault: Address): boolean {
    return this.record(vault).shares === "transferable";
  }

  /** Returns false if the vault was already public. */
  latchPublic(vault: Address): boolean {
    const current = this.record(vault);
    if (current.deposits === "public") return false;
    this.latches.set(vault, { ...current, deposits: "public" });
    this.store.emit("authority", "authority.vault_converted_to_public", {
      vault: vault.toLowerCase(),
    });
    return true;
  }

  /** Returns false if shares were already transferable. */
  latchTransferable(vault: Address): boolean {
    const current = this.record(vault);
    if (current.shares === "transferable") return false;
    this.latches.set(vault, { ...current, shares: "transferable" });
    this.store.emit("authority", "authority.transfer_shares_enabled", {
      vault: vault.toLowerCase(),
    });
    return true;
  }

  /**
   * @throws AuthorityError OPERATION_LATCHED_PUBLIC when rebinding a
   *   latched operation to anything but PUBLIC_ROLE
   */
  assertRebindable(target: Address, selector: Selector, roleId: RoleId): void {
    if (roleId === PUBLIC_ROLE) return;
    const normalized = selector.toLowerCase();
    const latched =
      (this.isPublic(target) && PUBLIC_DEPOSIT_SELECTORS.some((s) => s === normalized)) ||
      (this.isTransferable(target) && SHARE_TRANSFER_SELECTORS.some((s) => s === normalized));
    if (latched) {
      throw new AuthorityError(
        "OPERATION_LATCHED_PUBLIC",
        `${selector} on ${target} is public and cannot be restricted again`,
        { target, selector },
      );
    }
  }

  private record(vault: Address): VaultLatchRecord {
    return this.latches.get(vault) ?? INITIAL;
  }
}
