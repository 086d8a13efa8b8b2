/**
 * ExecutionDelayRegistry — minimal execution delay per role.
 *
 * The minimum only constrains future grants. Members granted before a
 * minimum was raised keep their delay.
 */

import type { StateStore, StorageTable } from "@custody-gate/state-store";
import type { RoleId, Seconds } from "@custody-gate/types";
import { AuthorityError } from "./errors.js";

export class ExecutionDelayRegistry {
  constructor(
    private readonly store: StateStore,
    private readonly delays: StorageTable<RoleId, Seconds>,
  ) {}

  get(roleId: RoleId): Seconds {
    return this.delays.get(roleId) ?? 0;
  }

  /**
   * Overwrite the minimum of each role, pairing the arrays by index.
   *
   * @throws AuthorityError ARRAY_LENGTH_MISMATCH if the arrays differ in length
   */
  setMany(roleIds: readonly RoleId[], delays: readonly Seconds[]): void {
    if (roleIds.length !== delays.length) {
      throw new AuthorityError(
        "ARRAY_LENGTH_MISMATCH",
        `Got ${roleIds.length} roles but ${delays.length} delays`,
        { left: roleIds.length, right: delays.length },
      );
    }

    roleIds.forEach((roleId, i) => {
      const delay = delays[i] ?? 0;
      this.delays.set(roleId, delay);
      this.store.emit("authority", "authority.minimal_execution_delay_updated", {
        roleId: roleId.toString(10),
        delay,
      });
    });
  }

  /**
   * @throws AuthorityError TOO_SHORT_EXECUTION_DELAY_FOR_ROLE if
   *   `executionDelay` is below the role's minimum
   */
  assertAllowed(roleId: RoleId, executionDelay: Seconds): void {
    if (executionDelay < this.get(roleId)) {
      throw new AuthorityError(
        "TOO_SHORT_EXECUTION_DELAY_FOR_ROLE",
        `Execution delay ${executionDelay} is below the minimum of ${this.get(roleId)} for role ${roleId.toString(10)}`,
        { roleId, executionDelay },
      );
    }
  }
}
