/**
 * AccessManagedTarget — base for targets whose operations are guarded
 * by an AuthorizationCore.
 *
 * A guarded call runs as one transaction: the authority's lock
 * bookkeeping, the permission check, any schedule consumption and the
 * body itself commit together or not at all.
 */

import { ConsumingScope, selectorOf } from "@custody-gate/access-manager";
import type { ExecutableTarget } from "@custody-gate/access-manager";
import type { Address, Hex, Selector } from "@custody-gate/types";
import type { AuthorizationCore } from "./authorization-core.js";
import { unauthorized } from "./errors.js";

export abstract class AccessManagedTarget implements ExecutableTarget {
  private readonly consuming = new ConsumingScope();

  constructor(
    readonly address: Address,
    protected readonly authority: AuthorizationCore,
  ) {}

  isConsumingScheduledOp(): Selector {
    return this.consuming.marker();
  }

  /** Entry point for calls relayed by the access manager. */
  abstract dispatch(sender: Address, data: Hex): unknown;

  /**
   * Run `body` for `caller` if the authority allows `data` now, or if
   * `caller` has a ready schedule for it.
   *
   * @throws AuthorityError ACCESS_MANAGED_UNAUTHORIZED when denied outright
   */
  protected restricted<T>(caller: Address, data: Hex, body: () => T): T {
    return this.authority.transaction(caller, () => {
      const { immediate, delay } = this.authority.canCallAndUpdate(
        caller,
        this.address,
        selectorOf(data),
      );
      if (!immediate) {
        if (delay === 0) {
          throw unauthorized(caller);
        }
        this.consuming.run(() => this.authority.manager.consume(this, caller, data));
      }
      return body();
    });
  }
}
