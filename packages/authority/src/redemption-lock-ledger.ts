/**
 * RedemptionLockLedger — per-account unlock times.
 *
 * A deposit-class operation pushes the caller's unlock time to now plus
 * the redemption delay. A withdraw-class operation is refused while the
 * unlock time is still in the future; at the unlock time itself it passes.
 * A delay of 0 disables locking.
 */

import type { StateStore, StorageTable } from "@custody-gate/state-store";
import type { Address, Seconds, Selector, Timestamp } from "@custody-gate/types";
import { AuthorityError } from "./errors.js";
import type { OperationClassifier } from "./operation-classifier.js";

export class RedemptionLockLedger {
  constructor(
    private readonly store: StateStore,
    private readonly locks: StorageTable<Address, Timestamp>,
    private readonly classifier: OperationClassifier,
    readonly redemptionDelay: Seconds,
  ) {}

  /** Unlock time of `account`; 0 if it was never locked. */
  lockTime(account: Address): Timestamp {
    return this.locks.get(account) ?? 0;
  }

  /**
   * Apply the lock rules for `account` calling `selector` at `now`.
   *
   * @throws AuthorityError ACCOUNT_IS_LOCKED for a withdraw-class call
   *   before the unlock time
   */
  check(account: Address, selector: Selector, now: Timestamp): void {
    switch (this.classifier.classify(selector)) {
      case "withdraw": {
        const unlockTime = this.lockTime(account);
        if (unlockTime > now) {
          throw new AuthorityError("ACCOUNT_IS_LOCKED", `Account ${account} is locked until ${unlockTime}`, {
            unlockTime,
          });
        }
        return;
      }
      case "deposit": {
        if (this.redemptionDelay === 0) return;
        const unlockTime = now + this.redemptionDelay;
        this.locks.set(account, unlockTime);
        this.store.emit("authority", "redemption.lock_updated", {
          account: account.toLowerCase(),
          unlockTime,
        });
        return;
      }
      case "other":
        return;
    }
  }
}
