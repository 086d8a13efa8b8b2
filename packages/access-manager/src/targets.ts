import type { Address, Hex, Selector } from "@custody-gate/types";
import { CONSUMING_SCHEDULED_OP_SELECTOR, ZERO_SELECTOR } from "./calldata.js";

/**
 * A target whose guarded operations are authorized by the manager.
 */
export interface ManagedTarget {
  readonly address: Address;

  /**
   * `CONSUMING_SCHEDULED_OP_SELECTOR` while the target is consuming a
   * scheduled operation, `ZERO_SELECTOR` otherwise.
   */
  isConsumingScheduledOp(): Selector;
}

/**
 * A managed target the manager can relay calls to.
 */
export interface ExecutableTarget extends ManagedTarget {
  dispatch(sender: Address, data: Hex): unknown;
}

/**
 * Scoped consuming marker. The marker is set only for the duration of
 * `run` and is restored on every exit path.
 */
export class ConsumingScope {
  private consuming = false;

  get active(): boolean {
    return this.consuming;
  }

  marker(): Selector {
    return this.consuming ? CONSUMING_SCHEDULED_OP_SELECTOR : ZERO_SELECTOR;
  }

  run<T>(body: () => T): T {
    const previous = this.consuming;
    this.consuming = true;
    try {
      return body();
    } finally {
      this.consuming = previous;
    }
  }
}
