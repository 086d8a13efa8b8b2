import type { StorageCell } from "@custody-gate/state-store";
import { AuthorityError } from "./errors.js";
import type { InitializationState } from "./storage.js";

/**
 * One-way latch around the bootstrap. Moves from "uninitialized" to
 * "initialized" once; a rolled-back call leaves it uninitialized.
 */
export class InitializationGuard {
  constructor(private readonly state: StorageCell<InitializationState>) {}

  get initialized(): boolean {
    return this.state.get() === "initialized";
  }

  /** @throws AuthorityError ALREADY_INITIALIZED after the first success */
  enter(): void {
    if (this.initialized) {
      throw new AuthorityError("ALREADY_INITIALIZED", "Authority is already initialized", {});
    }
    this.state.set("initialized");
  }
}
