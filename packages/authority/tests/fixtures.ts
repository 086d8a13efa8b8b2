import { InMemoryEventStore } from "@custody-gate/event-store";
import { ManualClock } from "@custody-gate/access-manager";
import { StateStore } from "@custody-gate/state-store";
import type { Address, Seconds } from "@custody-gate/types";
import { AuthorizationCore } from "../src/authorization-core.js";

export const AUTHORITY: Address = "0x00000000000000000000000000000000000000aa";
export const ADMIN: Address = "0x1111111111111111111111111111111111111111";
export const ALICE: Address = "0x2222222222222222222222222222222222222222";
export const BOB: Address = "0x3333333333333333333333333333333333333333";
export const CAROL: Address = "0x6666666666666666666666666666666666666666";
export const VAULT: Address = "0x5555555555555555555555555555555555555555";

export interface CoreFixture {
  readonly clock: ManualClock;
  readonly events: InMemoryEventStore;
  readonly store: StateStore;
  readonly core: AuthorizationCore;
}

export function createCore(redemptionDelay: Seconds = 0, now = 1000): CoreFixture {
  const clock = new ManualClock(now);
  const events = new InMemoryEventStore();
  const store = new StateStore({ events });
  const core = new AuthorizationCore({
    address: AUTHORITY,
    initialAdmin: ADMIN,
    redemptionDelay,
    store,
    clock,
  });
  return { clock, events, store, core };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
