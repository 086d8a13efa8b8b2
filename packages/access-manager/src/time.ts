/**
 * Ledger time and delayed values.
 *
 * A `Delay` holds the value in force before `effect` and the value in force
 * from `effect` on, so that lowering a delay only applies after the
 * difference has elapsed.
 */

import type { Seconds, Timestamp } from "@custody-gate/types";

// =============================================================================
// Clock
// =============================================================================

export interface Clock {
  /** Current ledger time in whole seconds. */
  now(): Timestamp;
}

export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = 0) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  set(time: Timestamp): void {
    this.current = time;
  }

  advance(seconds: Seconds): Timestamp {
    this.current += seconds;
    return this.current;
  }
}

// =============================================================================
// Delay
// =============================================================================

export interface Delay {
  readonly before: Seconds;
  readonly after: Seconds;
  readonly effect: Timestamp;
}

export interface DelayState {
  readonly value: Seconds;
  /** Value that will apply from `effect` on; absent when nothing is pending. */
  readonly pending?: { readonly value: Seconds; readonly effect: Timestamp };
}

export function delayOf(value: Seconds): Delay {
  return { before: 0, after: value, effect: 0 };
}

export function delayValue(delay: Delay, now: Timestamp): Seconds {
  return delay.effect <= now ? delay.after : delay.before;
}

export function delayState(delay: Delay, now: Timestamp): DelayState {
  if (delay.effect <= now) {
    return { value: delay.after };
  }
  return { value: delay.before, pending: { value: delay.after, effect: delay.effect } };
}

/**
 * Schedule a new delay value. Increases apply after `minSetback`;
 * decreases apply after the larger of `minSetback` and the decrease.
 */
export function updateDelay(
  delay: Delay,
  now: Timestamp,
  newValue: Seconds,
  minSetback: Seconds,
): { readonly delay: Delay; readonly effect: Timestamp } {
  const value = delayValue(delay, now);
  const setback = Math.max(minSetback, value > newValue ? value - newValue : 0);
  const effect = now + setback;
  return { delay: { before: value, after: newValue, effect }, effect };
}
