/**
 * Event Types
 *
 * Every committed state change of the control plane is captured
 * as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events of a failed call are never published
 * - Payload values are JSON-safe (role ids as decimal strings)
 */

import type { Address, Timestamp } from "./primitives.js";

/**
 * Subsystem that emitted an event.
 */
export type EventSource = "access-manager" | "authority";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** Ledger time of the call that produced the event */
  readonly timestamp: Timestamp;

  /** Principal whose call produced the event */
  readonly actor: Address;

  /** Groups every event of one top-level call */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "role.granted", "redemption.lock_updated") */
  readonly type: string;

  readonly metadata: EventMetadata;

  readonly payload: Readonly<Record<string, JsonValue>>;
}

/**
 * JSON-representable value.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };
