/**
 * @custody-gate/event-store — Append-only, hash-chained event persistence.
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  AppendResult,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
