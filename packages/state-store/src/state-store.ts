/**
 * PersistentStateStore — namespaced tables with all-or-nothing calls.
 *
 * - Each table occupies the slot derived from its namespace; two tables
 *   can never share a slot
 * - Every write inside a transaction is journaled; a throw anywhere in the
 *   call undoes the writes made since the transaction began
 * - Events emitted inside a transaction are published to the event store
 *   only when the outermost transaction commits
 *
 * Calls are synchronous. A transaction body must not return a promise.
 */

import { createHash, randomUUID } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { EventStore } from "@custody-gate/event-store";
import type {
  Address,
  DomainEvent,
  EventSource,
  Hex,
  JsonValue,
  Timestamp,
} from "@custody-gate/types";
import type { KeyCodec, ValueCodec } from "./codecs.js";
import { StateStoreError } from "./errors.js";
import { namespaceSlot } from "./namespace.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Who is calling and when; stamped onto every event of the call.
 */
export interface CallContext {
  readonly actor: Address;
  readonly timestamp: Timestamp;
}

export interface SlotExport {
  readonly namespace: string;
  readonly entries: Readonly<Record<string, JsonValue>>;
}

export interface StateExport {
  readonly slots: Readonly<Record<string, SlotExport>>;
  readonly stateHash: string;
}

interface SlotOwner {
  readonly namespace: string;
  exportEntries(): Record<string, JsonValue>;
  importEntries(entries: Readonly<Record<string, unknown>>): void;
}

type Undo = () => void;

interface OpenCall {
  readonly context: CallContext;
  readonly correlationId: string;
}

// =============================================================================
// Tables
// =============================================================================

export class StorageTable<K, V> implements SlotOwner {
  private readonly rows = new Map<string, V>();

  constructor(
    private readonly journal: (undo: Undo) => void,
    readonly namespace: string,
    readonly slot: Hex,
    private readonly keys: KeyCodec<K>,
    private readonly values: ValueCodec<V>,
  ) {}

  get(key: K): V | undefined {
    return this.rows.get(this.keys.encode(key));
  }

  has(key: K): boolean {
    return this.rows.has(this.keys.encode(key));
  }

  set(key: K, value: V): void {
    this.write(this.keys.encode(key), value);
  }

  delete(key: K): boolean {
    const encoded = this.keys.encode(key);
    if (!this.rows.has(encoded)) return false;
    this.write(encoded, undefined);
    return true;
  }

  entries(): readonly (readonly [K, V])[] {
    return [...this.rows].map(([key, value]) => [this.keys.decode(key), value] as const);
  }

  get size(): number {
    return this.rows.size;
  }

  exportEntries(): Record<string, JsonValue> {
    const out: Record<string, JsonValue> = {};
    for (const [key, value] of this.rows) {
      out[key] = this.values.encode(value);
    }
    return out;
  }

  importEntries(entries: Readonly<Record<string, unknown>>): void {
    this.rows.clear();
    for (const [key, raw] of Object.entries(entries)) {
      this.rows.set(this.keys.encode(this.keys.decode(key)), this.values.decode(raw));
    }
  }

  private write(encoded: string, value: V | undefined): void {
    const had = this.rows.has(encoded);
    const previous = this.rows.get(encoded);
    this.journal(() => {
      if (had && previous !== undefined) {
        this.rows.set(encoded, previous);
      } else {
        this.rows.delete(encoded);
      }
    });

    if (value === undefined) {
      this.rows.delete(encoded);
    } else {
      this.rows.set(encoded, value);
    }
  }
}

const CELL_KEY = "value";

/**
 * A single value at its own slot. Reads return `initial` until written.
 */
export class StorageCell<V> {
  constructor(
    private readonly table: StorageTable<string, V>,
    private readonly initial: V,
  ) {}

  get slot(): Hex {
    return this.table.slot;
  }

  get(): V {
    return this.table.get(CELL_KEY) ?? this.initial;
  }

  set(value: V): void {
    this.table.set(CELL_KEY, value);
  }
}

// =============================================================================
// Store
// =============================================================================

export interface StateStoreOptions {
  /** Receives the events of committed calls. */
  readonly events?: EventStore;
}

export class StateStore {
  private readonly slots = new Map<string, SlotOwner>();
  private readonly undoLog: Undo[] = [];
  private readonly pending: { source: EventSource; event: DomainEvent }[] = [];
  private readonly calls: OpenCall[] = [];
  private readonly events: EventStore | undefined;

  constructor(options: StateStoreOptions = {}) {
    this.events = options.events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Layout
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Allocate the table stored under `namespace`.
   *
   * @throws StateStoreError SLOT_COLLISION if the slot is already taken
   */
  table<K, V>(namespace: string, keys: KeyCodec<K>, values: ValueCodec<V>): StorageTable<K, V> {
    const slot = namespaceSlot(namespace);
    const existing = this.slots.get(slot);
    if (existing !== undefined) {
      throw new StateStoreError(
        "SLOT_COLLISION",
        `Namespace '${namespace}' resolves to slot ${slot}, already used by '${existing.namespace}'`,
      );
    }

    const table = new StorageTable(
      (undo) => this.journal(undo),
      namespace,
      slot,
      keys,
      values,
    );
    this.slots.set(slot, table);
    return table;
  }

  cell<V>(namespace: string, values: ValueCodec<V>, initial: V): StorageCell<V> {
    const keys: KeyCodec<string> = { encode: (k) => k, decode: (k) => k };
    return new StorageCell(this.table(namespace, keys, values), initial);
  }

  slotOf(namespace: string): Hex | undefined {
    const slot = namespaceSlot(namespace);
    return this.slots.has(slot) ? slot : undefined;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `body` all-or-nothing. Nested transactions unwind only their own
   * writes when they throw; events are published when the outermost
   * transaction returns.
   */
  transaction<T>(context: CallContext, body: () => T): T {
    const undoMark = this.undoLog.length;
    const eventMark = this.pending.length;
    const outer = this.calls[0];
    this.calls.push({
      context,
      correlationId: outer?.correlationId ?? randomUUID(),
    });

    let result: T;
    try {
      result = body();
    } catch (err) {
      this.calls.pop();
      while (this.undoLog.length > undoMark) {
        const undo = this.undoLog.pop();
        undo?.();
      }
      this.pending.length = eventMark;
      throw err;
    }

    this.calls.pop();
    if (this.calls.length === 0) {
      this.undoLog.length = 0;
      this.publish();
    }
    return result;
  }

  get inTransaction(): boolean {
    return this.calls.length > 0;
  }

  /**
   * Record an event of the current call. Outside a transaction the event
   * is published at once.
   */
  emit(
    source: EventSource,
    type: string,
    payload: Readonly<Record<string, JsonValue>>,
    fallback?: CallContext,
  ): void {
    const call = this.calls[this.calls.length - 1];
    const context = call?.context ?? fallback;
    if (context === undefined) {
      throw new TypeError(`Event '${type}' emitted without a call context`);
    }

    this.pending.push({
      source,
      event: {
        type,
        metadata: {
          eventId: randomUUID(),
          timestamp: context.timestamp,
          actor: context.actor,
          correlationId: call?.correlationId ?? randomUUID(),
          source,
        },
        payload,
      },
    });

    if (call === undefined) {
      this.publish();
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Export
  // ───────────────────────────────────────────────────────────────────────

  exportState(): StateExport {
    const slots: Record<string, SlotExport> = {};
    for (const [slot, owner] of this.slots) {
      slots[slot] = { namespace: owner.namespace, entries: owner.exportEntries() };
    }
    return { slots, stateHash: computeStateHash(slots) };
  }

  stateHash(): string {
    return this.exportState().stateHash;
  }

  /**
   * Replace the contents of every allocated table with `state`.
   *
   * @throws StateStoreError SNAPSHOT_HASH_MISMATCH if the hash does not match
   * @throws StateStoreError INVALID_SNAPSHOT for unknown slots or namespaces
   */
  importState(state: StateExport): void {
    if (computeStateHash(state.slots) !== state.stateHash) {
      throw new StateStoreError("SNAPSHOT_HASH_MISMATCH", "State hash does not match slot contents");
    }
    if (this.inTransaction) {
      throw new StateStoreError("INVALID_SNAPSHOT", "Cannot import state inside a transaction");
    }

    for (const [slot, data] of Object.entries(state.slots)) {
      const owner = this.slots.get(slot);
      if (owner === undefined || owner.namespace !== data.namespace) {
        throw new StateStoreError(
          "INVALID_SNAPSHOT",
          `Slot ${slot} ('${data.namespace}') is not allocated in this store`,
        );
      }
    }

    for (const [slot, owner] of this.slots) {
      owner.importEntries(state.slots[slot]?.entries ?? {});
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private journal(undo: Undo): void {
    if (this.calls.length > 0) {
      this.undoLog.push(undo);
    }
  }

  private publish(): void {
    const batch = this.pending.splice(0, this.pending.length);
    if (this.events === undefined) return;

    let run: DomainEvent[] = [];
    let runSource: EventSource | undefined;
    for (const { source, event } of batch) {
      if (runSource !== undefined && source !== runSource) {
        this.events.append(runSource, run);
        run = [];
      }
      runSource = source;
      run.push(event);
    }
    if (runSource !== undefined) {
      this.events.append(runSource, run);
    }
  }
}

/**
 * SHA-256 of the canonical JSON of the slot contents.
 */
export function computeStateHash(slots: Readonly<Record<string, SlotExport>>): string {
  return createHash("sha256").update(canonicalize(slots)).digest("hex");
}
