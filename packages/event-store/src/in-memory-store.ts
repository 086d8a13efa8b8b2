/**
 * @custody-gate/event-store — In-memory EventStore implementation.
 *
 * Holds every stream in memory, linked by one global hash chain.
 */

import type { DomainEvent } from "@custody-gate/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = stream.length + 1;

    for (const event of events) {
      const fields = {
        event,
        streamId,
        version: stream.length + 1,
        globalPosition: this._globalLog.length + 1,
      };
      const previousHash = this._lastHash;
      const stored: StoredEvent = {
        ...fields,
        hash: computeEventHash(fields, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;

      stream.push(stored);
      this._globalLog.push(stored);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    const stream = this._streams.get(streamId) ?? [];
    const fromVersion = options?.fromVersion ?? 1;

    return limit(
      stream.filter(
        (e) => e.version >= fromVersion && matchesType(e, options?.type),
      ),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    return limit(
      this._globalLog.filter(
        (e) => e.globalPosition >= fromPosition && matchesType(e, options?.type),
      ),
      options?.maxCount,
    );
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}

function matchesType(stored: StoredEvent, type: string | undefined): boolean {
  return type === undefined || stored.event.type === type;
}

function limit(
  events: StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
