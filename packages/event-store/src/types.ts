/**
 * @custody-gate/event-store — Core types.
 *
 * Streams are append-only. Every stored event carries its version within
 * its stream, its global position, and a hash linking it to the event
 * before it in the global log.
 */

import type { DomainEvent } from "@custody-gate/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;

  /** Stream the event was appended to (one stream per subsystem) */
  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position within the whole store */
  readonly globalPosition: number;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;

  readonly previousHash: string;
}

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** First stream version to return (default 1) */
  readonly fromVersion?: number;

  /** Only events of this type */
  readonly type?: string;

  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** First global position to return (default 1) */
  readonly fromPosition?: number;

  readonly type?: string;

  readonly maxCount?: number;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Store
// =============================================================================

export interface EventStore {
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];
  readAll(options?: ReadAllOptions): readonly StoredEvent[];
  streamVersion(streamId: string): number;
  globalPosition(): number;
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
