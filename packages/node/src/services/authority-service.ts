/**
 * AuthorityService — wires one authority for the HTTP layer.
 *
 * Owns the event store, the state store, the clock and the
 * AuthorizationCore. Routes call the core and the access manager
 * directly; this class adds what sits around them: readiness, event
 * queries, state snapshots and the bootstrap file.
 */

import { readFileSync } from "node:fs";
import { SystemClock } from "@custody-gate/access-manager";
import type { AccessManager, Clock } from "@custody-gate/access-manager";
import { AuthorizationCore, parseBootstrapData } from "@custody-gate/authority";
import { InMemoryEventStore } from "@custody-gate/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@custody-gate/event-store";
import { StateStore, loadStateSnapshot, saveStateSnapshot } from "@custody-gate/state-store";
import type { Address, InitializationData, Seconds } from "@custody-gate/types";

// =============================================================================
// Config
// =============================================================================

export interface AuthorityServiceConfig {
  readonly address: Address;
  readonly initialAdmin: Address;
  readonly redemptionDelay: Seconds;
  readonly expiration?: Seconds;
  readonly minSetback?: Seconds;
  /** Defaults to wall-clock seconds. */
  readonly clock?: Clock;
}

export interface AuthorityInfo {
  readonly address: Address;
  readonly redemptionDelay: Seconds;
  readonly expiration: Seconds;
  readonly minSetback: Seconds;
  readonly initialized: boolean;
  readonly now: number;
}

// =============================================================================
// Service
// =============================================================================

export class AuthorityService {
  readonly core: AuthorizationCore;
  readonly clock: Clock;
  private readonly events = new InMemoryEventStore();
  private readonly store: StateStore;

  constructor(config: AuthorityServiceConfig) {
    this.clock = config.clock ?? new SystemClock();
    this.store = new StateStore({ events: this.events });
    this.core = new AuthorizationCore({
      address: config.address,
      initialAdmin: config.initialAdmin,
      redemptionDelay: config.redemptionDelay,
      store: this.store,
      clock: this.clock,
      ...(config.expiration !== undefined ? { expiration: config.expiration } : {}),
      ...(config.minSetback !== undefined ? { minSetback: config.minSetback } : {}),
    });
  }

  get manager(): AccessManager {
    return this.core.manager;
  }

  info(): AuthorityInfo {
    return {
      address: this.core.address,
      redemptionDelay: this.core.REDEMPTION_DELAY_IN_SECONDS,
      expiration: this.manager.expiration,
      minSetback: this.manager.minSetback,
      initialized: this.core.isInitialized(),
      now: this.clock.now(),
    };
  }

  // ─── Bootstrap ───────────────────────────────────────────────────

  /**
   * Run the one-time bootstrap from a JSON file, as `caller`.
   *
   * @throws {z.ZodError} if the file does not hold valid bootstrap data
   */
  initializeFromFile(caller: Address, path: string): InitializationData {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    const data = parseBootstrapData(raw);
    this.core.initialize(caller, data);
    return data;
  }

  // ─── Events ──────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.events.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.events.read(streamId, options);
  }

  verifyEventIntegrity(): EventStoreIntegrityResult {
    return this.events.verifyIntegrity();
  }

  // ─── State ───────────────────────────────────────────────────────

  stateHash(): string {
    return this.store.stateHash();
  }

  /**
   * Restore state from a snapshot file. Returns false when there is no
   * file at `path`.
   */
  loadSnapshot(path: string): boolean {
    const state = loadStateSnapshot(path);
    if (state === undefined) {
      return false;
    }
    this.store.importState(state);
    return true;
  }

  saveSnapshot(path: string): void {
    saveStateSnapshot(path, this.store.exportState());
  }
}
