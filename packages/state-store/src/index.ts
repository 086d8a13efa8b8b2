/**
 * @custody-gate/state-store — Namespaced persistent state.
 *
 * Provides:
 * - Hashed namespace slots (no table can alias another)
 * - Typed tables and cells with key/value codecs
 * - All-or-nothing transactions with a write journal
 * - State export, hashing and snapshot files
 *
 * @packageDocumentation
 */

export { namespaceSlot } from "./namespace.js";
export { StateStoreError } from "./errors.js";
export type { StateStoreErrorCode } from "./errors.js";
export type { KeyCodec, ValueCodec } from "./codecs.js";
export { addressKey, roleIdKey, zodValue, secondsValue } from "./codecs.js";
export { StateStore, StorageTable, StorageCell, computeStateHash } from "./state-store.js";
export type { CallContext, SlotExport, StateExport, StateStoreOptions } from "./state-store.js";
export { saveStateSnapshot, loadStateSnapshot } from "./snapshot-file.js";
