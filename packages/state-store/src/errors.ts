export type StateStoreErrorCode =
  | "SLOT_COLLISION"
  | "INVALID_SNAPSHOT"
  | "SNAPSHOT_HASH_MISMATCH";

export class StateStoreError extends Error {
  public readonly code: StateStoreErrorCode;
  constructor(code: StateStoreErrorCode, message: string) {
    super(message);
    this.name = "StateStoreError";
    this.code = code;
  }
}
