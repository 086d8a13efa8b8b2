/**
 * State snapshot files.
 *
 * A snapshot file holds one `StateExport` as JSON. Files are written to a
 * temporary path and renamed into place; loads verify the state hash.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { JsonValue } from "@custody-gate/types";
import { StateStoreError } from "./errors.js";
import { computeStateHash } from "./state-store.js";
import type { StateExport } from "./state-store.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const StateFileSchema = z.object({
  savedAt: z.string(),
  slots: z.record(
    z.object({
      namespace: z.string().min(1),
      entries: z.record(JsonValueSchema),
    }),
  ),
  stateHash: z.string().regex(/^[0-9a-f]{64}$/),
});

export function saveStateSnapshot(path: string, state: StateExport): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(
    tmp,
    JSON.stringify({ savedAt: new Date().toISOString(), ...state }, null, 2),
    "utf-8",
  );
  renameSync(tmp, path);
}

/**
 * Load a snapshot file, or `undefined` when the file does not exist.
 *
 * @throws StateStoreError INVALID_SNAPSHOT if the file is malformed
 * @throws StateStoreError SNAPSHOT_HASH_MISMATCH if the content was altered
 */
export function loadStateSnapshot(path: string): StateExport | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    throw new StateStoreError("INVALID_SNAPSHOT", `Snapshot ${path} is not valid JSON`);
  }

  const parsed = StateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateStoreError("INVALID_SNAPSHOT", `Snapshot ${path} has an invalid layout`);
  }

  const { slots, stateHash } = parsed.data;
  if (computeStateHash(slots) !== stateHash) {
    throw new StateStoreError("SNAPSHOT_HASH_MISMATCH", `Snapshot ${path} failed its hash check`);
  }
  return { slots, stateHash };
}
