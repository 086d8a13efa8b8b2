/**
 * JSON rendering of domain values. Role ids are 64-bit and leave the
 * service as decimal strings.
 */

import type { JsonValue } from "@custody-gate/types";

export function toJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString(10);
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJson(item));
  }
  if (typeof value === "object") {
    return toJsonObject(value);
  }
  return String(value);
}

/** `toJson` for values known to render as objects. */
export function toJsonObject(value: object): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) {
      out[key] = toJson(item);
    }
  }
  return out;
}
