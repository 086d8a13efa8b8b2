/**
 * Key and value codecs for storage tables.
 *
 * Keys become strings so that equal values always map to one entry
 * (addresses are lower-cased). Values become JSON for export and are
 * validated with zod when a snapshot is imported.
 */

import { z } from "zod";
import { isAddress } from "@custody-gate/types";
import type { Address, JsonValue, RoleId } from "@custody-gate/types";

export interface KeyCodec<K> {
  encode(key: K): string;
  decode(raw: string): K;
}

export interface ValueCodec<V> {
  encode(value: V): JsonValue;
  decode(raw: unknown): V;
}

// =============================================================================
// Keys
// =============================================================================

export const addressKey: KeyCodec<Address> = {
  encode: (key) => key.toLowerCase(),
  decode: (raw) => {
    if (!isAddress(raw)) {
      throw new TypeError(`Not an address key: ${raw}`);
    }
    return raw;
  },
};

export const roleIdKey: KeyCodec<RoleId> = {
  encode: (key) => key.toString(10),
  decode: (raw) => BigInt(raw),
};

// =============================================================================
// Values
// =============================================================================

/**
 * Build a value codec whose decoder is a zod schema.
 */
export function zodValue<V>(
  schema: z.ZodType<V, z.ZodTypeDef, unknown>,
  encode: (value: V) => JsonValue,
): ValueCodec<V> {
  return {
    encode,
    decode: (raw) => schema.parse(raw),
  };
}

export const secondsValue: ValueCodec<number> = zodValue(
  z.number().int().nonnegative(),
  (value) => value,
);
