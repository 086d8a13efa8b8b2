/**
 * Namespaced storage slots.
 *
 * Every logical struct lives at a slot derived from a unique namespace
 * string:
 *
 *   slot = keccak256(abi.encode(uint256(keccak256(namespace)) - 1)) & ~0xff
 *
 * Distinct namespaces never share a slot, and the cleared low byte leaves
 * room for consecutive fields of one struct.
 */

import { encodeAbiParameters, hexToBigInt, keccak256, numberToHex, stringToHex } from "viem";
import type { Hex } from "@custody-gate/types";

const LOW_BYTE_MASK = ~0xffn;

export function namespaceSlot(namespace: string): Hex {
  const inner = hexToBigInt(keccak256(stringToHex(namespace)));
  const outer = keccak256(encodeAbiParameters([{ type: "uint256" }], [inner - 1n]));
  return numberToHex(hexToBigInt(outer) & LOW_BYTE_MASK, { size: 32 });
}
