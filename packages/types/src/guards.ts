/**
 * Runtime Type Guards
 *
 * Narrowing functions for control-plane types, used where values
 * cross a system boundary (API inputs, bootstrap files).
 */

import type { Address, OperationId, RoleId, Seconds, Selector } from "./primitives.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const SELECTOR_PATTERN = /^0x[0-9a-fA-F]{8}$/;
const OPERATION_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;

const MAX_ROLE_ID = 2n ** 64n - 1n;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isSelector(value: unknown): value is Selector {
  return typeof value === "string" && SELECTOR_PATTERN.test(value);
}

export function isOperationId(value: unknown): value is OperationId {
  return typeof value === "string" && OPERATION_ID_PATTERN.test(value);
}

export function isRoleId(value: unknown): value is RoleId {
  return typeof value === "bigint" && value >= 0n && value <= MAX_ROLE_ID;
}

export function isSeconds(value: unknown): value is Seconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** Largest delay the manager stores: delays are 32-bit. */
export const MAX_DELAY: Seconds = 2 ** 32 - 1;

export function isDelay(value: unknown): value is Seconds {
  return isSeconds(value) && value <= MAX_DELAY;
}
