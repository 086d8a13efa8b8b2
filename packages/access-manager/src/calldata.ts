/**
 * Calldata helpers: selectors, operation ids and the encoding of the
 * manager's own administrative calls.
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  getAddress,
  isHex,
  keccak256,
  parseAbi,
  parseAbiParameters,
  size,
  slice,
  toFunctionSelector,
} from "viem";
import { isSelector } from "@custody-gate/types";
import type { Address, Hex, OperationId, Selector } from "@custody-gate/types";
import { AccessManagerError } from "./errors.js";

export const ZERO_SELECTOR: Selector = "0x00000000";

const ADMIN_SIGNATURES = [
  "function labelRole(uint64 roleId, string label)",
  "function grantRole(uint64 roleId, address account, uint32 executionDelay)",
  "function revokeRole(uint64 roleId, address account)",
  "function setRoleAdmin(uint64 roleId, uint64 admin)",
  "function setRoleGuardian(uint64 roleId, uint64 guardian)",
  "function setGrantDelay(uint64 roleId, uint32 newDelay)",
  "function setTargetFunctionRole(address target, bytes4[] selectors, uint64 roleId)",
  "function setTargetAdminDelay(address target, uint32 newDelay)",
  "function setTargetClosed(address target, bool closed)",
] as const;

/** Administrative calls the manager authorizes against itself. */
export const MANAGER_ABI = parseAbi(ADMIN_SIGNATURES);

/** Marker a target returns while it is consuming a scheduled operation. */
export const CONSUMING_SCHEDULED_OP_SELECTOR: Selector = toFunctionSelector(
  "function isConsumingScheduledOp()",
);

export type AdminRestriction =
  /** Only ADMIN_ROLE may call. */
  | "admin"
  /** ADMIN_ROLE, plus the admin delay of the target named in argument 0. */
  | "target-admin"
  /** The admin role of the role named in argument 0. */
  | "role-admin";

const RESTRICTIONS: ReadonlyMap<Selector, AdminRestriction> = new Map<Selector, AdminRestriction>([
  [toFunctionSelector(ADMIN_SIGNATURES[0]), "admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[1]), "role-admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[2]), "role-admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[3]), "admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[4]), "admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[5]), "admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[6]), "target-admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[7]), "admin"],
  [toFunctionSelector(ADMIN_SIGNATURES[8]), "target-admin"],
]);

/**
 * First four bytes of `data`, lower-cased.
 *
 * @throws AccessManagerError INVALID_CALLDATA if `data` is shorter than four bytes
 */
export function selectorOf(data: Hex): Selector {
  const selector = isHex(data, { strict: true }) && data.length % 2 === 0 && size(data) >= 4
    ? slice(data, 0, 4).toLowerCase()
    : undefined;
  if (!isSelector(selector)) {
    throw new AccessManagerError("INVALID_CALLDATA", "Calldata must hold at least a selector", {
      data,
    });
  }
  return selector;
}

/**
 * Restriction that applies when `selector` is called on the manager
 * itself, or undefined for calls that are not administrative.
 */
export function adminRestrictionOf(selector: Selector): AdminRestriction | undefined {
  return RESTRICTIONS.get(selector);
}

/** First argument of an administrative call, read as an address. */
export function firstAddressArg(data: Hex): Address {
  const [value] = decodeAbiParameters(parseAbiParameters("address"), slice(data, 4, 36));
  return value;
}

/** First argument of an administrative call, read as a role id. */
export function firstRoleIdArg(data: Hex): bigint {
  const [value] = decodeAbiParameters(parseAbiParameters("uint64"), slice(data, 4, 36));
  return value;
}

/**
 * Identifier of a (caller, target, data) operation.
 */
export function hashOperation(caller: Address, target: Address, data: Hex): OperationId {
  return keccak256(
    encodeAbiParameters(parseAbiParameters("address, address, bytes"), [
      getAddress(caller),
      getAddress(target),
      data,
    ]),
  );
}

/** Key of a target function while the manager is relaying a call to it. */
export function executionIdOf(target: Address, selector: Selector): string {
  return `${target.toLowerCase()}:${selector.toLowerCase()}`;
}
