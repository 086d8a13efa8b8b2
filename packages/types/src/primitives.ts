/**
 * Primitive Types
 *
 * Identifiers shared by every package of the control plane.
 *
 * Rules:
 * - Addresses and selectors are 0x-prefixed hex strings
 * - Role ids are bigints (64-bit range)
 * - Time is measured in whole seconds since the Unix epoch
 */

/**
 * Hex-encoded byte string.
 */
export type Hex = `0x${string}`;

/**
 * Account or target address (20 bytes, hex-encoded).
 */
export type Address = `0x${string}`;

/**
 * Operation identifier: the first 4 bytes of a call's payload.
 */
export type Selector = `0x${string}`;

/**
 * Role identifier. Fits in 64 bits.
 */
export type RoleId = bigint;

/**
 * Duration in whole seconds.
 */
export type Seconds = number;

/**
 * Point in time in whole seconds since the Unix epoch.
 */
export type Timestamp = number;

/**
 * 32-byte identifier of a scheduled operation.
 */
export type OperationId = `0x${string}`;
