/**
 * Request DTOs with Zod validation schemas.
 *
 * Route handlers use these for body, path and query validation.
 */

import { z } from "zod";
import { isHex } from "viem";
import { isAddress, isDelay, isOperationId, isRoleId, isSelector, isSeconds } from "@custody-gate/types";
import type { Address, Hex, OperationId, RoleId, Seconds, Selector } from "@custody-gate/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((v): v is Address => isAddress(v), "Expected a 20-byte hex address");

export const SelectorSchema = z
  .string()
  .refine((v): v is Selector => isSelector(v), "Expected a 4-byte hex selector");

export const CalldataSchema = z
  .string()
  .refine((v): v is Hex => isHex(v, { strict: true }), "Expected hex calldata");

export const OperationIdSchema = z
  .string()
  .refine((v): v is OperationId => isOperationId(v), "Expected a 32-byte operation id");

/** Role ids travel as decimal strings; small ids may be plain numbers. */
export const RoleIdSchema = z
  .union([z.string().regex(/^\d+$/, "Expected a decimal role id"), z.number().int().nonnegative()])
  .transform((value) => BigInt(value))
  .refine((v): v is RoleId => isRoleId(v), "Role id must fit in 64 bits");

export const SecondsSchema = z
  .number()
  .refine((v): v is Seconds => isSeconds(v), "Expected a whole number of seconds");

/** Execution, grant and admin delays are stored as 32-bit values. */
export const DelaySecondsSchema = SecondsSchema.refine(
  (v) => isDelay(v),
  "Delay must fit in 32 bits",
);

// =============================================================================
// Authority DTOs
// =============================================================================

export const CanCallSchema = z.object({
  caller: AddressSchema,
  data: CalldataSchema,
});

export const TargetClosedSchema = z.object({
  closed: z.boolean(),
});

export const MinimalDelaysSchema = z.object({
  roleIds: z.array(RoleIdSchema),
  delays: z.array(SecondsSchema),
});

// =============================================================================
// Role DTOs
// =============================================================================

export const GrantRoleSchema = z.object({
  account: AddressSchema,
  executionDelay: DelaySecondsSchema.default(0),
});

export const RevokeRoleSchema = z.object({
  account: AddressSchema,
});

export const RenounceRoleSchema = z.object({
  callerConfirmation: AddressSchema,
});

export const RoleAdminSchema = z.object({
  adminRoleId: RoleIdSchema,
});

export const RoleGuardianSchema = z.object({
  guardianRoleId: RoleIdSchema,
});

export const DelaySchema = z.object({
  delay: DelaySecondsSchema,
});

export const RoleLabelSchema = z.object({
  label: z.string().min(1).max(256),
});

// =============================================================================
// Target DTOs
// =============================================================================

export const TargetFunctionRoleSchema = z.object({
  selectors: z.array(SelectorSchema).min(1),
  roleId: RoleIdSchema,
});

// =============================================================================
// Operation DTOs
// =============================================================================

export const ScheduleOperationSchema = z.object({
  target: AddressSchema,
  data: CalldataSchema,
  when: SecondsSchema.default(0),
});

export const CancelOperationSchema = z.object({
  caller: AddressSchema,
  target: AddressSchema,
  data: CalldataSchema,
});

export const HashOperationSchema = CancelOperationSchema;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const ListStreamEventsQuerySchema = z.object({
  afterVersion: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});
