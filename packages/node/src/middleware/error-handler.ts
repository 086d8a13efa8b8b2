/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors keep their code and their parameters;
 * the code decides the HTTP status.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { JsonValue } from "@custody-gate/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope, ValidationError } from "../types/error.js";
import { toJsonObject } from "../types/json.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

interface DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
}

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Request validation
  VALIDATION_ERROR: 400,

  // Access manager errors
  UNAUTHORIZED_ACCOUNT: 403,
  UNAUTHORIZED_CALL: 403,
  UNAUTHORIZED_CONSUME: 403,
  UNAUTHORIZED_CANCEL: 403,
  ALREADY_SCHEDULED: 409,
  NOT_SCHEDULED: 404,
  NOT_READY: 425,
  EXPIRED: 410,
  LOCKED_ROLE: 409,
  BAD_CONFIRMATION: 400,
  ROLE_ADMIN_CYCLE: 409,
  INVALID_CALLDATA: 400,

  // Authority errors
  ALREADY_INITIALIZED: 409,
  TOO_LONG_REDEMPTION_DELAY: 400,
  INVALID_REDEMPTION_DELAY: 400,
  ACCESS_MANAGED_UNAUTHORIZED: 403,
  TOO_SHORT_EXECUTION_DELAY_FOR_ROLE: 403,
  ACCOUNT_IS_LOCKED: 423,
  ARRAY_LENGTH_MISMATCH: 400,
  OPERATION_LATCHED_PUBLIC: 409,

  // Store errors
  INVALID_SNAPSHOT: 400,
  SNAPSHOT_HASH_MISMATCH: 400,
  INVALID_STREAM_ID: 400,
};

function isDomainError(err: Error): err is DomainError {
  return "code" in err && typeof err.code === "string";
}

function getStatusCode(err: Error): ContentfulStatusCode {
  if (isDomainError(err)) {
    return STATUS_MAP[err.code] ?? 500;
  }
  return 500;
}

function getDetails(err: Error): { [key: string]: JsonValue } | undefined {
  if (err instanceof ValidationError) {
    return err.issues.length > 0 ? toJsonObject({ issues: err.issues }) : undefined;
  }
  if (!isDomainError(err) || typeof err.details !== "object" || err.details === null) {
    return undefined;
  }
  const details = toJsonObject(err.details);
  return Object.keys(details).length > 0 ? details : undefined;
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const status = getStatusCode(err);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const code = isDomainError(err) ? err.code : "INTERNAL_ERROR";
  return c.json(createErrorEnvelope(code, err.message, getDetails(err)), status);
}

/**
 * Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context<AppEnv>): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
