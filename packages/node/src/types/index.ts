/**
 * Type barrel — re-exports API types.
 */

export type { AppEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope, ValidationError } from "./error.js";
export { toJson, toJsonObject } from "./json.js";
export * from "./dto.js";
