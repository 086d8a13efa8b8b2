/**
 * Authentication middleware.
 *
 * Resolves the principal of a request from its X-Api-Key header. Each
 * configured key acts as one address; the address becomes the `caller`
 * of every authority operation made by the request.
 *
 * On success, sets `c.set("caller", address)`. On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@custody-gate/types";
import { isAddress } from "@custody-gate/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

export interface AuthConfig {
  /** Map of API key → principal address */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const caller = config.apiKeys.get(apiKey);
    if (caller === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("caller", caller);
    return next();
  };
}

/**
 * Unsecured mode (tests, dev): the caller is taken from the X-Caller
 * header, or is `defaultCaller` when the header is absent.
 */
export function callerHeaderMiddleware(defaultCaller: Address): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_HEADER);
    if (header !== undefined && !isAddress(header)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${CALLER_HEADER} must be a 20-byte hex address`),
        401,
      );
    }

    c.set("caller", header ?? defaultCaller);
    return next();
  };
}
