/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@custody-gate/types";
import type { AuthorityService } from "../services/authority-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Authority the request operates on */
    service: AuthorityService;

    /** Principal on whose behalf the request acts (set by auth middleware) */
    caller: Address;
  };
}
