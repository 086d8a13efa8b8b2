/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthorityService } from "../services/authority-service.js";

export function createHealthRoutes(service: AuthorityService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyEventIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      initialized: service.core.isInitialized(),
      eventChain: {
        valid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
