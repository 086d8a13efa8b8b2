/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { AuthorityService } from "./services/authority-service.js";
import type { AuthorityServiceConfig } from "./services/authority-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAuthorityRoutes } from "./routes/authority.js";
import { createRoleRoutes } from "./routes/roles.js";
import { createTargetRoutes } from "./routes/targets.js";
import { createOperationRoutes } from "./routes/operations.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: AuthorityServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Auth configuration. When absent, the caller comes from the X-Caller header. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AuthorityService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new AuthorityService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", callerHeaderMiddleware(options.serviceConfig.initialAdmin));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/authority", createAuthorityRoutes());
  app.route("/api/v1/roles", createRoleRoutes());
  app.route("/api/v1/targets", createTargetRoutes());
  app.route("/api/v1/operations", createOperationRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
