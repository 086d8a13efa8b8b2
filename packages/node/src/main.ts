/**
 * @custody-gate/node — Entry point.
 *
 * Loads config, restores state, applies the bootstrap file, starts the
 * HTTP server and saves state on graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Address } from "@custody-gate/types";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    authConfig = {
      apiKeys: new Map<string, Address>(parsedKeys.map((k) => [k.key, k.address])),
    };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured — running in unsecured mode");
  }

  const { app, service } = createApp({
    serviceConfig: {
      address: config.AUTHORITY_ADDRESS,
      initialAdmin: config.INITIAL_ADMIN,
      redemptionDelay: config.REDEMPTION_DELAY_SECONDS,
      expiration: config.SCHEDULE_EXPIRATION_SECONDS,
      minSetback: config.MIN_SETBACK_SECONDS,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth: authConfig,
  });

  const snapshotFile = config.STATE_SNAPSHOT_FILE;
  if (snapshotFile !== undefined && service.loadSnapshot(snapshotFile)) {
    logger.info({ file: snapshotFile, stateHash: service.stateHash() }, "State restored");
  }

  if (config.BOOTSTRAP_FILE !== undefined) {
    if (service.core.isInitialized()) {
      logger.info({ file: config.BOOTSTRAP_FILE }, "Authority already initialized; bootstrap file skipped");
    } else {
      const data = service.initializeFromFile(config.INITIAL_ADMIN, config.BOOTSTRAP_FILE);
      logger.info(
        {
          file: config.BOOTSTRAP_FILE,
          roleToFunctions: data.roleToFunctions.length,
          accountToRoles: data.accountToRoles.length,
        },
        "Authority initialized",
      );
    }
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      authority: config.AUTHORITY_ADDRESS,
      redemptionDelay: config.REDEMPTION_DELAY_SECONDS,
    },
    "Authority node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    if (snapshotFile !== undefined) {
      service.saveSnapshot(snapshotFile);
      logger.info({ file: snapshotFile, stateHash: service.stateHash() }, "State saved");
    }
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
