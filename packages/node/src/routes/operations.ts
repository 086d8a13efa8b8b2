/**
 * Scheduled operation routes.
 *
 * POST /api/v1/operations               — Schedule calldata as the caller
 * POST /api/v1/operations/cancel        — Cancel a schedule
 * POST /api/v1/operations/hash          — Operation id of (caller, target, data)
 * GET  /api/v1/operations/:operationId  — Ready time and nonce
 *
 * A scheduled operation on the authority itself is consumed by calling
 * the matching authority route once the ready time has passed.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CancelOperationSchema,
  HashOperationSchema,
  OperationIdSchema,
  ScheduleOperationSchema,
} from "../types/dto.js";
import { readBody, readParam } from "../middleware/validate.js";

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { target, data, when } = await readBody(c, ScheduleOperationSchema);
    const scheduled = c.get("service").manager.schedule(c.get("caller"), target, data, when);
    return c.json({ data: scheduled }, 201);
  });

  routes.post("/cancel", async (c) => {
    const { caller, target, data } = await readBody(c, CancelOperationSchema);
    const { manager } = c.get("service");
    const nonce = manager.cancel(c.get("caller"), caller, target, data);
    return c.json({ data: { operationId: manager.hashOperation(caller, target, data), nonce } });
  });

  routes.post("/hash", async (c) => {
    const { caller, target, data } = await readBody(c, HashOperationSchema);
    return c.json({
      data: { operationId: c.get("service").manager.hashOperation(caller, target, data) },
    });
  });

  routes.get("/:operationId", (c) => {
    const operationId = readParam(c, "operationId", OperationIdSchema);
    const { manager } = c.get("service");
    return c.json({
      data: {
        operationId,
        readyAt: manager.getSchedule(operationId),
        nonce: manager.getNonce(operationId),
      },
    });
  });

  return routes;
}
