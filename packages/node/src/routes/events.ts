/**
 * Event query routes.
 *
 * GET /api/v1/events            — Events of every stream, in global order
 * GET /api/v1/events/:streamId  — Events of one stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, ListEventsQuerySchema);
    const events = c.get("service").readAllEvents({
      ...(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : {}),
      ...(query.type !== undefined ? { type: query.type } : {}),
      maxCount: query.limit,
    });
    return c.json({ data: events, count: events.length });
  });

  routes.get("/:streamId", (c) => {
    const query = readQuery(c, ListStreamEventsQuerySchema);
    const events = c.get("service").readStreamEvents(c.req.param("streamId"), {
      ...(query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : {}),
      ...(query.type !== undefined ? { type: query.type } : {}),
      maxCount: query.limit,
    });
    return c.json({ data: events, count: events.length });
  });

  return routes;
}
