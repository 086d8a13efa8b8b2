/**
 * Target routes.
 *
 * GET /api/v1/targets/:target                      — Closed flag and admin delay
 * GET /api/v1/targets/:target/functions/:selector  — Role bound to a function
 * PUT /api/v1/targets/:target/functions            — Bind functions to a role
 * PUT /api/v1/targets/:target/admin-delay          — Set the target admin delay
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  DelaySchema,
  SelectorSchema,
  TargetFunctionRoleSchema,
} from "../types/dto.js";
import { toJsonObject } from "../types/json.js";
import { readBody, readParam } from "../middleware/validate.js";

export function createTargetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:target", (c) => {
    const target = readParam(c, "target", AddressSchema);
    const { manager } = c.get("service");
    return c.json({
      data: {
        target,
        closed: manager.isTargetClosed(target),
        adminDelay: manager.getTargetAdminDelay(target),
      },
    });
  });

  routes.get("/:target/functions/:selector", (c) => {
    const target = readParam(c, "target", AddressSchema);
    const selector = readParam(c, "selector", SelectorSchema);
    const roleId = c.get("service").manager.getTargetFunctionRole(target, selector);
    return c.json({ data: { target, selector, roleId: roleId.toString(10) } });
  });

  routes.put("/:target/functions", async (c) => {
    const target = readParam(c, "target", AddressSchema);
    const { selectors, roleId } = await readBody(c, TargetFunctionRoleSchema);
    c.get("service").manager.setTargetFunctionRole(c.get("caller"), target, selectors, roleId);
    return c.json({ data: toJsonObject({ target, selectors, roleId }) });
  });

  routes.put("/:target/admin-delay", async (c) => {
    const target = readParam(c, "target", AddressSchema);
    const { delay } = await readBody(c, DelaySchema);
    const { manager } = c.get("service");
    manager.setTargetAdminDelay(c.get("caller"), target, delay);
    return c.json({ data: { target, adminDelay: manager.getTargetAdminDelay(target) } });
  });

  return routes;
}
