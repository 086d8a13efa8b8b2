/**
 * Authority routes.
 *
 * GET  /api/v1/authority                                   — Authority settings
 * POST /api/v1/authority/can-call                          — Gate a call on the requesting target
 * POST /api/v1/authority/initialize                        — One-time bootstrap
 * PUT  /api/v1/authority/targets/:target/closed            — Open or close a target
 * GET  /api/v1/authority/vaults/:vault                     — Vault latches
 * POST /api/v1/authority/vaults/:vault/public              — Convert to a public vault
 * POST /api/v1/authority/vaults/:vault/transferable        — Enable share transfers
 * PUT  /api/v1/authority/minimal-execution-delays          — Set minimal delays per role
 * GET  /api/v1/authority/minimal-execution-delays/:roleId  — Minimal delay of a role
 * GET  /api/v1/authority/accounts/:account/lock            — Redemption lock of an account
 */

import { Hono } from "hono";
import { BootstrapDataSchema } from "@custody-gate/authority";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  CanCallSchema,
  MinimalDelaysSchema,
  RoleIdSchema,
  TargetClosedSchema,
} from "../types/dto.js";
import { toJsonObject } from "../types/json.js";
import { readBody, readParam } from "../middleware/validate.js";

export function createAuthorityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").info() });
  });

  // Asked by a target about one of its callers: the principal of the
  // request is the target. Denials and failed schedule consumption throw,
  // so lock bookkeeping persists only for an authorized call.
  routes.post("/can-call", async (c) => {
    const { caller, data } = await readBody(c, CanCallSchema);
    const authorized = c.get("service").core.authorizeCall(c.get("caller"), caller, data);
    return c.json({ data: authorized });
  });

  routes.post("/initialize", async (c) => {
    const data = await readBody(c, BootstrapDataSchema);
    c.get("service").core.initialize(c.get("caller"), data);
    return c.json({
      data: {
        initialized: true,
        roleToFunctions: data.roleToFunctions.length,
        adminRoles: data.adminRoles.length,
        accountToRoles: data.accountToRoles.length,
      },
    });
  });

  routes.put("/targets/:target/closed", async (c) => {
    const target = readParam(c, "target", AddressSchema);
    const { closed } = await readBody(c, TargetClosedSchema);
    c.get("service").core.updateTargetClosed(c.get("caller"), target, closed);
    return c.json({ data: { target, closed } });
  });

  routes.get("/vaults/:vault", (c) => {
    const vault = readParam(c, "vault", AddressSchema);
    const { core } = c.get("service");
    return c.json({
      data: {
        vault,
        isPublic: core.isPublicVault(vault),
        isTransferable: core.isTransferSharesEnabled(vault),
      },
    });
  });

  routes.post("/vaults/:vault/public", (c) => {
    const vault = readParam(c, "vault", AddressSchema);
    const { core } = c.get("service");
    core.convertToPublicVault(c.get("caller"), vault);
    return c.json({ data: { vault, isPublic: core.isPublicVault(vault) } });
  });

  routes.post("/vaults/:vault/transferable", (c) => {
    const vault = readParam(c, "vault", AddressSchema);
    const { core } = c.get("service");
    core.enableTransferShares(c.get("caller"), vault);
    return c.json({ data: { vault, isTransferable: core.isTransferSharesEnabled(vault) } });
  });

  routes.put("/minimal-execution-delays", async (c) => {
    const { roleIds, delays } = await readBody(c, MinimalDelaysSchema);
    c.get("service").core.setMinimalExecutionDelaysForRoles(c.get("caller"), roleIds, delays);
    return c.json({ data: toJsonObject({ roleIds, delays }) });
  });

  routes.get("/minimal-execution-delays/:roleId", (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const delay = c.get("service").core.getMinimalExecutionDelayForRole(roleId);
    return c.json({ data: { roleId: roleId.toString(10), delay } });
  });

  routes.get("/accounts/:account/lock", (c) => {
    const account = readParam(c, "account", AddressSchema);
    const service = c.get("service");
    const unlockTime = service.core.getAccountLockTime(account);
    return c.json({
      data: { account, unlockTime, locked: unlockTime > service.clock.now() },
    });
  });

  return routes;
}
