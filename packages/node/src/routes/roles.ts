/**
 * Role routes.
 *
 * GET  /api/v1/roles                            — Role catalog
 * GET  /api/v1/roles/:roleId                    — Role configuration and members
 * GET  /api/v1/roles/:roleId/members/:account   — Membership of an account
 * POST /api/v1/roles/:roleId/grant              — Grant (minimal delay enforced)
 * POST /api/v1/roles/:roleId/revoke             — Revoke
 * POST /api/v1/roles/:roleId/renounce           — Renounce as the caller
 * PUT  /api/v1/roles/:roleId/admin              — Set the admin role
 * PUT  /api/v1/roles/:roleId/guardian           — Set the guardian role
 * PUT  /api/v1/roles/:roleId/grant-delay        — Set the grant delay
 * PUT  /api/v1/roles/:roleId/label              — Label the role
 */

import { Hono } from "hono";
import { Roles, roleName } from "@custody-gate/authority";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  DelaySchema,
  GrantRoleSchema,
  RenounceRoleSchema,
  RevokeRoleSchema,
  RoleAdminSchema,
  RoleGuardianSchema,
  RoleIdSchema,
  RoleLabelSchema,
} from "../types/dto.js";
import { toJsonObject } from "../types/json.js";
import { readBody, readParam } from "../middleware/validate.js";

export function createRoleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const catalog = Object.entries(Roles).map(([name, roleId]) => ({
      name,
      roleId: roleId.toString(10),
    }));
    return c.json({ data: catalog });
  });

  routes.get("/:roleId", (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { registry } = c.get("service").manager;
    return c.json({
      data: toJsonObject({
        roleId,
        name: roleName(roleId),
        label: registry.getRoleLabel(roleId),
        admin: registry.getRoleAdmin(roleId),
        guardian: registry.getRoleGuardian(roleId),
        grantDelay: registry.getRoleGrantDelay(roleId),
        members: registry.membersOf(roleId),
      }),
    });
  });

  routes.get("/:roleId/members/:account", (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const account = readParam(c, "account", AddressSchema);
    const { manager } = c.get("service");
    const { isMember, executionDelay } = manager.hasRole(roleId, account);
    const access = manager.getAccess(roleId, account);
    return c.json({
      data: toJsonObject({
        roleId,
        account,
        isMember,
        executionDelay,
        since: access.since,
        pendingDelay: access.executionDelay.pending,
      }),
    });
  });

  routes.post("/:roleId/grant", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { account, executionDelay } = await readBody(c, GrantRoleSchema);
    const newMember = c
      .get("service")
      .core.grantRole(c.get("caller"), roleId, account, executionDelay);
    return c.json({ data: { roleId: roleId.toString(10), account, newMember } });
  });

  routes.post("/:roleId/revoke", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { account } = await readBody(c, RevokeRoleSchema);
    const revoked = c.get("service").manager.revokeRole(c.get("caller"), roleId, account);
    return c.json({ data: { roleId: roleId.toString(10), account, revoked } });
  });

  routes.post("/:roleId/renounce", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { callerConfirmation } = await readBody(c, RenounceRoleSchema);
    const caller = c.get("caller");
    const revoked = c.get("service").manager.renounceRole(caller, roleId, callerConfirmation);
    return c.json({ data: { roleId: roleId.toString(10), account: caller, revoked } });
  });

  routes.put("/:roleId/admin", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { adminRoleId } = await readBody(c, RoleAdminSchema);
    c.get("service").manager.setRoleAdmin(c.get("caller"), roleId, adminRoleId);
    return c.json({ data: toJsonObject({ roleId, admin: adminRoleId }) });
  });

  routes.put("/:roleId/guardian", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { guardianRoleId } = await readBody(c, RoleGuardianSchema);
    c.get("service").manager.setRoleGuardian(c.get("caller"), roleId, guardianRoleId);
    return c.json({ data: toJsonObject({ roleId, guardian: guardianRoleId }) });
  });

  routes.put("/:roleId/grant-delay", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { delay } = await readBody(c, DelaySchema);
    const { manager } = c.get("service");
    manager.setGrantDelay(c.get("caller"), roleId, delay);
    return c.json({
      data: { roleId: roleId.toString(10), grantDelay: manager.getRoleGrantDelay(roleId) },
    });
  });

  routes.put("/:roleId/label", async (c) => {
    const roleId = readParam(c, "roleId", RoleIdSchema);
    const { label } = await readBody(c, RoleLabelSchema);
    c.get("service").manager.labelRole(c.get("caller"), roleId, label);
    return c.json({ data: { roleId: roleId.toString(10), label } });
  });

  return routes;
}
