import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import type { RoleId, Seconds } from "@custody-gate/types";
import { buildVaultInitialization, parseBootstrapData } from "../src/bootstrap.js";
import { Roles } from "../src/roles.js";
import { AUTHORITY_SELECTORS, VAULT_SELECTORS } from "../src/selectors.js";
import { ADMIN, ALICE, AUTHORITY, BOB, CAROL, VAULT, createCore, thrown } from "./fixtures.js";

const STRANGER = "0x8888888888888888888888888888888888888888";

describe("buildVaultInitialization", () => {
  it("binds every vault and authority operation", () => {
    const data = buildVaultInitialization({ vault: VAULT, authority: AUTHORITY, holders: {} });

    expect(data.roleToFunctions).toHaveLength(19);
    expect(data.roleToFunctions.filter((b) => b.target === AUTHORITY)).toHaveLength(4);
    expect(data.adminRoles).toHaveLength(10);
    expect(data.accountToRoles).toHaveLength(0);
  });

  it("adds transfer bindings for a transferable vault", () => {
    const data = buildVaultInitialization({
      vault: VAULT,
      authority: AUTHORITY,
      transferable: true,
      holders: {},
    });

    expect(data.roleToFunctions).toHaveLength(21);
    expect(
      data.roleToFunctions.find((b) => b.functionSelector === VAULT_SELECTORS.transferFrom)?.roleId,
    ).toBe(Roles.PUBLIC);
  });

  it("restricts deposits to the whitelist for a private vault", () => {
    const data = buildVaultInitialization({
      vault: VAULT,
      authority: AUTHORITY,
      isPrivate: true,
      holders: {},
    });

    const roleOf = (selector: string) =>
      data.roleToFunctions.find((b) => b.functionSelector === selector)?.roleId;
    expect(roleOf(VAULT_SELECTORS.deposit)).toBe(Roles.WHITELIST);
    expect(roleOf(VAULT_SELECTORS.depositWithPermit)).toBe(Roles.WHITELIST);
    expect(roleOf(VAULT_SELECTORS.withdraw)).toBe(Roles.PUBLIC);
  });

  it("grants holders with their role's minimal delay", () => {
    const delays = new Map<RoleId, Seconds>([[Roles.ALPHA, 3600]]);
    const data = buildVaultInitialization({
      vault: VAULT,
      authority: AUTHORITY,
      holders: { owners: [BOB], atomists: [CAROL], alphas: [ALICE] },
      minimalExecutionDelays: delays,
    });

    expect(data.accountToRoles).toEqual([
      { roleId: Roles.OWNER, account: BOB, executionDelay: 0 },
      { roleId: Roles.ATOMIST, account: CAROL, executionDelay: 0 },
      { roleId: Roles.ALPHA, account: ALICE, executionDelay: 3600 },
    ]);
    expect(
      data.roleToFunctions.find((b) => b.functionSelector === VAULT_SELECTORS.execute),
    ).toEqual({
      target: VAULT,
      roleId: Roles.ALPHA,
      functionSelector: VAULT_SELECTORS.execute,
      minimalExecutionDelay: 3600,
    });
  });
});

describe("initializing with built data", () => {
  const data = buildVaultInitialization({
    vault: VAULT,
    authority: AUTHORITY,
    isPrivate: true,
    holders: { owners: [BOB], atomists: [CAROL], alphas: [ALICE] },
    minimalExecutionDelays: new Map<RoleId, Seconds>([[Roles.ALPHA, 3600]]),
  });

  it("wires roles, admins and guardians", () => {
    const { core } = createCore();
    core.initialize(ADMIN, data);
    const manager = core.manager;

    expect(manager.check(ALICE, VAULT, VAULT_SELECTORS.execute)).toEqual({
      immediate: false,
      delay: 3600,
    });
    expect(manager.check(STRANGER, VAULT, VAULT_SELECTORS.deposit).immediate).toBe(false);
    expect(manager.check(STRANGER, VAULT, VAULT_SELECTORS.redeem).immediate).toBe(true);
    expect(manager.getRoleAdmin(Roles.ALPHA)).toBe(Roles.ATOMIST);
    expect(manager.getRoleAdmin(Roles.PERFORMANCE_FEE_MANAGER)).toBe(Roles.DAO);
    expect(manager.getRoleGuardian(Roles.ALPHA)).toBe(Roles.GUARDIAN);
    expect(manager.getRoleGuardian(Roles.PUBLIC)).toBe(Roles.ADMIN);
    expect(core.getMinimalExecutionDelayForRole(Roles.ALPHA)).toBe(3600);
  });

  it("lets the atomist open the vault and an owner adjust delays", () => {
    const { core } = createCore();
    core.initialize(ADMIN, data);

    core.convertToPublicVault(CAROL, VAULT);
    expect(core.manager.check(STRANGER, VAULT, VAULT_SELECTORS.deposit).immediate).toBe(true);

    core.setMinimalExecutionDelaysForRoles(BOB, [Roles.ALPHA], [7200]);
    expect(core.getMinimalExecutionDelayForRole(Roles.ALPHA)).toBe(7200);
    expect(thrown(() => core.updateTargetClosed(CAROL, VAULT, true))).toMatchObject({
      code: "ACCESS_MANAGED_UNAUTHORIZED",
    });
  });

  it("lets the atomist admin grant alphas under the floor", () => {
    const { core } = createCore();
    core.initialize(ADMIN, data);

    expect(thrown(() => core.grantRole(CAROL, Roles.ALPHA, STRANGER, 0))).toMatchObject({
      code: "TOO_SHORT_EXECUTION_DELAY_FOR_ROLE",
    });
    expect(core.grantRole(CAROL, Roles.ALPHA, STRANGER, 3600)).toBe(true);
    expect(
      core.manager.check(CAROL, AUTHORITY, AUTHORITY_SELECTORS.setMinimalExecutionDelaysForRoles)
        .immediate,
    ).toBe(false);
  });
});

describe("parseBootstrapData", () => {
  it("parses decimal role ids and fills defaults", () => {
    const data = parseBootstrapData({
      roleToFunctions: [{ target: VAULT, roleId: "200", functionSelector: VAULT_SELECTORS.execute }],
      accountToRoles: [{ roleId: 200, account: ALICE, executionDelay: 60 }],
    });

    expect(data).toEqual({
      roleToFunctions: [
        {
          target: VAULT,
          roleId: 200n,
          functionSelector: VAULT_SELECTORS.execute,
          minimalExecutionDelay: 0,
        },
      ],
      adminRoles: [],
      accountToRoles: [{ roleId: 200n, account: ALICE, executionDelay: 60 }],
    });
  });

  it("accepts the full 64-bit role range", () => {
    const data = parseBootstrapData({
      roleToFunctions: [],
      adminRoles: [{ roleId: "18446744073709551615", adminRoleId: "0" }],
    });
    expect(data.adminRoles).toEqual([{ roleId: Roles.PUBLIC, adminRoleId: 0n }]);
  });

  it.each([
    ["a role id beyond 64 bits", { roleId: "18446744073709551616", adminRoleId: "0" }],
    ["a negative role id", { roleId: "-1", adminRoleId: "0" }],
    ["a fractional role id", { roleId: 1.5, adminRoleId: "0" }],
  ])("rejects %s", (_label, adminRole) => {
    expect(() => parseBootstrapData({ roleToFunctions: [], adminRoles: [adminRole] })).toThrow(ZodError);
  });

  it("rejects malformed addresses, selectors and delays", () => {
    const binding = { target: VAULT, roleId: "1", functionSelector: VAULT_SELECTORS.deposit };
    for (const bad of [
      { ...binding, target: "0x1234" },
      { ...binding, functionSelector: "0x1234" },
      { ...binding, minimalExecutionDelay: -1 },
      { ...binding, minimalExecutionDelay: 1.5 },
    ]) {
      expect(() => parseBootstrapData({ roleToFunctions: [bad] })).toThrow(ZodError);
    }
  });

  it("rejects an execution delay beyond 32 bits", () => {
    const holder = { roleId: "1", account: ALICE };
    expect(() =>
      parseBootstrapData({ roleToFunctions: [], accountToRoles: [{ ...holder, executionDelay: 2 ** 32 }] }),
    ).toThrow(ZodError);
    expect(
      parseBootstrapData({ roleToFunctions: [], accountToRoles: [{ ...holder, executionDelay: 2 ** 32 - 1 }] })
        .accountToRoles[0]?.executionDelay,
    ).toBe(2 ** 32 - 1);
  });

  it("requires roleToFunctions", () => {
    expect(() => parseBootstrapData({})).toThrow(ZodError);
  });
});
