/**
 * Bootstrap data for a vault and its authority.
 *
 * `buildVaultInitialization` derives the standard role wiring of a vault;
 * `BootstrapDataSchema` parses the same data from JSON, with role ids as
 * decimal strings.
 */

import { z } from "zod";
import { isAddress, isDelay, isRoleId, isSelector, isSeconds } from "@custody-gate/types";
import type {
  AccountToRole,
  AdminRoleBinding,
  Address,
  InitializationData,
  RoleId,
  RoleToFunction,
  Seconds,
  Selector,
} from "@custody-gate/types";
import { Roles } from "./roles.js";
import { AUTHORITY_SELECTORS, VAULT_SELECTORS } from "./selectors.js";

// =============================================================================
// Builder
// =============================================================================

export interface VaultRoleHolders {
  readonly owners?: readonly Address[];
  readonly guardians?: readonly Address[];
  readonly atomists?: readonly Address[];
  readonly alphas?: readonly Address[];
  readonly fuseManagers?: readonly Address[];
  readonly whitelist?: readonly Address[];
  readonly daos?: readonly Address[];
  readonly performanceFeeManagers?: readonly Address[];
  readonly managementFeeManagers?: readonly Address[];
  readonly marketBalanceUpdaters?: readonly Address[];
}

export interface VaultBootstrapInput {
  readonly vault: Address;
  readonly authority: Address;
  /** Restricts deposit-side operations to WHITELIST. Defaults to false. */
  readonly isPrivate?: boolean;
  /** Binds share transfers to PUBLIC_ROLE from the start. Defaults to false. */
  readonly transferable?: boolean;
  readonly holders: VaultRoleHolders;
  /** Minimal execution delay per role; also the delay granted to its holders. */
  readonly minimalExecutionDelays?: ReadonlyMap<RoleId, Seconds>;
}

const ADMIN_HIERARCHY: readonly AdminRoleBinding[] = [
  { roleId: Roles.ATOMIST, adminRoleId: Roles.OWNER },
  { roleId: Roles.GUARDIAN, adminRoleId: Roles.OWNER },
  { roleId: Roles.ALPHA, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.FUSE_MANAGER, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.WHITELIST, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.CLAIM_REWARDS, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.TRANSFER_REWARDS, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.UPDATE_MARKETS_BALANCES, adminRoleId: Roles.ATOMIST },
  { roleId: Roles.PERFORMANCE_FEE_MANAGER, adminRoleId: Roles.DAO },
  { roleId: Roles.MANAGEMENT_FEE_MANAGER, adminRoleId: Roles.DAO },
];

/**
 * Role wiring of a vault: every vault and authority operation bound to
 * its role, the admin hierarchy, and grants for the given holders.
 */
export function buildVaultInitialization(input: VaultBootstrapInput): InitializationData {
  const delays = input.minimalExecutionDelays ?? new Map<RoleId, Seconds>();
  const delayOf = (roleId: RoleId): Seconds => delays.get(roleId) ?? 0;

  const depositRole = input.isPrivate === true ? Roles.WHITELIST : Roles.PUBLIC;
  const vaultBindings: [Selector, RoleId][] = [
    [VAULT_SELECTORS.deposit, depositRole],
    [VAULT_SELECTORS.mint, depositRole],
    [VAULT_SELECTORS.depositWithPermit, depositRole],
    [VAULT_SELECTORS.withdraw, Roles.PUBLIC],
    [VAULT_SELECTORS.redeem, Roles.PUBLIC],
    [VAULT_SELECTORS.execute, Roles.ALPHA],
    [VAULT_SELECTORS.addFuses, Roles.FUSE_MANAGER],
    [VAULT_SELECTORS.removeFuses, Roles.FUSE_MANAGER],
    [VAULT_SELECTORS.addBalanceFuse, Roles.FUSE_MANAGER],
    [VAULT_SELECTORS.removeBalanceFuse, Roles.FUSE_MANAGER],
    [VAULT_SELECTORS.configurePerformanceFee, Roles.PERFORMANCE_FEE_MANAGER],
    [VAULT_SELECTORS.configureManagementFee, Roles.MANAGEMENT_FEE_MANAGER],
    [VAULT_SELECTORS.setTotalSupplyCap, Roles.ATOMIST],
    [VAULT_SELECTORS.setPriceOracleMiddleware, Roles.ATOMIST],
    [VAULT_SELECTORS.updateMarketsBalances, Roles.UPDATE_MARKETS_BALANCES],
  ];
  if (input.transferable === true) {
    vaultBindings.push(
      [VAULT_SELECTORS.transfer, Roles.PUBLIC],
      [VAULT_SELECTORS.transferFrom, Roles.PUBLIC],
    );
  }

  const authorityBindings: [Selector, RoleId][] = [
    [AUTHORITY_SELECTORS.convertToPublicVault, Roles.ATOMIST],
    [AUTHORITY_SELECTORS.enableTransferShares, Roles.ATOMIST],
    [AUTHORITY_SELECTORS.setMinimalExecutionDelaysForRoles, Roles.OWNER],
    [AUTHORITY_SELECTORS.updateTargetClosed, Roles.GUARDIAN],
  ];

  const bind = (target: Address) =>
    ([functionSelector, roleId]: [Selector, RoleId]): RoleToFunction => ({
      target,
      roleId,
      functionSelector,
      minimalExecutionDelay: delayOf(roleId),
    });

  const holders = input.holders;
  const grants: [RoleId, readonly Address[] | undefined][] = [
    [Roles.OWNER, holders.owners],
    [Roles.GUARDIAN, holders.guardians],
    [Roles.ATOMIST, holders.atomists],
    [Roles.ALPHA, holders.alphas],
    [Roles.FUSE_MANAGER, holders.fuseManagers],
    [Roles.WHITELIST, holders.whitelist],
    [Roles.DAO, holders.daos],
    [Roles.PERFORMANCE_FEE_MANAGER, holders.performanceFeeManagers],
    [Roles.MANAGEMENT_FEE_MANAGER, holders.managementFeeManagers],
    [Roles.UPDATE_MARKETS_BALANCES, holders.marketBalanceUpdaters],
  ];

  return {
    roleToFunctions: [
      ...vaultBindings.map(bind(input.vault)),
      ...authorityBindings.map(bind(input.authority)),
    ],
    adminRoles: ADMIN_HIERARCHY,
    accountToRoles: grants.flatMap(([roleId, accounts]) =>
      (accounts ?? []).map((account): AccountToRole => ({
        roleId,
        account,
        executionDelay: delayOf(roleId),
      })),
    ),
  };
}

// =============================================================================
// JSON schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((v): v is Address => isAddress(v), "Expected a 20-byte hex address");

const SelectorSchema = z
  .string()
  .refine((v): v is Selector => isSelector(v), "Expected a 4-byte hex selector");

const RoleIdSchema = z
  .union([z.string().regex(/^\d+$/, "Expected a decimal role id"), z.number().int().nonnegative()])
  .transform((value) => BigInt(value))
  .refine((v): v is RoleId => isRoleId(v), "Role id must fit in 64 bits");

const SecondsSchema = z
  .number()
  .refine((v): v is Seconds => isSeconds(v), "Expected a whole number of seconds");

const DelaySecondsSchema = SecondsSchema.refine((v) => isDelay(v), "Delay must fit in 32 bits");

export const BootstrapDataSchema = z.object({
  roleToFunctions: z.array(
    z.object({
      target: AddressSchema,
      roleId: RoleIdSchema,
      functionSelector: SelectorSchema,
      minimalExecutionDelay: SecondsSchema.default(0),
    }),
  ),
  adminRoles: z.array(z.object({ roleId: RoleIdSchema, adminRoleId: RoleIdSchema })).default([]),
  accountToRoles: z
    .array(
      z.object({
        roleId: RoleIdSchema,
        account: AddressSchema,
        executionDelay: DelaySecondsSchema.default(0),
      }),
    )
    .default([]),
}) satisfies z.ZodType<InitializationData, z.ZodTypeDef, unknown>;

export function parseBootstrapData(raw: unknown): InitializationData {
  return BootstrapDataSchema.parse(raw);
}
