/**
 * @custody-gate/authority — Authorization and timelock core for vault targets.
 *
 * Provides:
 * - AuthorizationCore: the single authorization entry point of guarded targets
 * - Redemption locks between deposit-class and withdraw-class operations
 * - Per-role minimal execution delays enforced on every grant
 * - One-time bootstrap and one-way vault latches
 * - Role catalog, ABIs and the vault bootstrap builder
 *
 * @packageDocumentation
 */

export { AuthorizationCore, MAX_REDEMPTION_DELAY } from "./authorization-core.js";
export type { AuthorizationCoreOptions, AuthorizedCall } from "./authorization-core.js";
export { AccessManagedTarget } from "./access-managed.js";
export { AuthorityError } from "./errors.js";
export type { AuthorityErrorCode, AuthorityErrorDetails } from "./errors.js";
export { ExecutionDelayRegistry } from "./execution-delay-registry.js";
export { RedemptionLockLedger } from "./redemption-lock-ledger.js";
export { InitializationGuard } from "./initialization-guard.js";
export {
  VaultLatches,
  PUBLIC_DEPOSIT_SELECTORS,
  SHARE_TRANSFER_SELECTORS,
} from "./vault-latches.js";
export { OperationClassifier, DEFAULT_CLASSIFIER } from "./operation-classifier.js";
export { Roles, roleName } from "./roles.js";
export type { RoleName } from "./roles.js";
export { VAULT_ABI, AUTHORITY_ABI, VAULT_SELECTORS, AUTHORITY_SELECTORS } from "./selectors.js";
export { NAMESPACES as AUTHORITY_NAMESPACES } from "./storage.js";
export type { InitializationState, VaultLatchRecord } from "./storage.js";
export {
  buildVaultInitialization,
  BootstrapDataSchema,
  parseBootstrapData,
} from "./bootstrap.js";
export type { VaultBootstrapInput, VaultRoleHolders } from "./bootstrap.js";
