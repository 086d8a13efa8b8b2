/**
 * ABIs of the guarded operations: the vault's entry points and the
 * authority's own restricted operations.
 */

import { parseAbi, toFunctionSelector } from "viem";
import type { Selector } from "@custody-gate/types";

export const VAULT_ABI = parseAbi([
  "function deposit(uint256 assets, address receiver) returns (uint256)",
  "function mint(uint256 shares, address receiver) returns (uint256)",
  "function depositWithPermit(uint256 assets, address owner, uint256 deadline, uint8 v, bytes32 r, bytes32 s) returns (uint256)",
  "function withdraw(uint256 assets, address receiver, address owner) returns (uint256)",
  "function redeem(uint256 shares, address receiver, address owner) returns (uint256)",
  "function transfer(address to, uint256 value) returns (bool)",
  "function transferFrom(address from, address to, uint256 value) returns (bool)",
  "function execute((address fuse, bytes data)[] calls)",
  "function addFuses(address[] fuses)",
  "function removeFuses(address[] fuses)",
  "function addBalanceFuse(uint256 marketId, address fuse)",
  "function removeBalanceFuse(uint256 marketId, address fuse)",
  "function configurePerformanceFee(address feeManager, uint256 feeInPercentage)",
  "function configureManagementFee(address feeManager, uint256 feeInPercentage)",
  "function setTotalSupplyCap(uint256 cap)",
  "function setPriceOracleMiddleware(address priceOracleMiddleware)",
  "function updateMarketsBalances(uint256[] marketIds)",
]);

export const AUTHORITY_ABI = parseAbi([
  "struct RoleToFunction { address target; uint64 roleId; bytes4 functionSelector; uint256 minimalExecutionDelay; }",
  "struct AdminRole { uint64 roleId; uint64 adminRoleId; }",
  "struct AccountToRole { uint64 roleId; address account; uint32 executionDelay; }",
  "struct InitializationData { RoleToFunction[] roleToFunctions; AdminRole[] adminRoles; AccountToRole[] accountToRoles; }",
  "function initialize(InitializationData initialData)",
  "function convertToPublicVault(address vault)",
  "function enableTransferShares(address vault)",
  "function setMinimalExecutionDelaysForRoles(uint64[] rolesIds, uint256[] delays)",
  "function updateTargetClosed(address target, bool closed)",
]);

/** Selectors of the vault entry points, by function name. */
export const VAULT_SELECTORS = {
  deposit: toFunctionSelector("deposit(uint256,address)"),
  mint: toFunctionSelector("mint(uint256,address)"),
  depositWithPermit: toFunctionSelector(
    "depositWithPermit(uint256,address,uint256,uint8,bytes32,bytes32)",
  ),
  withdraw: toFunctionSelector("withdraw(uint256,address,address)"),
  redeem: toFunctionSelector("redeem(uint256,address,address)"),
  transfer: toFunctionSelector("transfer(address,uint256)"),
  transferFrom: toFunctionSelector("transferFrom(address,address,uint256)"),
  execute: toFunctionSelector("execute((address,bytes)[])"),
  addFuses: toFunctionSelector("addFuses(address[])"),
  removeFuses: toFunctionSelector("removeFuses(address[])"),
  addBalanceFuse: toFunctionSelector("addBalanceFuse(uint256,address)"),
  removeBalanceFuse: toFunctionSelector("removeBalanceFuse(uint256,address)"),
  configurePerformanceFee: toFunctionSelector("configurePerformanceFee(address,uint256)"),
  configureManagementFee: toFunctionSelector("configureManagementFee(address,uint256)"),
  setTotalSupplyCap: toFunctionSelector("setTotalSupplyCap(uint256)"),
  setPriceOracleMiddleware: toFunctionSelector("setPriceOracleMiddleware(address)"),
  updateMarketsBalances: toFunctionSelector("updateMarketsBalances(uint256[])"),
} as const satisfies Record<string, Selector>;

/** Selectors of the authority's restricted operations, by function name. */
export const AUTHORITY_SELECTORS = {
  initialize: toFunctionSelector(
    "initialize(((address,uint64,bytes4,uint256)[],(uint64,uint64)[],(uint64,address,uint32)[]))",
  ),
  convertToPublicVault: toFunctionSelector("convertToPublicVault(address)"),
  enableTransferShares: toFunctionSelector("enableTransferShares(address)"),
  setMinimalExecutionDelaysForRoles: toFunctionSelector(
    "setMinimalExecutionDelaysForRoles(uint64[],uint256[])",
  ),
  updateTargetClosed: toFunctionSelector("updateTargetClosed(address,bool)"),
} as const satisfies Record<string, Selector>;
