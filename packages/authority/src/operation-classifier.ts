/**
 * Classification of operations for redemption locking.
 */

import type { OperationClass, Selector } from "@custody-gate/types";
import { VAULT_SELECTORS } from "./selectors.js";

export class OperationClassifier {
  private readonly table: ReadonlyMap<Selector, OperationClass>;

  constructor(entries: Iterable<readonly [Selector, OperationClass]>) {
    const table = new Map<Selector, OperationClass>();
    for (const [selector, operationClass] of entries) {
      table.set(normalize(selector), operationClass);
    }
    this.table = table;
  }

  /** Unlisted selectors are "other". */
  classify(selector: Selector): OperationClass {
    return this.table.get(normalize(selector)) ?? "other";
  }

  /** Copy of this classifier with `selector` classified as `operationClass`. */
  with(selector: Selector, operationClass: OperationClass): OperationClassifier {
    return new OperationClassifier([...this.table, [selector, operationClass]]);
  }
}

function normalize(selector: Selector): Selector {
  return `0x${selector.slice(2).toLowerCase()}`;
}

/** Deposit, mint and deposit-with-permit lock; withdraw, redeem and transfers check. */
export const DEFAULT_CLASSIFIER = new OperationClassifier([
  [VAULT_SELECTORS.deposit, "deposit"],
  [VAULT_SELECTORS.mint, "deposit"],
  [VAULT_SELECTORS.depositWithPermit, "deposit"],
  [VAULT_SELECTORS.withdraw, "withdraw"],
  [VAULT_SELECTORS.redeem, "withdraw"],
  [VAULT_SELECTORS.transfer, "withdraw"],
  [VAULT_SELECTORS.transferFrom, "withdraw"],
]);
