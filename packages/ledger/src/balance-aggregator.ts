/**
 * @pocket-ledger/ledger — Balance aggregation.
 *
 * The balance is the plain sum of every transaction amount, credits and
 * debits alike. Sums run on scaled bigints (see money-math).
 */

import type { Transaction } from "@pocket-ledger/types";
import type { DocumentStore } from "@pocket-ledger/store";
import { assertDecimals, fromScaled, sumAmounts } from "./money-math.js";
import { DEFAULT_DECIMALS } from "./types.js";
import type { EngineOptions } from "./types.js";

/**
 * Scaled sum of all amounts.
 */
export function computeBalance(
  transactions: readonly Transaction[],
  decimals: number,
): bigint {
  return sumAmounts(
    transactions.map((t) => t.amount),
    decimals,
  );
}

/**
 * Scaled net total of one category's amounts.
 */
export function computeCategoryTotal(
  transactions: readonly Transaction[],
  category: string,
  decimals: number,
): bigint {
  return sumAmounts(
    transactions.filter((t) => t.category === category).map((t) => t.amount),
    decimals,
  );
}

/**
 * Reads the ledger and reports its current balance.
 */
export class BalanceAggregator {
  private readonly _store: DocumentStore;
  private readonly _decimals: number;

  constructor(store: DocumentStore, options?: EngineOptions) {
    this._store = store;
    this._decimals = options?.decimals ?? DEFAULT_DECIMALS;
    assertDecimals(this._decimals);
  }

  /**
   * Sum of every stored amount.
   */
  balance(): number {
    const { transactions } = this._store.load();
    return fromScaled(computeBalance(transactions, this._decimals), this._decimals);
  }
}
