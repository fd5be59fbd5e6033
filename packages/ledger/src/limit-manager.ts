/**
 * @pocket-ledger/ledger — Category limit registry management.
 *
 * Limits live inside the ledger document. Setting a limit overwrites any
 * previous value for the category; there is no delete. A category needs no
 * transactions to carry a limit.
 */

import type { CategoryLimit } from "@pocket-ledger/types";
import type { DocumentStore } from "@pocket-ledger/store";
import { LedgerError } from "./types.js";

export class LimitManager {
  private readonly _store: DocumentStore;

  constructor(store: DocumentStore) {
    this._store = store;
  }

  /**
   * Insert or overwrite the limit for a category.
   *
   * Input is validated before the ledger is read, so a rejected call
   * leaves the registry untouched.
   */
  setLimit(category: string, limit: number): CategoryLimit {
    if (category.length === 0) {
      throw new LedgerError("INVALID_INPUT", "Category must not be empty");
    }
    if (!Number.isFinite(limit)) {
      throw new LedgerError("INVALID_INPUT", `Limit must be a finite number, got ${String(limit)}`);
    }
    if (limit < 0) {
      throw new LedgerError("INVALID_INPUT", `Limit must not be negative, got ${String(limit)}`);
    }

    const document = this._store.load();
    const entry: CategoryLimit = { category, limit };
    const limits = new Map(document.limits);
    limits.set(category, entry);

    this._store.save({ transactions: document.transactions, limits });
    return entry;
  }

  getLimit(category: string): CategoryLimit | undefined {
    return this._store.load().limits.get(category);
  }

  /**
   * All limits, in registry order.
   */
  listLimits(): readonly CategoryLimit[] {
    return [...this._store.load().limits.values()];
  }
}
