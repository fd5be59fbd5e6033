/**
 * Shared fixtures for the ledger engine tests.
 */

import { transactionTypeOf } from "@pocket-ledger/types";
import type { CategoryLimit, Transaction } from "@pocket-ledger/types";
import { InMemoryDocumentStore } from "@pocket-ledger/store";

export function tx(
  amount: number,
  category: string,
  timestamp: string,
  note = "",
): Transaction {
  return { amount, category, note, timestamp, type: transactionTypeOf(amount) };
}

/**
 * A store pre-loaded with the given transactions and limits.
 */
export function seededStore(
  transactions: readonly Transaction[],
  limits: readonly CategoryLimit[] = [],
): InMemoryDocumentStore {
  const store = new InMemoryDocumentStore();
  store.save({
    transactions,
    limits: new Map(limits.map((l) => [l.category, l])),
  });
  return store;
}

/**
 * A clock that advances one second per reading, starting at the given local time.
 */
export function steppingClock(start: Date): () => Date {
  let next = start.getTime();
  return () => {
    const reading = new Date(next);
    next += 1000;
    return reading;
  };
}
