/**
 * Derived fields.
 *
 * Values computed from other fields rather than stored as independent
 * state. Used on creation and again whenever a document is decoded.
 */

import type { LedgerDocument, TransactionType } from "./transaction.js";

/**
 * Transaction type for a signed amount: `debit` below zero, `credit` otherwise.
 */
export function transactionTypeOf(amount: number): TransactionType {
  return amount < 0 ? "debit" : "credit";
}

/**
 * A ledger with no transactions and no limits, used when nothing is stored yet.
 */
export function emptyLedgerDocument(): LedgerDocument {
  return { transactions: [], limits: new Map() };
}
