/**
 * @pocket-ledger/types — Shared domain types for the personal ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Derived values are computed, never trusted from storage
 */

export type {
  Transaction,
  TransactionType,
  CategoryLimit,
  LedgerDocument,
} from "./transaction.js";

export { transactionTypeOf, emptyLedgerDocument } from "./derive.js";
