/**
 * Transaction Types
 *
 * Core records of the personal ledger.
 *
 * Rules:
 * - Amounts are signed: negative is money out, non-negative is money in
 * - `type` is derived from the sign of `amount`, never set independently
 * - Transactions are append-only; there is no edit or delete
 */

/**
 * Direction of a transaction, derived from the sign of its amount.
 */
export type TransactionType = "debit" | "credit";

/**
 * A single signed monetary entry.
 */
export interface Transaction {
  /** Signed amount. Negative = debit, zero or positive = credit. */
  readonly amount: number;

  /** Free-form, case-sensitive, non-empty label. */
  readonly category: string;

  /** Free-form note, may be empty. */
  readonly note: string;

  /**
   * Local creation time, `YYYY-MM-DDTHH:mm:ss.ffffff`.
   * Non-decreasing in insertion order.
   */
  readonly timestamp: string;

  readonly type: TransactionType;
}

/**
 * Advisory ceiling on the net cumulative amount recorded under a category.
 */
export interface CategoryLimit {
  readonly category: string;

  /** Always >= 0. */
  readonly limit: number;
}

/**
 * The whole persisted state: transactions plus the limit registry.
 * Materialized fresh for every operation and replaced wholesale on write.
 */
export interface LedgerDocument {
  /** Insertion order preserved, duplicates allowed. */
  readonly transactions: readonly Transaction[];

  /** At most one entry per category. */
  readonly limits: ReadonlyMap<string, CategoryLimit>;
}
